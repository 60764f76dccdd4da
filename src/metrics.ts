/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as promClient from 'prom-client';

//
// Comparison cycle metrics
//

export const comparisonCyclesCounter = new promClient.Counter({
  name: 'block_comparison_cycles_total',
  help: 'Count of comparison cycles by outcome',
  labelNames: ['status'],
});

export const comparisonCycleDurationHistogram = new promClient.Histogram({
  name: 'block_comparison_cycle_duration_seconds',
  help: 'Duration of comparison cycles',
  buckets: [0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60],
});

export const divergencesCounter = new promClient.Counter({
  name: 'block_divergences_total',
  help: 'Count of blocks whose fingerprints differed between sources',
});

export const lastComparedSequenceGauge = new promClient.Gauge({
  name: 'block_last_compared_sequence',
  help: 'Sequence (slot) of the most recently compared block',
});

//
// Source metrics
//

export const sourceErrorsCounter = new promClient.Counter({
  name: 'block_source_errors_total',
  help: 'Count of failed block fetches by source',
  labelNames: ['source'],
});

//
// Notification metrics
//

export const notificationsCounter = new promClient.Counter({
  name: 'block_notifications_total',
  help: 'Count of divergence notifications by delivery status',
  labelNames: ['status'],
});

export const registry = promClient.register;
