/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as winston from 'winston';

import { withDeadline } from '../lib/deadline.js';
import {
  DeadlineExceededError,
  FingerprintError,
  SkippedSequenceError,
  SourceFetchError,
  errorMessage,
} from '../lib/error.js';
import { fingerprintBlock } from '../lib/fingerprint.js';
import * as metrics from '../metrics.js';
import {
  BlockRecord,
  ComparisonOutcome,
  CycleResult,
  LatestBlockSource,
  SequencedBlockSource,
  SourceLabel,
} from '../types.js';
import { DivergenceReporter } from './divergence-reporter.js';

const DEFAULT_SOURCE_REQUEST_TIMEOUT_MS = 60_000;

function toCycleError(
  error: unknown,
  source: SourceLabel,
  sequence?: number,
): Error {
  if (error instanceof Error) {
    return error;
  }
  return new SourceFetchError(errorMessage(error), {
    source,
    sequence,
    cause: error,
  });
}

/**
 * Runs one comparison: the latest block from the streaming source is looked
 * up by sequence on the point-fetch source and both are fingerprinted after
 * canonicalization. A cycle always resolves; failures become a `failed`
 * result so the schedule continues.
 */
export class BlockComparator {
  // Dependencies
  private log: winston.Logger;
  private latestSource: LatestBlockSource;
  private sequencedSource: SequencedBlockSource;
  private reporter: DivergenceReporter;
  private now: () => Date;

  // Settings
  private sourceRequestTimeoutMs: number;
  private skipRepeatedSequence: boolean;

  // State
  private lastComparedSequence: number | undefined;

  constructor({
    log,
    latestSource,
    sequencedSource,
    reporter,
    sourceRequestTimeoutMs = DEFAULT_SOURCE_REQUEST_TIMEOUT_MS,
    skipRepeatedSequence = true,
    now = () => new Date(),
  }: {
    log: winston.Logger;
    latestSource: LatestBlockSource;
    sequencedSource: SequencedBlockSource;
    reporter: DivergenceReporter;
    sourceRequestTimeoutMs?: number;
    skipRepeatedSequence?: boolean;
    now?: () => Date;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.latestSource = latestSource;
    this.sequencedSource = sequencedSource;
    this.reporter = reporter;
    this.sourceRequestTimeoutMs = sourceRequestTimeoutMs;
    this.skipRepeatedSequence = skipRepeatedSequence;
    this.now = now;
  }

  get lastSequence(): number | undefined {
    return this.lastComparedSequence;
  }

  async runCycle(): Promise<CycleResult> {
    const endTimer = metrics.comparisonCycleDurationHistogram.startTimer();
    const result = await this.compareLatest();
    endTimer();
    metrics.comparisonCyclesCounter.inc({ status: result.status });
    return result;
  }

  // Only a match or a reported divergence counts; failed cycles retry the slot
  private markCompared(sequence: number): void {
    this.lastComparedSequence = sequence;
    metrics.lastComparedSequenceGauge.set(sequence);
  }

  private fingerprint(
    source: SourceLabel,
    sequence: number,
    record: BlockRecord,
  ): string {
    try {
      return fingerprintBlock(record);
    } catch (error) {
      throw new FingerprintError(source, sequence, error);
    }
  }

  private async compareLatest(): Promise<CycleResult> {
    const log = this.log.child({ method: 'runCycle' });
    const labelA = this.latestSource.label;
    const labelB = this.sequencedSource.label;
    const timeoutMs = this.sourceRequestTimeoutMs;

    let recordA: BlockRecord;
    let sequence: number;
    try {
      ({ record: recordA, sequence } = await withDeadline(
        (signal) => this.latestSource.fetchLatest({ signal }),
        {
          timeoutMs,
          onTimeout: () => new DeadlineExceededError(labelA, timeoutMs),
        },
      ));
    } catch (error) {
      metrics.sourceErrorsCounter.inc({ source: labelA });
      const cause = toCycleError(error, labelA);
      log.error('Failed to fetch latest block', {
        source: labelA,
        message: cause.message,
      });
      return { status: 'failed', error: cause };
    }

    log.debug('Received latest block', { source: labelA, sequence });

    if (
      this.skipRepeatedSequence &&
      this.lastComparedSequence === sequence
    ) {
      const reason = 'sequence already compared';
      log.info('Skipping comparison, head has not advanced', {
        sequence,
        reason,
      });
      return { status: 'skipped', sequence, reason };
    }

    let recordB: BlockRecord;
    try {
      const fetched = await withDeadline(
        (signal) => this.sequencedSource.fetchBySequence(sequence, { signal }),
        {
          timeoutMs,
          onTimeout: () =>
            new DeadlineExceededError(labelB, timeoutMs, sequence),
        },
      );
      if (fetched.skipped) {
        throw new SkippedSequenceError(labelB, sequence);
      }
      recordB = fetched.record;
    } catch (error) {
      metrics.sourceErrorsCounter.inc({ source: labelB });
      const cause = toCycleError(error, labelB, sequence);
      log.error('Failed to fetch block by sequence', {
        source: labelB,
        sequence,
        message: cause.message,
      });
      return { status: 'failed', sequence, error: cause };
    }

    let outcome: ComparisonOutcome;
    try {
      const fingerprintA = this.fingerprint(labelA, sequence, recordA);
      const fingerprintB = this.fingerprint(labelB, sequence, recordB);
      outcome = {
        sequence,
        fingerprintA,
        fingerprintB,
        matched: fingerprintA === fingerprintB,
        timestamp: this.now(),
      };
    } catch (error) {
      const cause = toCycleError(error, labelA, sequence);
      log.error('Failed to fingerprint blocks', {
        sequence,
        message: cause.message,
      });
      return { status: 'failed', sequence, error: cause };
    }

    if (outcome.matched) {
      this.markCompared(sequence);
      log.info('Blocks match', {
        sequence,
        fingerprint: outcome.fingerprintA,
      });
      return { status: 'matched', sequence, outcome };
    }

    metrics.divergencesCounter.inc();
    log.warn('Block divergence detected', {
      sequence,
      fingerprintA: outcome.fingerprintA,
      fingerprintB: outcome.fingerprintB,
    });

    try {
      const artifact = await this.reporter.report({
        outcome,
        recordA,
        recordB,
        labelA,
        labelB,
      });
      this.markCompared(sequence);
      return { status: 'diverged', sequence, outcome, artifact };
    } catch (error) {
      const cause = toCycleError(error, labelA, sequence);
      log.error('Failed to report divergence', {
        sequence,
        message: cause.message,
      });
      return { status: 'failed', sequence, error: cause };
    }
  }
}
