/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import fs from 'node:fs/promises';
import path from 'node:path';
import * as winston from 'winston';

import { ArtifactWriteError } from '../lib/error.js';
import {
  BlockRecord,
  ComparisonOutcome,
  DivergenceArtifact,
  DivergenceNotification,
  NotificationSink,
  SourceLabel,
} from '../types.js';

export function artifactFileName(
  source: SourceLabel,
  sequence: number,
): string {
  return `${source}_block_${sequence}.json`;
}

export interface DivergentBlocks {
  outcome: ComparisonOutcome;
  recordA: BlockRecord;
  recordB: BlockRecord;
  labelA: SourceLabel;
  labelB: SourceLabel;
}

/**
 * Persists both sides of a divergence as pretty-printed JSON and forwards an
 * alert referencing the files to the notification sink.
 */
export class DivergenceReporter {
  // Dependencies
  private log: winston.Logger;
  private notifier: NotificationSink;

  readonly artifactsDir: string;

  constructor({
    log,
    artifactsDir,
    notifier,
  }: {
    log: winston.Logger;
    artifactsDir: string;
    notifier: NotificationSink;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.artifactsDir = artifactsDir;
    this.notifier = notifier;
  }

  private async writeArtifact(
    source: SourceLabel,
    sequence: number,
    record: BlockRecord,
  ): Promise<string> {
    const artifactPath = path.join(
      this.artifactsDir,
      artifactFileName(source, sequence),
    );
    try {
      await fs.mkdir(this.artifactsDir, { recursive: true });
      await fs.writeFile(artifactPath, JSON.stringify(record, null, 2));
    } catch (error) {
      throw new ArtifactWriteError(artifactPath, error);
    }
    return artifactPath;
  }

  async report({
    outcome,
    recordA,
    recordB,
    labelA,
    labelB,
  }: DivergentBlocks): Promise<DivergenceArtifact> {
    const log = this.log.child({
      method: 'report',
      sequence: outcome.sequence,
    });

    const artifactPathA = await this.writeArtifact(
      labelA,
      outcome.sequence,
      recordA,
    );
    const artifactPathB = await this.writeArtifact(
      labelB,
      outcome.sequence,
      recordB,
    );
    log.info('Wrote divergent block artifacts', {
      artifactPathA,
      artifactPathB,
    });

    const notification: DivergenceNotification = {
      sequence: outcome.sequence,
      fingerprintA: outcome.fingerprintA,
      fingerprintB: outcome.fingerprintB,
      artifactPathA,
      artifactPathB,
      timestamp: outcome.timestamp.toISOString(),
    };

    // Sinks report delivery through the result; a throwing sink is still
    // only a reporting failure
    let notified = false;
    try {
      ({ delivered: notified } = await this.notifier.notify(notification));
    } catch (error) {
      log.error('Notification sink failed', { error });
    }

    return { artifactPathA, artifactPathB, notification, notified };
  }
}
