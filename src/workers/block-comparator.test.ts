/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, before, beforeEach, describe, it } from 'node:test';
import * as winston from 'winston';

import {
  Deferred,
  RecordingNotifier,
  StubLatestSource,
  StubSequencedSource,
  stubBlockRecord,
  waitForAbort,
} from '../../test/stubs.js';
import {
  ArtifactWriteError,
  DeadlineExceededError,
  SkippedSequenceError,
} from '../lib/error.js';
import { fingerprintBlock } from '../lib/fingerprint.js';
import {
  BlockRecord,
  LatestBlock,
  NotificationResult,
  SequencedBlock,
} from '../types.js';
import { BlockComparator } from './block-comparator.js';
import { DivergenceReporter } from './divergence-reporter.js';

const now = new Date('2024-01-02T03:04:05.000Z');

const latest = (record: BlockRecord): LatestBlock => ({
  record,
  sequence: record.sequence,
});

const found = (record: BlockRecord): SequencedBlock => ({
  skipped: false,
  record,
});

const withLogMessages = (
  record: BlockRecord,
  logMessages: string[],
): BlockRecord => ({
  ...record,
  transactions: record.transactions.map((transaction) =>
    transaction.meta === undefined
      ? transaction
      : { ...transaction, meta: { ...transaction.meta, logMessages } },
  ),
});

describe('BlockComparator', () => {
  let log: winston.Logger;
  let artifactsDir: string;

  before(() => {
    log = winston.createLogger({ silent: true });
  });

  beforeEach(async () => {
    artifactsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'block-qa-'));
  });

  afterEach(async () => {
    await fs.rm(artifactsDir, { recursive: true, force: true });
  });

  const comparatorWith = ({
    latestSteps,
    sequencedSteps,
    notification = { delivered: true },
    skipRepeatedSequence = true,
    sourceRequestTimeoutMs = 1000,
    reportDir = artifactsDir,
  }: {
    latestSteps: ConstructorParameters<typeof StubLatestSource>[0];
    sequencedSteps: ConstructorParameters<typeof StubSequencedSource>[0];
    notification?: NotificationResult | Error;
    skipRepeatedSequence?: boolean;
    sourceRequestTimeoutMs?: number;
    reportDir?: string;
  }) => {
    const calls: string[] = [];
    const latestSource = new StubLatestSource(latestSteps, calls);
    const sequencedSource = new StubSequencedSource(sequencedSteps, calls);
    const notifier = new RecordingNotifier(notification);
    const comparator = new BlockComparator({
      log,
      latestSource,
      sequencedSource,
      reporter: new DivergenceReporter({
        log,
        artifactsDir: reportDir,
        notifier,
      }),
      sourceRequestTimeoutMs,
      skipRepeatedSequence,
      now: () => now,
    });
    return { calls, comparator, latestSource, sequencedSource, notifier };
  };

  describe('runCycle', () => {
    it('should fetch the latest block before requesting its sequence', async () => {
      const { calls, sequencedSource, comparator } = comparatorWith({
        latestSteps: [latest(stubBlockRecord(42))],
        sequencedSteps: [found(stubBlockRecord(42))],
      });

      await comparator.runCycle();

      assert.deepEqual(calls, ['fetchLatest', 'fetchBySequence:42']);
      assert.deepEqual(sequencedSource.requested, [42]);
    });

    it('should match records that differ only in log messages', async () => {
      const recordA = withLogMessages(stubBlockRecord(42), ['from firehose']);
      const recordB = withLogMessages(stubBlockRecord(42), ['from rpc']);
      const { comparator, notifier } = comparatorWith({
        latestSteps: [latest(recordA)],
        sequencedSteps: [found(recordB)],
      });

      const result = await comparator.runCycle();

      assert.equal(result.status, 'matched');
      assert.ok(result.status === 'matched');
      assert.deepEqual(result.outcome, {
        sequence: 42,
        fingerprintA: fingerprintBlock(recordA),
        fingerprintB: fingerprintBlock(recordB),
        matched: true,
        timestamp: now,
      });
      assert.deepEqual(await fs.readdir(artifactsDir), []);
      assert.equal(notifier.notifications.length, 0);
      assert.equal(comparator.lastSequence, 42);
    });

    it('should write artifacts and notify when the blocks differ', async () => {
      const recordA = stubBlockRecord(42);
      const recordB = stubBlockRecord(42, { parentSequence: 40 });
      const { comparator, notifier } = comparatorWith({
        latestSteps: [latest(recordA)],
        sequencedSteps: [found(recordB)],
      });

      const result = await comparator.runCycle();

      assert.ok(result.status === 'diverged');
      const pathA = path.join(artifactsDir, 'firehose_block_42.json');
      const pathB = path.join(artifactsDir, 'rpc_fetcher_block_42.json');
      assert.deepEqual((await fs.readdir(artifactsDir)).sort(), [
        'firehose_block_42.json',
        'rpc_fetcher_block_42.json',
      ]);
      assert.deepEqual(JSON.parse(await fs.readFile(pathA, 'utf8')), recordA);
      assert.deepEqual(JSON.parse(await fs.readFile(pathB, 'utf8')), recordB);
      assert.deepEqual(notifier.notifications, [
        {
          sequence: 42,
          fingerprintA: fingerprintBlock(recordA),
          fingerprintB: fingerprintBlock(recordB),
          artifactPathA: pathA,
          artifactPathB: pathB,
          timestamp: '2024-01-02T03:04:05.000Z',
        },
      ]);
      assert.notEqual(result.outcome.fingerprintA, result.outcome.fingerprintB);
      assert.equal(result.artifact.notified, true);
    });

    it('should still report a divergence when notification fails', async () => {
      const { comparator } = comparatorWith({
        latestSteps: [latest(stubBlockRecord(42))],
        sequencedSteps: [
          found(stubBlockRecord(42, { contentHash: 'other-hash' })),
        ],
        notification: new Error('webhook down'),
      });

      const result = await comparator.runCycle();

      assert.ok(result.status === 'diverged');
      assert.equal(result.artifact.notified, false);
    });

    it('should fail the cycle when the sequence was skipped', async () => {
      const { comparator, notifier } = comparatorWith({
        latestSteps: [latest(stubBlockRecord(42))],
        sequencedSteps: [{ skipped: true }],
      });

      const result = await comparator.runCycle();

      assert.ok(result.status === 'failed');
      assert.ok(result.error instanceof SkippedSequenceError);
      assert.equal(result.error.message, 'block 42 was skipped');
      assert.equal(result.sequence, 42);
      assert.deepEqual(await fs.readdir(artifactsDir), []);
      assert.equal(notifier.notifications.length, 0);
      assert.equal(comparator.lastSequence, undefined);
    });

    it('should not query the second source when the first fails', async () => {
      const { calls, comparator } = comparatorWith({
        latestSteps: [new Error('stream unavailable')],
        sequencedSteps: [],
      });

      const result = await comparator.runCycle();

      assert.ok(result.status === 'failed');
      assert.equal(result.error.message, 'stream unavailable');
      assert.deepEqual(calls, ['fetchLatest']);
    });

    it('should abort a source call that exceeds its deadline', async () => {
      const seen: { signal?: AbortSignal } = {};
      const { comparator } = comparatorWith({
        latestSteps: [latest(stubBlockRecord(42))],
        sequencedSteps: [
          new Deferred((options) => {
            seen.signal = options.signal;
            return waitForAbort<SequencedBlock>(options);
          }),
        ],
        sourceRequestTimeoutMs: 20,
      });

      const result = await comparator.runCycle();

      assert.ok(result.status === 'failed');
      assert.ok(result.error instanceof DeadlineExceededError);
      assert.equal(
        result.error.message,
        'deadline exceeded after 20ms fetching from rpc_fetcher',
      );
      assert.equal(seen.signal?.aborted, true);
    });

    it('should fail the cycle when artifacts cannot be written', async () => {
      const blocker = path.join(artifactsDir, 'not-a-directory');
      await fs.writeFile(blocker, '');
      const { comparator } = comparatorWith({
        latestSteps: [latest(stubBlockRecord(42))],
        sequencedSteps: [
          found(stubBlockRecord(42, { contentHash: 'other-hash' })),
        ],
        reportDir: blocker,
      });

      const result = await comparator.runCycle();

      assert.ok(result.status === 'failed');
      assert.ok(result.error instanceof ArtifactWriteError);
      assert.equal(comparator.lastSequence, undefined);
    });

    it('should report the divergence on retry after a failed artifact write', async () => {
      const blocker = path.join(artifactsDir, 'not-a-directory');
      await fs.writeFile(blocker, '');
      const { comparator, sequencedSource } = comparatorWith({
        latestSteps: [latest(stubBlockRecord(42)), latest(stubBlockRecord(42))],
        sequencedSteps: [
          found(stubBlockRecord(42, { contentHash: 'other-hash' })),
          found(stubBlockRecord(42, { contentHash: 'other-hash' })),
        ],
        reportDir: blocker,
      });

      const first = await comparator.runCycle();
      await fs.rm(blocker);
      const second = await comparator.runCycle();

      assert.equal(first.status, 'failed');
      assert.equal(second.status, 'diverged');
      assert.deepEqual(sequencedSource.requested, [42, 42]);
      assert.deepEqual((await fs.readdir(blocker)).sort(), [
        'firehose_block_42.json',
        'rpc_fetcher_block_42.json',
      ]);
      assert.equal(comparator.lastSequence, 42);
    });

    it('should skip a sequence that was already compared', async () => {
      const { comparator, sequencedSource } = comparatorWith({
        latestSteps: [
          latest(stubBlockRecord(42)),
          latest(stubBlockRecord(42)),
          latest(stubBlockRecord(43)),
        ],
        sequencedSteps: [
          found(stubBlockRecord(42)),
          found(stubBlockRecord(43)),
        ],
      });

      const statuses = [
        (await comparator.runCycle()).status,
        (await comparator.runCycle()).status,
        (await comparator.runCycle()).status,
      ];

      assert.deepEqual(statuses, ['matched', 'skipped', 'matched']);
      assert.deepEqual(sequencedSource.requested, [42, 43]);
    });

    it('should retry a sequence whose previous cycle failed', async () => {
      const { comparator, sequencedSource } = comparatorWith({
        latestSteps: [latest(stubBlockRecord(42)), latest(stubBlockRecord(42))],
        sequencedSteps: [new Error('rpc down'), found(stubBlockRecord(42))],
      });

      const first = await comparator.runCycle();
      const second = await comparator.runCycle();

      assert.equal(first.status, 'failed');
      assert.equal(second.status, 'matched');
      assert.deepEqual(sequencedSource.requested, [42, 42]);
    });

    it('should compare repeated sequences when skipping is disabled', async () => {
      const { comparator, sequencedSource } = comparatorWith({
        latestSteps: [latest(stubBlockRecord(42)), latest(stubBlockRecord(42))],
        sequencedSteps: [
          found(stubBlockRecord(42)),
          found(stubBlockRecord(42)),
        ],
        skipRepeatedSequence: false,
      });

      await comparator.runCycle();
      const second = await comparator.runCycle();

      assert.equal(second.status, 'matched');
      assert.deepEqual(sequencedSource.requested, [42, 42]);
    });
  });
});
