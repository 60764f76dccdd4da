/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Server } from 'node:http';
import * as winston from 'winston';

import { createMetricsApp, startMetricsServer, stopServer } from './app.js';
import { TrackerConfig } from './config.js';
import { errorMessage } from './lib/error.js';
import { formatDuration } from './lib/duration.js';
import * as metrics from './metrics.js';
import { SlackWebhookNotifier } from './notifications/slack-webhook-notifier.js';
import {
  FirehoseBlockSource,
  resolveFirehoseAuth,
} from './sources/firehose-block-source.js';
import { RpcBlockSource } from './sources/rpc-block-source.js';
import { BlockComparator } from './workers/block-comparator.js';
import { ComparisonScheduler } from './workers/comparison-scheduler.js';
import { DivergenceReporter } from './workers/divergence-reporter.js';

// Shutdown registry for managing cleanup handlers
type CleanupHandler = {
  name: string;
  handler: () => Promise<void>;
};

export interface Tracker {
  scheduler: ComparisonScheduler;
  comparator: BlockComparator;
  registerCleanupHandler(name: string, handler: () => Promise<void>): void;
  /** Runs cycles until stopped, then runs the cleanup handlers. */
  run(): Promise<void>;
  stop(): void;
}

/**
 * Builds and wires every component from the resolved configuration. Connects
 * to Firehose before returning, so a connection failure surfaces here as a
 * StreamConnectionError.
 */
export async function createTracker({
  log,
  config,
}: {
  log: winston.Logger;
  config: TrackerConfig;
}): Promise<Tracker> {
  const cleanupHandlers: CleanupHandler[] = [];
  const registerCleanupHandler = (
    name: string,
    handler: () => Promise<void>,
  ) => {
    cleanupHandlers.push({ name, handler });
    log.debug(`Registered cleanup handler: ${name}`);
  };

  log.info('Starting block QA tracker', {
    interval: formatDuration(config.intervalMs),
    firehoseEndpoint: config.firehoseEndpoint,
    solanaRpcEndpoint: config.solanaRpcEndpoint,
    artifactsDir: config.artifactsDir,
  });

  const notifier = new SlackWebhookNotifier({
    log,
    webhookUrl: config.slackWebhookUrl,
    channel: config.slackChannel,
    timeoutMs: config.notificationTimeoutMs,
  });
  if (!notifier.enabled) {
    log.warn(
      'Slack webhook URL not set, divergences will only be written to disk',
    );
  }

  const firehoseSource = await FirehoseBlockSource.connect({
    log,
    endpoint: config.firehoseEndpoint,
    plaintext: config.firehosePlaintext,
    auth: resolveFirehoseAuth({
      apiToken: config.firehoseApiToken,
      apiKey: config.firehoseApiKey,
    }),
    connectTimeoutMs: config.firehoseConnectTimeoutMs,
  });
  registerCleanupHandler('firehose-channel', async () => {
    firehoseSource.close();
  });

  const rpcSource = new RpcBlockSource({
    log,
    rpcEndpoint: config.solanaRpcEndpoint,
    requestTimeoutMs: config.sourceRequestTimeoutMs,
  });

  const reporter = new DivergenceReporter({
    log,
    artifactsDir: config.artifactsDir,
    notifier,
  });

  const comparator = new BlockComparator({
    log,
    latestSource: firehoseSource,
    sequencedSource: rpcSource,
    reporter,
    sourceRequestTimeoutMs: config.sourceRequestTimeoutMs,
    skipRepeatedSequence: config.skipRepeatedSequence,
  });

  const scheduler = new ComparisonScheduler({
    log,
    intervalMs: config.intervalMs,
    runCycle: () => comparator.runCycle(),
  });

  if (config.metricsPort > 0) {
    const app = createMetricsApp({
      registry: metrics.registry,
      health: () => ({
        state: scheduler.state,
        cycles: scheduler.cycles,
        ...(comparator.lastSequence !== undefined && {
          lastComparedSequence: comparator.lastSequence,
        }),
      }),
    });
    const server: Server = await startMetricsServer({
      log,
      app,
      port: config.metricsPort,
    });
    registerCleanupHandler('metrics-server', () => stopServer(server));
  }

  const runCleanupHandlers = async () => {
    for (const { name, handler } of cleanupHandlers) {
      try {
        log.debug(`Running cleanup handler: ${name}`);
        await handler();
      } catch (error) {
        log.error(`Error in cleanup handler: ${name}`, {
          error: errorMessage(error),
        });
      }
    }
  };

  return {
    scheduler,
    comparator,
    registerCleanupHandler,
    async run() {
      try {
        await scheduler.start();
      } finally {
        await runCleanupHandlers();
        log.info('Shutdown complete');
      }
    },
    stop() {
      scheduler.stop();
    },
  };
}
