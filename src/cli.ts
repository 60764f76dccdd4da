/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Command } from 'commander';
import * as winston from 'winston';

import * as config from './config.js';
import { parseDuration } from './lib/duration.js';
import { errorMessage } from './lib/error.js';
import logger from './log.js';
import { Tracker, createTracker } from './system.js';

export const CLI_NAME = 'block-qa-tracker';
export const CLI_VERSION = '1.0.0';

export interface CliOptions {
  readonly firehoseEndpoint: string;
  readonly solanaRpcEndpoint: string;
  readonly slackWebhookUrl: string;
  readonly slackChannel: string;
  readonly outputDir: string;
}

/**
 * Merges command line values over the environment-derived defaults. Throws
 * InvalidIntervalError when the interval cannot be parsed.
 */
export function resolveCliConfig(
  interval: string,
  options: CliOptions,
): config.TrackerConfig {
  return {
    ...config.defaultTrackerConfig(parseDuration(interval)),
    firehoseEndpoint: options.firehoseEndpoint,
    solanaRpcEndpoint: options.solanaRpcEndpoint,
    slackWebhookUrl: options.slackWebhookUrl,
    slackChannel: options.slackChannel,
    artifactsDir: options.outputDir,
  };
}

export function buildProgram(
  action: (interval: string, options: CliOptions) => Promise<void>,
): Command {
  return new Command()
    .name(CLI_NAME)
    .version(CLI_VERSION)
    .description(
      'Compare Solana blocks from Firehose against JSON-RPC on an interval',
    )
    .argument('<interval>', 'time between comparisons (e.g. 30s, 5m, 1h)')
    .option(
      '--firehose-endpoint <host:port>',
      'Firehose gRPC endpoint',
      config.FIREHOSE_ENDPOINT,
    )
    .option(
      '--solana-rpc-endpoint <url>',
      'Solana JSON-RPC endpoint',
      config.SOLANA_RPC_ENDPOINT,
    )
    .option(
      '--slack-webhook-url <url>',
      'Slack incoming webhook URL (notifications disabled when empty)',
      config.SLACK_WEBHOOK_URL,
    )
    .option(
      '--slack-channel <name>',
      'Slack channel for alerts',
      config.SLACK_CHANNEL,
    )
    .option(
      '--output-dir <path>',
      'directory for divergent block JSON files',
      config.ARTIFACTS_DIR,
    )
    .action(action);
}

/** Runs the tracker until signalled; 1 when it cannot start, 0 after a stop. */
export async function runTracker(
  log: winston.Logger,
  trackerConfig: config.TrackerConfig,
): Promise<number> {
  let tracker: Tracker;
  try {
    tracker = await createTracker({ log, config: trackerConfig });
  } catch (error) {
    log.error('Failed to start tracker', { message: errorMessage(error) });
    return 1;
  }

  const onSignal = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, stopping after the current cycle`);
    tracker.stop();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    await tracker.run();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
  return 0;
}

/** Parses the command line, runs the tracker until signalled, and returns the exit code. */
export async function main(
  argv: string[] = process.argv,
  log: winston.Logger = logger,
): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(async (interval, options) => {
    let trackerConfig: config.TrackerConfig;
    try {
      trackerConfig = resolveCliConfig(interval, options);
    } catch (error) {
      log.error(errorMessage(error));
      exitCode = 1;
      return;
    }
    exitCode = await runTracker(log, trackerConfig);
  });

  await program.parseAsync(argv);
  return exitCode;
}
