/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import * as env from './lib/env.js';

//
// Streaming source (Firehose)
//

export const FIREHOSE_ENDPOINT = env.varOrDefault(
  'FIREHOSE_ENDPOINT',
  'mainnet.sol.streamingfast.io:443',
);

// Bearer token takes precedence over the API key when both are set
export const FIREHOSE_API_TOKEN = env.varOrUndefined('FIREHOSE_API_TOKEN');
export const FIREHOSE_API_KEY = env.varOrUndefined('FIREHOSE_API_KEY');

// Disable TLS (local or in-cluster Firehose instances only)
export const FIREHOSE_PLAINTEXT = env.boolVarOrDefault(
  'FIREHOSE_PLAINTEXT',
  false,
);

// How long to wait for the Firehose channel to become ready at startup
export const FIREHOSE_CONNECT_TIMEOUT_MS = env.intVarOrDefault(
  'FIREHOSE_CONNECT_TIMEOUT_MS',
  10_000,
);

//
// Point-fetch source (Solana JSON-RPC)
//

export const SOLANA_RPC_ENDPOINT = env.varOrDefault(
  'SOLANA_RPC_ENDPOINT',
  'https://api.mainnet-beta.solana.com',
);

//
// Comparison cycles
//

// Upper bound on each source call within a cycle (0 disables the deadline)
export const SOURCE_REQUEST_TIMEOUT_MS = env.intVarOrDefault(
  'SOURCE_REQUEST_TIMEOUT_MS',
  60_000,
);

// Skip the comparison when the Firehose head has not moved since the last
// compared block
export const SKIP_REPEATED_SEQUENCE = env.boolVarOrDefault(
  'SKIP_REPEATED_SEQUENCE',
  true,
);

// Directory receiving block JSON files when a divergence is found
export const ARTIFACTS_DIR = env.varOrDefault('ARTIFACTS_DIR', process.cwd());

//
// Notifications
//

export const SLACK_WEBHOOK_URL = env.varOrDefault('SLACK_WEBHOOK_URL', '');
export const SLACK_CHANNEL = env.varOrDefault('SLACK_CHANNEL', 'solana');
export const NOTIFICATION_TIMEOUT_MS = env.intVarOrDefault(
  'NOTIFICATION_TIMEOUT_MS',
  5_000,
);

//
// Metrics
//

// Port for the Prometheus /metrics endpoint (0 disables the server)
export const METRICS_PORT = env.intVarOrDefault('METRICS_PORT', 0);

export interface TrackerConfig {
  intervalMs: number;
  firehoseEndpoint: string;
  firehoseApiToken?: string;
  firehoseApiKey?: string;
  firehosePlaintext: boolean;
  firehoseConnectTimeoutMs: number;
  solanaRpcEndpoint: string;
  sourceRequestTimeoutMs: number;
  skipRepeatedSequence: boolean;
  artifactsDir: string;
  slackWebhookUrl: string;
  slackChannel: string;
  notificationTimeoutMs: number;
  metricsPort: number;
}

export function defaultTrackerConfig(
  intervalMs: number,
): TrackerConfig {
  return {
    intervalMs,
    firehoseEndpoint: FIREHOSE_ENDPOINT,
    firehoseApiToken: FIREHOSE_API_TOKEN,
    firehoseApiKey: FIREHOSE_API_KEY,
    firehosePlaintext: FIREHOSE_PLAINTEXT,
    firehoseConnectTimeoutMs: FIREHOSE_CONNECT_TIMEOUT_MS,
    solanaRpcEndpoint: SOLANA_RPC_ENDPOINT,
    sourceRequestTimeoutMs: SOURCE_REQUEST_TIMEOUT_MS,
    skipRepeatedSequence: SKIP_REPEATED_SEQUENCE,
    artifactsDir: ARTIFACTS_DIR,
    slackWebhookUrl: SLACK_WEBHOOK_URL,
    slackChannel: SLACK_CHANNEL,
    notificationTimeoutMs: NOTIFICATION_TIMEOUT_MS,
    metricsPort: METRICS_PORT,
  };
}
