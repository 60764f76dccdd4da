/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { Metadata } from '@grpc/grpc-js';
import * as winston from 'winston';

import {
  SourceFetchError,
  StreamConnectionError,
  errorMessage,
} from '../lib/error.js';
import { isRecord } from '../lib/fields.js';
import {
  FetchOptions,
  LatestBlock,
  LatestBlockSource,
  SourceLabel,
} from '../types.js';
import { decodeFirehoseBlock } from './firehose-block-decoder.js';
import {
  BlockStream,
  FirehoseBlocksClient,
  FirehoseBlocksRequest,
  FirehoseStreamClient,
} from './firehose-stream-client.js';

// Start at the chain head, stream without a stop block, include
// non-final blocks
const HEAD_BLOCK_REQUEST: FirehoseBlocksRequest = {
  startBlockNum: -1,
  stopBlockNum: 0,
  finalBlocksOnly: false,
};

export type FirehoseAuth =
  | { type: 'bearer'; token: string }
  | { type: 'api-key'; apiKey: string }
  | { type: 'none' };

export function resolveFirehoseAuth({
  apiToken,
  apiKey,
}: {
  apiToken?: string;
  apiKey?: string;
}): FirehoseAuth {
  if (apiToken !== undefined && apiToken !== '') {
    return { type: 'bearer', token: apiToken };
  }
  if (apiKey !== undefined && apiKey !== '') {
    return { type: 'api-key', apiKey };
  }
  return { type: 'none' };
}

function payloadOf(message: unknown): { typeUrl: string; value: Uint8Array } {
  if (!isRecord(message)) {
    throw new Error('received malformed response');
  }
  const block = message.block;
  if (!isRecord(block)) {
    throw new Error('received empty block');
  }
  const { typeUrl, value } = block;
  if (typeof typeUrl !== 'string' || !(value instanceof Uint8Array)) {
    throw new Error('received block without payload');
  }
  if (value.length === 0) {
    throw new Error('received empty block');
  }
  return { typeUrl, value };
}

export class FirehoseBlockSource implements LatestBlockSource {
  readonly label: SourceLabel = 'firehose';

  // Dependencies
  private log: winston.Logger;
  private client: FirehoseBlocksClient;
  private auth: FirehoseAuth;

  constructor({
    log,
    client,
    auth,
  }: {
    log: winston.Logger;
    client: FirehoseBlocksClient;
    auth: FirehoseAuth;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.client = client;
    this.auth = auth;
  }

  /**
   * Opens the shared channel and waits until it is ready. Failure here is
   * fatal: the tracker cannot run without its streaming source.
   */
  static async connect({
    log,
    endpoint,
    plaintext,
    auth,
    connectTimeoutMs,
  }: {
    log: winston.Logger;
    endpoint: string;
    plaintext: boolean;
    auth: FirehoseAuth;
    connectTimeoutMs: number;
  }): Promise<FirehoseBlockSource> {
    const client = new FirehoseStreamClient({ endpoint, plaintext });
    try {
      await client.waitForReady(connectTimeoutMs);
    } catch (error) {
      client.close();
      throw new StreamConnectionError(endpoint, error);
    }

    log.info('Connected to Firehose', { endpoint, auth: auth.type });
    return new FirehoseBlockSource({ log, client, auth });
  }

  private requestMetadata(): Metadata {
    const metadata = new Metadata();
    switch (this.auth.type) {
      case 'bearer':
        metadata.set('authorization', `Bearer ${this.auth.token}`);
        break;
      case 'api-key':
        metadata.set('x-api-key', this.auth.apiKey);
        break;
      case 'none':
        break;
    }
    return metadata;
  }

  private async receiveFirst(
    stream: BlockStream,
    signal?: AbortSignal,
  ): Promise<unknown> {
    return new Promise<unknown>((resolve, reject) => {
      const cleanup = () => {
        stream.off('data', onData);
        stream.off('error', onError);
        stream.off('end', onEnd);
        signal?.removeEventListener('abort', onAbort);
      };
      const onData = (message: unknown) => {
        cleanup();
        resolve(message);
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onEnd = () => {
        cleanup();
        reject(new Error('stream ended before a block was received'));
      };
      const onAbort = () => {
        cleanup();
        reject(signal?.reason ?? new Error('request aborted'));
      };

      if (signal?.aborted === true) {
        onAbort();
        return;
      }
      stream.on('data', onData);
      stream.on('error', onError);
      stream.on('end', onEnd);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  async fetchLatest({ signal }: FetchOptions = {}): Promise<LatestBlock> {
    const log = this.log.child({ method: 'fetchLatest' });

    log.debug('Opening Firehose blocks stream at head');
    const stream = this.client.streamBlocks(
      HEAD_BLOCK_REQUEST,
      this.requestMetadata(),
    );

    // Cancelling the call surfaces a CANCELLED status as an error event
    stream.on('error', (error: Error) => {
      log.debug('Firehose stream closed', { message: error.message });
    });

    let message: unknown;
    try {
      message = await this.receiveFirst(stream, signal);
    } catch (error) {
      throw new SourceFetchError(
        `failed to receive block: ${errorMessage(error)}`,
        { source: this.label, cause: error },
      );
    } finally {
      // Only the head block is needed
      stream.cancel();
    }

    try {
      const record = decodeFirehoseBlock(payloadOf(message));
      log.debug('Decoded Firehose block', {
        sequence: record.sequence,
        transactions: record.transactions.length,
      });
      return { record, sequence: record.sequence };
    } catch (error) {
      throw new SourceFetchError(
        `failed to decode Firehose block: ${errorMessage(error)}`,
        { source: this.label, cause: error },
      );
    }
  }

  close(): void {
    this.client.close();
  }
}
