/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  ChannelCredentials,
  Client,
  Metadata,
  credentials,
} from '@grpc/grpc-js';
import {
  MethodDefinition,
  ServiceDefinition,
  loadSync,
} from '@grpc/proto-loader';
import { Readable } from 'node:stream';

import { PROTO_DIR } from './proto.js';

const FIREHOSE_SERVICE_NAME = 'sf.firehose.v2.Stream';

// Solana blocks can be very large
const MAX_MESSAGE_SIZE_BYTES = 1024 * 1024 * 1024;

// grpc-js compression algorithm ids: 0 identity, 1 deflate, 2 gzip
const GZIP_COMPRESSION = 2;

export const firehosePackageDefinition = loadSync(
  'sf/firehose/v2/firehose.proto',
  {
    includeDirs: [PROTO_DIR],
    longs: String,
    enums: String,
    defaults: true,
    oneofs: true,
  },
);

export function firehoseServiceDefinition(): ServiceDefinition {
  const service = firehosePackageDefinition[FIREHOSE_SERVICE_NAME];
  if (service === undefined || 'format' in service) {
    throw new Error(`${FIREHOSE_SERVICE_NAME} service not found in proto`);
  }
  return service;
}

export function firehoseBlocksMethod(): MethodDefinition<object, object> {
  return firehoseServiceDefinition().Blocks;
}

export interface FirehoseBlocksRequest {
  startBlockNum: number;
  stopBlockNum: number;
  finalBlocksOnly: boolean;
}

export type BlockStream = Readable & { cancel(): void };

/** Narrow view of the Firehose Stream service used by the block source. */
export interface FirehoseBlocksClient {
  streamBlocks(request: FirehoseBlocksRequest, metadata: Metadata): BlockStream;
  close(): void;
}

/**
 * Long-lived gRPC channel to a Firehose endpoint. The channel is created once
 * and shared by every Blocks stream opened through it.
 */
export class FirehoseStreamClient implements FirehoseBlocksClient {
  readonly endpoint: string;
  private client: Client;
  private blocksMethod: MethodDefinition<object, object>;

  constructor({
    endpoint,
    plaintext = false,
  }: {
    endpoint: string;
    plaintext?: boolean;
  }) {
    this.endpoint = endpoint;
    const channelCredentials: ChannelCredentials = plaintext
      ? credentials.createInsecure()
      : credentials.createSsl();
    this.client = new Client(endpoint, channelCredentials, {
      'grpc.max_receive_message_length': MAX_MESSAGE_SIZE_BYTES,
      'grpc.max_send_message_length': MAX_MESSAGE_SIZE_BYTES,
      'grpc.default_compression_algorithm': GZIP_COMPRESSION,
    });
    this.blocksMethod = firehoseBlocksMethod();
  }

  async waitForReady(timeoutMs: number): Promise<void> {
    const deadline = new Date(Date.now() + timeoutMs);
    await new Promise<void>((resolve, reject) => {
      this.client.waitForReady(deadline, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  streamBlocks(request: FirehoseBlocksRequest, metadata: Metadata): BlockStream {
    return this.client.makeServerStreamRequest(
      this.blocksMethod.path,
      this.blocksMethod.requestSerialize,
      this.blocksMethod.responseDeserialize,
      request,
      metadata,
      {},
    );
  }

  close(): void {
    this.client.close();
  }
}
