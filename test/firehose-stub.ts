/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  Metadata,
  Server,
  ServerCredentials,
  ServerWritableStream,
} from '@grpc/grpc-js';
import { createServer } from 'node:net';

import { SOLANA_BLOCK_TYPE_URL } from '../src/sources/firehose-block-decoder.js';
import { firehoseServiceDefinition } from '../src/sources/firehose-stream-client.js';
import { encodeSolanaBlock, solanaBlockFixture } from './stubs.js';

export const blockResponse = () => ({
  block: {
    typeUrl: SOLANA_BLOCK_TYPE_URL,
    value: Buffer.from(encodeSolanaBlock(solanaBlockFixture())),
  },
  cursor: 'cursor-1',
});

/**
 * In-process Firehose Stream server that answers every Blocks call with the
 * slot 42 fixture block. Listens on an ephemeral loopback port.
 */
export class FirehoseStub {
  readonly metadata: Metadata[] = [];
  private server = new Server();

  constructor() {
    this.server.addService(firehoseServiceDefinition(), {
      Blocks: (call: ServerWritableStream<object, object>) => {
        this.metadata.push(call.metadata);
        call.write(blockResponse());
      },
    });
  }

  async start(): Promise<string> {
    const port = await new Promise<number>((resolve, reject) => {
      this.server.bindAsync(
        '127.0.0.1:0',
        ServerCredentials.createInsecure(),
        (error, boundPort) => (error ? reject(error) : resolve(boundPort)),
      );
    });
    return `127.0.0.1:${port}`;
  }

  stop(): void {
    this.server.forceShutdown();
  }
}

/** A loopback endpoint with nothing listening on it. */
export async function unusedEndpoint(): Promise<string> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  await new Promise<void>((resolve, reject) =>
    server.close((error) => (error ? reject(error) : resolve())),
  );
  if (address === null || typeof address === 'string') {
    throw new Error('listener has no port');
  }
  return `127.0.0.1:${address.port}`;
}
