/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import axios, { AxiosInstance } from 'axios';
import * as winston from 'winston';

import { SourceFetchError, errorMessage } from '../lib/error.js';
import { isRecord } from '../lib/fields.js';
import { parseJsonLossless } from '../lib/json.js';
import {
  FetchOptions,
  SequencedBlock,
  SequencedBlockSource,
  SourceLabel,
} from '../types.js';
import { decodeRpcBlock } from './rpc-block-decoder.js';

// JSON-RPC error codes for slots that hold no block
const SLOT_SKIPPED_ERROR_CODE = -32007;
const LONG_TERM_STORAGE_SLOT_SKIPPED_ERROR_CODE = -32009;
const SKIPPED_ERROR_CODES = new Set([
  SLOT_SKIPPED_ERROR_CODE,
  LONG_TERM_STORAGE_SLOT_SKIPPED_ERROR_CODE,
]);

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

const GET_BLOCK_CONFIG = {
  encoding: 'json',
  transactionDetails: 'full',
  rewards: true,
  maxSupportedTransactionVersion: 0,
  commitment: 'confirmed',
} as const;

export class RpcBlockSource implements SequencedBlockSource {
  readonly label: SourceLabel = 'rpc_fetcher';

  // Dependencies
  private log: winston.Logger;
  private rpcAxios: AxiosInstance;

  // State
  private requestId = 0;

  constructor({
    log,
    rpcEndpoint,
    requestTimeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  }: {
    log: winston.Logger;
    rpcEndpoint: string;
    requestTimeoutMs?: number;
  }) {
    this.log = log.child({ class: this.constructor.name });

    // Reused across cycles; no retries, the next cycle is the retry
    this.rpcAxios = axios.create({
      baseURL: rpcEndpoint,
      timeout: requestTimeoutMs,
      headers: { 'Content-Type': 'application/json' },
      // u64 balances can exceed Number.MAX_SAFE_INTEGER
      responseType: 'text',
      transformResponse: [
        (data: unknown) =>
          typeof data === 'string' && data !== ''
            ? parseJsonLossless(data)
            : data,
      ],
    });
  }

  async fetchBySequence(
    sequence: number,
    { signal }: FetchOptions = {},
  ): Promise<SequencedBlock> {
    const log = this.log.child({ method: 'fetchBySequence', sequence });
    const id = ++this.requestId;

    log.debug('Requesting block from RPC');

    let body: unknown;
    try {
      const response = await this.rpcAxios.post<unknown>(
        '',
        {
          jsonrpc: '2.0',
          id,
          method: 'getBlock',
          params: [sequence, GET_BLOCK_CONFIG],
        },
        { signal },
      );
      body = response.data;
    } catch (error) {
      throw new SourceFetchError(
        `failed to fetch block ${sequence} from RPC: ${errorMessage(error)}`,
        { source: this.label, sequence, cause: error },
      );
    }

    if (!isRecord(body)) {
      throw new SourceFetchError(
        `unexpected RPC response for block ${sequence}`,
        { source: this.label, sequence },
      );
    }

    if (isRecord(body.error)) {
      const code = body.error.code;
      if (typeof code === 'number' && SKIPPED_ERROR_CODES.has(code)) {
        log.info('RPC reported slot as skipped', { code });
        return { skipped: true };
      }
      throw new SourceFetchError(
        `RPC error for block ${sequence}: ${String(body.error.message)} (code ${String(code)})`,
        { source: this.label, sequence, cause: body.error },
      );
    }

    if (body.result === null || body.result === undefined) {
      log.info('RPC returned no block for slot');
      return { skipped: true };
    }

    try {
      const record = decodeRpcBlock(sequence, body.result);
      log.debug('Decoded RPC block', {
        transactions: record.transactions.length,
        blockhash: record.contentHash,
      });
      return { skipped: false, record };
    } catch (error) {
      throw new SourceFetchError(
        `failed to decode RPC block ${sequence}: ${errorMessage(error)}`,
        { source: this.label, sequence, cause: error },
      );
    }
  }
}
