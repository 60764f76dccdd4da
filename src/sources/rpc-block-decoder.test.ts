/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import {
  encodeSolanaBlock,
  fixtureSlot,
  readRpcGetBlockResult,
  solanaBlockFixture,
} from '../../test/stubs.js';
import { canonicalizeBlock } from '../lib/canonicalize.js';
import { fingerprintBlock } from '../lib/fingerprint.js';
import { decodeSolanaBlock } from './firehose-block-decoder.js';
import { decodeRpcBlock } from './rpc-block-decoder.js';

describe('decodeRpcBlock', () => {
  it('should take the sequence from the caller', () => {
    const record = decodeRpcBlock(fixtureSlot, readRpcGetBlockResult());

    assert.equal(record.sequence, fixtureSlot);
    assert.equal(record.parentSequence, 41);
    assert.equal(record.blockTime, 1700000000);
    assert.equal(record.blockHeight, 30);
  });

  it('should normalize reward types and 64-bit quantities', () => {
    const record = decodeRpcBlock(fixtureSlot, readRpcGetBlockResult());

    assert.deepEqual(record.rewards, [
      {
        pubkey: 'Vote111111111111111111111111111111111111111',
        lamports: '5000',
        postBalance: '1005000',
        rewardType: 'fee',
      },
    ]);
    assert.equal(record.transactions[0].meta?.fee, '5000');
    assert.equal(record.transactions[0].meta?.computeUnitsConsumed, '150');
  });

  it('should drop stack heights from outer instructions only', () => {
    const [transaction] = decodeRpcBlock(
      fixtureSlot,
      readRpcGetBlockResult(),
    ).transactions;

    assert.deepEqual(transaction.message.instructions, [
      { programIdIndex: 1, accounts: [0], data: 'Ldp' },
    ]);
    assert.deepEqual(transaction.meta?.innerInstructions, [
      {
        index: 0,
        instructions: [
          { programIdIndex: 1, accounts: [0], data: 'A', stackHeight: 2 },
        ],
      },
    ]);
  });

  it('should mark versioned transactions', () => {
    const result = readRpcGetBlockResult();
    assert.ok(typeof result === 'object' && result !== null);
    const record = decodeRpcBlock(fixtureSlot, {
      ...result,
      transactions: [
        {
          transaction: {
            signatures: [],
            message: {
              header: {},
              accountKeys: [],
              recentBlockhash: '',
              instructions: [],
              addressTableLookups: [
                {
                  accountKey: 'CktRuQ2mttgRGkXJtyksdKHjUdc2C4TgDzyB98oEzy8',
                  writableIndexes: [1, 2],
                  readonlyIndexes: [3],
                },
              ],
            },
          },
          meta: {
            err: { InstructionError: [0, 'Custom'] },
            fee: 10,
            loadedAddresses: { writable: ['w1'], readonly: ['r1'] },
          },
          version: 0,
        },
      ],
    });
    const [transaction] = record.transactions;

    assert.equal(transaction.message.versioned, true);
    assert.deepEqual(transaction.message.addressTableLookups, [
      {
        accountKey: 'CktRuQ2mttgRGkXJtyksdKHjUdc2C4TgDzyB98oEzy8',
        writableIndexes: [1, 2],
        readonlyIndexes: [3],
      },
    ]);
    assert.equal(transaction.meta?.failed, true);
    assert.deepEqual(transaction.meta?.loadedWritableAddresses, ['w1']);
    assert.deepEqual(transaction.meta?.loadedReadonlyAddresses, ['r1']);
  });

  it('should reject malformed fields with their path', () => {
    assert.throws(
      () => decodeRpcBlock(fixtureSlot, { parentSlot: 'forty-one' }),
      {
        name: 'BlockDecodeError',
        message: "Invalid block: 'result.parentSlot' must be a safe integer",
      },
    );
  });
});

describe('decoded wire formats', () => {
  it('should agree on the same block apart from log messages', () => {
    const fromFirehose = decodeSolanaBlock(
      encodeSolanaBlock(solanaBlockFixture()),
    );
    const fromRpc = decodeRpcBlock(fixtureSlot, readRpcGetBlockResult());

    assert.notDeepEqual(fromFirehose, fromRpc);
    assert.deepEqual(
      canonicalizeBlock(fromFirehose),
      canonicalizeBlock(fromRpc),
    );
    assert.equal(fingerprintBlock(fromFirehose), fingerprintBlock(fromRpc));
  });
});
