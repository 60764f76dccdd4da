/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import bs58 from 'bs58';
import path from 'node:path';
import protobuf from 'protobufjs';

import { BlockDecodeError } from '../lib/error.js';
import {
  FieldRecord,
  asRecord,
  optionalRecord,
  readArray,
  readBoolean,
  readBytes,
  readBytesArray,
  readInt64,
  readInteger,
  readOptionalInteger,
  readString,
  readStringArray,
  toInt64String,
} from '../lib/fields.js';
import {
  AddressTableLookup,
  BlockRecord,
  CompiledInstruction,
  InnerInstructions,
  Reward,
  RewardType,
  TokenBalance,
  TransactionEntry,
  TransactionMeta,
} from '../types.js';
import { PROTO_DIR } from './proto.js';

export const SOLANA_BLOCK_TYPE_URL =
  'type.googleapis.com/sf.solana.type.v1.Block';

const REWARD_TYPES: RewardType[] = [
  'unspecified',
  'fee',
  'rent',
  'staking',
  'voting',
];

const TO_OBJECT_OPTIONS: protobuf.IConversionOptions = {
  longs: String,
  enums: Number,
  arrays: true,
};

let solanaBlockType: protobuf.Type | undefined;

export function loadSolanaBlockType(): protobuf.Type {
  if (solanaBlockType === undefined) {
    const root = protobuf.loadSync(
      path.join(PROTO_DIR, 'sf/solana/type/v1/type.proto'),
    );
    solanaBlockType = root.lookupType('sf.solana.type.v1.Block');
  }
  return solanaBlockType;
}

function decodeReward(value: unknown, at: string): Reward {
  const reward = asRecord(value, at);
  const commission = readString(reward, 'commission', at);
  return {
    pubkey: readString(reward, 'pubkey', at),
    lamports: readInt64(reward, 'lamports', at),
    postBalance: readInt64(reward, 'postBalance', at),
    rewardType: REWARD_TYPES[readInteger(reward, 'rewardType', at)] ?? 'unspecified',
    ...(commission !== '' && { commission }),
  };
}

function decodeRewards(obj: FieldRecord, at: string): Reward[] {
  return readArray(obj, 'rewards', at).map((reward, index) =>
    decodeReward(reward, `${at}.rewards[${index}]`),
  );
}

function decodeInstruction(value: unknown, at: string): CompiledInstruction {
  const instruction = asRecord(value, at);
  const stackHeight = readOptionalInteger(instruction, 'stackHeight', at);
  return {
    programIdIndex: readInteger(instruction, 'programIdIndex', at),
    accounts: Array.from(readBytes(instruction, 'accounts', at)),
    data: bs58.encode(readBytes(instruction, 'data', at)),
    ...(stackHeight !== undefined && { stackHeight }),
  };
}

function decodeInnerInstructions(
  value: unknown,
  at: string,
): InnerInstructions {
  const inner = asRecord(value, at);
  return {
    index: readInteger(inner, 'index', at),
    instructions: readArray(inner, 'instructions', at).map(
      (instruction, index) =>
        decodeInstruction(instruction, `${at}.instructions[${index}]`),
    ),
  };
}

function decodeTokenBalance(value: unknown, at: string): TokenBalance {
  const balance = asRecord(value, at);
  const amount = optionalRecord(balance, 'uiTokenAmount', at) ?? {};
  return {
    accountIndex: readInteger(balance, 'accountIndex', at),
    mint: readString(balance, 'mint', at),
    owner: readString(balance, 'owner', at),
    programId: readString(balance, 'programId', at),
    amount: readString(amount, 'amount', `${at}.uiTokenAmount`),
    decimals: readInteger(amount, 'decimals', `${at}.uiTokenAmount`),
  };
}

function decodeMeta(meta: FieldRecord, at: string): TransactionMeta {
  const returnData = readBoolean(meta, 'returnDataNone', at)
    ? undefined
    : optionalRecord(meta, 'returnData', at);
  const logMessages = readBoolean(meta, 'logMessagesNone', at)
    ? undefined
    : readStringArray(meta, 'logMessages', at);
  const computeUnitsConsumed =
    meta.computeUnitsConsumed === undefined ||
    meta.computeUnitsConsumed === null
      ? undefined
      : toInt64String(meta.computeUnitsConsumed, `${at}.computeUnitsConsumed`);

  return {
    failed: optionalRecord(meta, 'err', at) !== undefined,
    fee: readInt64(meta, 'fee', at),
    preBalances: readArray(meta, 'preBalances', at).map((balance, index) =>
      toInt64String(balance, `${at}.preBalances[${index}]`),
    ),
    postBalances: readArray(meta, 'postBalances', at).map((balance, index) =>
      toInt64String(balance, `${at}.postBalances[${index}]`),
    ),
    innerInstructions: readArray(meta, 'innerInstructions', at).map(
      (inner, index) =>
        decodeInnerInstructions(inner, `${at}.innerInstructions[${index}]`),
    ),
    ...(logMessages !== undefined && { logMessages }),
    preTokenBalances: readArray(meta, 'preTokenBalances', at).map(
      (balance, index) =>
        decodeTokenBalance(balance, `${at}.preTokenBalances[${index}]`),
    ),
    postTokenBalances: readArray(meta, 'postTokenBalances', at).map(
      (balance, index) =>
        decodeTokenBalance(balance, `${at}.postTokenBalances[${index}]`),
    ),
    rewards: decodeRewards(meta, at),
    loadedWritableAddresses: readBytesArray(
      meta,
      'loadedWritableAddresses',
      at,
    ).map((address) => bs58.encode(address)),
    loadedReadonlyAddresses: readBytesArray(
      meta,
      'loadedReadonlyAddresses',
      at,
    ).map((address) => bs58.encode(address)),
    ...(returnData !== undefined && {
      returnData: {
        programId: bs58.encode(
          readBytes(returnData, 'programId', `${at}.returnData`),
        ),
        data: Buffer.from(
          readBytes(returnData, 'data', `${at}.returnData`),
        ).toString('base64'),
      },
    }),
    ...(computeUnitsConsumed !== undefined && { computeUnitsConsumed }),
  };
}

function decodeAddressTableLookup(
  value: unknown,
  at: string,
): AddressTableLookup {
  const lookup = asRecord(value, at);
  return {
    accountKey: bs58.encode(readBytes(lookup, 'accountKey', at)),
    writableIndexes: Array.from(readBytes(lookup, 'writableIndexes', at)),
    readonlyIndexes: Array.from(readBytes(lookup, 'readonlyIndexes', at)),
  };
}

function decodeTransaction(value: unknown, at: string): TransactionEntry {
  const confirmed = asRecord(value, at);
  const transaction =
    optionalRecord(confirmed, 'transaction', at) ?? {};
  const txAt = `${at}.transaction`;
  const message = optionalRecord(transaction, 'message', txAt) ?? {};
  const messageAt = `${txAt}.message`;
  const header = optionalRecord(message, 'header', messageAt) ?? {};
  const headerAt = `${messageAt}.header`;
  const meta = optionalRecord(confirmed, 'meta', at);

  return {
    signatures: readBytesArray(transaction, 'signatures', txAt).map(
      (signature) => bs58.encode(signature),
    ),
    message: {
      header: {
        numRequiredSignatures: readInteger(
          header,
          'numRequiredSignatures',
          headerAt,
        ),
        numReadonlySignedAccounts: readInteger(
          header,
          'numReadonlySignedAccounts',
          headerAt,
        ),
        numReadonlyUnsignedAccounts: readInteger(
          header,
          'numReadonlyUnsignedAccounts',
          headerAt,
        ),
      },
      accountKeys: readBytesArray(message, 'accountKeys', messageAt).map(
        (key) => bs58.encode(key),
      ),
      recentBlockhash: bs58.encode(
        readBytes(message, 'recentBlockhash', messageAt),
      ),
      instructions: readArray(message, 'instructions', messageAt).map(
        (instruction, index) =>
          decodeInstruction(instruction, `${messageAt}.instructions[${index}]`),
      ),
      addressTableLookups: readArray(
        message,
        'addressTableLookups',
        messageAt,
      ).map((lookup, index) =>
        decodeAddressTableLookup(
          lookup,
          `${messageAt}.addressTableLookups[${index}]`,
        ),
      ),
      versioned: readBoolean(message, 'versioned', messageAt),
    },
    ...(meta !== undefined && { meta: decodeMeta(meta, `${at}.meta`) }),
  };
}

/**
 * Decodes an `sf.solana.type.v1.Block` payload into the shared block model.
 */
export function decodeSolanaBlock(payload: Uint8Array): BlockRecord {
  const blockType = loadSolanaBlockType();
  const block: FieldRecord = blockType.toObject(
    blockType.decode(payload),
    TO_OBJECT_OPTIONS,
  );
  const at = 'block';
  const blockTime = optionalRecord(block, 'blockTime', at);
  const blockHeight = optionalRecord(block, 'blockHeight', at);

  return {
    sequence: readInteger(block, 'slot', at),
    parentSequence: readInteger(block, 'parentSlot', at),
    contentHash: readString(block, 'blockhash', at),
    previousContentHash: readString(block, 'previousBlockhash', at),
    ...(blockTime !== undefined && {
      blockTime: readInteger(blockTime, 'timestamp', `${at}.blockTime`),
    }),
    ...(blockHeight !== undefined && {
      blockHeight: readInteger(
        blockHeight,
        'blockHeight',
        `${at}.blockHeight`,
      ),
    }),
    rewards: decodeRewards(block, at),
    transactions: readArray(block, 'transactions', at).map(
      (transaction, index) =>
        decodeTransaction(transaction, `${at}.transactions[${index}]`),
    ),
  };
}

/**
 * Decodes the `google.protobuf.Any` carried by a Firehose response.
 */
export function decodeFirehoseBlock(any: {
  typeUrl: string;
  value: Uint8Array;
}): BlockRecord {
  if (any.typeUrl !== SOLANA_BLOCK_TYPE_URL) {
    throw new BlockDecodeError(
      'response.block.typeUrl',
      `'${SOLANA_BLOCK_TYPE_URL}' (received '${any.typeUrl}')`,
    );
  }
  return decodeSolanaBlock(any.value);
}
