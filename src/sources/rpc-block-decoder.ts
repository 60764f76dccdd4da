/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { BlockDecodeError } from '../lib/error.js';
import {
  FieldRecord,
  asRecord,
  optionalRecord,
  readArray,
  readInt64,
  readInteger,
  readIntegerArray,
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
  ReturnData,
  Reward,
  RewardType,
  TokenBalance,
  TransactionEntry,
  TransactionMeta,
} from '../types.js';

const REWARD_TYPES: Record<string, RewardType> = {
  fee: 'fee',
  rent: 'rent',
  staking: 'staking',
  voting: 'voting',
};

function decodeReward(value: unknown, at: string): Reward {
  const reward = asRecord(value, at);
  const rewardType = readString(reward, 'rewardType', at).toLowerCase();
  const commission = readOptionalInteger(reward, 'commission', at);
  return {
    pubkey: readString(reward, 'pubkey', at),
    lamports: readInt64(reward, 'lamports', at),
    postBalance: readInt64(reward, 'postBalance', at),
    rewardType: REWARD_TYPES[rewardType] ?? 'unspecified',
    ...(commission !== undefined && { commission: commission.toString() }),
  };
}

function decodeRewards(obj: FieldRecord, at: string): Reward[] {
  return readArray(obj, 'rewards', at).map((reward, index) =>
    decodeReward(reward, `${at}.rewards[${index}]`),
  );
}

function decodeInstruction(
  value: unknown,
  at: string,
  { withStackHeight }: { withStackHeight: boolean },
): CompiledInstruction {
  const instruction = asRecord(value, at);
  const stackHeight = withStackHeight
    ? readOptionalInteger(instruction, 'stackHeight', at)
    : undefined;
  return {
    programIdIndex: readInteger(instruction, 'programIdIndex', at),
    accounts: readIntegerArray(instruction, 'accounts', at),
    data: readString(instruction, 'data', at),
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
        decodeInstruction(instruction, `${at}.instructions[${index}]`, {
          withStackHeight: true,
        }),
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

function decodeReturnData(
  meta: FieldRecord,
  at: string,
): ReturnData | undefined {
  const returnData = optionalRecord(meta, 'returnData', at);
  if (returnData === undefined) {
    return undefined;
  }

  // Encoded as [payload, encoding]
  const dataAt = `${at}.returnData`;
  const [payload, encoding] = readStringArray(returnData, 'data', dataAt);
  if (encoding !== undefined && encoding !== 'base64') {
    throw new BlockDecodeError(`${dataAt}.data[1]`, "'base64'");
  }
  return {
    programId: readString(returnData, 'programId', dataAt),
    data: payload ?? '',
  };
}

function decodeMeta(meta: FieldRecord, at: string): TransactionMeta {
  const loadedAddresses = optionalRecord(meta, 'loadedAddresses', at) ?? {};
  const returnData = decodeReturnData(meta, at);
  const logMessages =
    meta.logMessages === null || meta.logMessages === undefined
      ? undefined
      : readStringArray(meta, 'logMessages', at);
  const computeUnitsConsumed =
    meta.computeUnitsConsumed === undefined ||
    meta.computeUnitsConsumed === null
      ? undefined
      : toInt64String(meta.computeUnitsConsumed, `${at}.computeUnitsConsumed`);

  return {
    failed: meta.err !== undefined && meta.err !== null,
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
    loadedWritableAddresses: readStringArray(
      loadedAddresses,
      'writable',
      `${at}.loadedAddresses`,
    ),
    loadedReadonlyAddresses: readStringArray(
      loadedAddresses,
      'readonly',
      `${at}.loadedAddresses`,
    ),
    ...(returnData !== undefined && { returnData }),
    ...(computeUnitsConsumed !== undefined && { computeUnitsConsumed }),
  };
}

function decodeAddressTableLookup(
  value: unknown,
  at: string,
): AddressTableLookup {
  const lookup = asRecord(value, at);
  return {
    accountKey: readString(lookup, 'accountKey', at),
    writableIndexes: readIntegerArray(lookup, 'writableIndexes', at),
    readonlyIndexes: readIntegerArray(lookup, 'readonlyIndexes', at),
  };
}

function decodeTransaction(value: unknown, at: string): TransactionEntry {
  const withMeta = asRecord(value, at);
  const txAt = `${at}.transaction`;
  const transaction = asRecord(withMeta.transaction, txAt);
  const messageAt = `${txAt}.message`;
  const message = asRecord(transaction.message, messageAt);
  const headerAt = `${messageAt}.header`;
  const header = asRecord(message.header, headerAt);
  const meta = optionalRecord(withMeta, 'meta', at);
  const version = withMeta.version;

  return {
    signatures: readStringArray(transaction, 'signatures', txAt),
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
      accountKeys: readStringArray(message, 'accountKeys', messageAt),
      recentBlockhash: readString(message, 'recentBlockhash', messageAt),
      instructions: readArray(message, 'instructions', messageAt).map(
        (instruction, index) =>
          decodeInstruction(
            instruction,
            `${messageAt}.instructions[${index}]`,
            { withStackHeight: false },
          ),
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
      versioned: version !== undefined && version !== null && version !== 'legacy',
    },
    ...(meta !== undefined && { meta: decodeMeta(meta, `${at}.meta`) }),
  };
}

/**
 * Decodes a `getBlock` result (json encoding, full transaction details) into
 * the shared block model. The result does not carry its own slot, so the
 * requested sequence is supplied by the caller.
 */
export function decodeRpcBlock(sequence: number, result: unknown): BlockRecord {
  const at = 'result';
  const block = asRecord(result, at);
  const blockTime = readOptionalInteger(block, 'blockTime', at);
  const blockHeight = readOptionalInteger(block, 'blockHeight', at);

  return {
    sequence,
    parentSequence: readInteger(block, 'parentSlot', at),
    contentHash: readString(block, 'blockhash', at),
    previousContentHash: readString(block, 'previousBlockhash', at),
    ...(blockTime !== undefined && { blockTime }),
    ...(blockHeight !== undefined && { blockHeight }),
    rewards: decodeRewards(block, at),
    transactions: readArray(block, 'transactions', at).map(
      (transaction, index) =>
        decodeTransaction(transaction, `${at}.transactions[${index}]`),
    ),
  };
}
