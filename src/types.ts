/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

//==============================================================================
// Block records
//==============================================================================

// 64-bit quantities (lamports, fees, compute units) are decimal strings.
// Keys, signatures and instruction data are base58, return data is base64.

export type RewardType = 'unspecified' | 'fee' | 'rent' | 'staking' | 'voting';

export interface Reward {
  pubkey: string;
  lamports: string;
  postBalance: string;
  rewardType: RewardType;
  commission?: string;
}

export interface MessageHeader {
  numRequiredSignatures: number;
  numReadonlySignedAccounts: number;
  numReadonlyUnsignedAccounts: number;
}

export interface CompiledInstruction {
  programIdIndex: number;
  accounts: number[];
  data: string;
  stackHeight?: number;
}

export interface InnerInstructions {
  index: number;
  instructions: CompiledInstruction[];
}

export interface AddressTableLookup {
  accountKey: string;
  writableIndexes: number[];
  readonlyIndexes: number[];
}

export interface TransactionMessage {
  header: MessageHeader;
  accountKeys: string[];
  recentBlockhash: string;
  instructions: CompiledInstruction[];
  addressTableLookups: AddressTableLookup[];
  versioned: boolean;
}

export interface TokenBalance {
  accountIndex: number;
  mint: string;
  owner: string;
  programId: string;
  amount: string;
  decimals: number;
}

export interface ReturnData {
  programId: string;
  data: string;
}

export interface TransactionMeta {
  failed: boolean;
  fee: string;
  preBalances: string[];
  postBalances: string[];
  innerInstructions: InnerInstructions[];
  /** Execution diagnostics, excluded from fingerprints */
  logMessages?: string[];
  preTokenBalances: TokenBalance[];
  postTokenBalances: TokenBalance[];
  rewards: Reward[];
  loadedWritableAddresses: string[];
  loadedReadonlyAddresses: string[];
  returnData?: ReturnData;
  computeUnitsConsumed?: string;
}

export interface TransactionEntry {
  signatures: string[];
  message: TransactionMessage;
  meta?: TransactionMeta;
}

export interface BlockRecord {
  sequence: number;
  parentSequence: number;
  contentHash: string;
  previousContentHash: string;
  blockTime?: number;
  blockHeight?: number;
  rewards: Reward[];
  transactions: TransactionEntry[];
}

export type CanonicalTransactionMeta = Omit<TransactionMeta, 'logMessages'>;

export interface CanonicalTransactionEntry
  extends Omit<TransactionEntry, 'meta'> {
  meta?: CanonicalTransactionMeta;
}

export interface CanonicalRecord extends Omit<BlockRecord, 'transactions'> {
  transactions: CanonicalTransactionEntry[];
}

//==============================================================================
// Sources
//==============================================================================

export type SourceLabel = 'firehose' | 'rpc_fetcher';

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface LatestBlock {
  record: BlockRecord;
  sequence: number;
}

export type SequencedBlock =
  | { skipped: false; record: BlockRecord }
  | { skipped: true };

/** Streaming source: yields the most recent block at the head of the feed. */
export interface LatestBlockSource {
  readonly label: SourceLabel;
  fetchLatest(options?: FetchOptions): Promise<LatestBlock>;
}

/** Point-fetch source: retrieves the block stored at a given sequence. */
export interface SequencedBlockSource {
  readonly label: SourceLabel;
  fetchBySequence(
    sequence: number,
    options?: FetchOptions,
  ): Promise<SequencedBlock>;
}

//==============================================================================
// Comparison and reporting
//==============================================================================

export interface ComparisonOutcome {
  sequence: number;
  fingerprintA: string;
  fingerprintB: string;
  matched: boolean;
  timestamp: Date;
}

export interface DivergenceNotification {
  sequence: number;
  fingerprintA: string;
  fingerprintB: string;
  artifactPathA: string;
  artifactPathB: string;
  timestamp: string;
}

export interface DivergenceArtifact {
  artifactPathA: string;
  artifactPathB: string;
  notification: DivergenceNotification;
  notified: boolean;
}

export interface NotificationResult {
  delivered: boolean;
}

export interface NotificationSink {
  notify(notification: DivergenceNotification): Promise<NotificationResult>;
}

export type CycleResult =
  | { status: 'matched'; sequence: number; outcome: ComparisonOutcome }
  | {
      status: 'diverged';
      sequence: number;
      outcome: ComparisonOutcome;
      artifact: DivergenceArtifact;
    }
  | { status: 'skipped'; sequence: number; reason: string }
  | { status: 'failed'; sequence?: number; error: Error };
