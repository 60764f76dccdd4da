/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  BlockRecord,
  CanonicalRecord,
  CanonicalTransactionEntry,
  TransactionEntry,
} from '../types.js';

function canonicalizeTransaction(
  transaction: TransactionEntry,
): CanonicalTransactionEntry {
  if (transaction.meta === undefined) {
    return { ...transaction };
  }

  // Log output depends on the executing validator and is not block content
  const { logMessages: _logMessages, ...meta } = transaction.meta;
  return { ...transaction, meta };
}

/**
 * Returns a copy of the block with every transaction's diagnostic log removed.
 * The input record is left untouched so it can still be persisted verbatim.
 */
export function canonicalizeBlock(block: BlockRecord): CanonicalRecord {
  return {
    ...block,
    transactions: block.transactions.map(canonicalizeTransaction),
  };
}
