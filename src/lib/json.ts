/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { isInteger, isSafeNumber, parse } from 'lossless-json';

// Integers beyond 2^53 become bigint; every other number stays a number
const parseNumber = (value: string): number | bigint =>
  isInteger(value) && !isSafeNumber(value) ? BigInt(value) : parseFloat(value);

/**
 * Parses JSON text keeping the exact digits of integers that do not fit in a
 * double, such as u64 lamport balances.
 */
export function parseJsonLossless(text: string): unknown {
  return parse(text, null, parseNumber);
}
