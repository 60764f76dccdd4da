/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { canonicalize } from 'json-canonicalize';
import { createHash } from 'node:crypto';

import { BlockRecord, CanonicalRecord } from '../types.js';
import { canonicalizeBlock } from './canonicalize.js';

/**
 * Serializes a canonical record as RFC 8785 JSON (sorted keys, no
 * insignificant whitespace) so equal content always yields equal bytes.
 */
export function serializeCanonical(record: CanonicalRecord): Buffer {
  return Buffer.from(canonicalize(record), 'utf8');
}

export function sha256Hex(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

export function fingerprintCanonical(record: CanonicalRecord): string {
  return sha256Hex(serializeCanonical(record));
}

export function fingerprintBlock(block: BlockRecord): string {
  return fingerprintCanonical(canonicalizeBlock(block));
}
