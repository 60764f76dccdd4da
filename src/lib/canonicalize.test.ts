/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';

import { stubBlockRecord } from '../../test/stubs.js';
import { canonicalizeBlock } from './canonicalize.js';

describe('canonicalizeBlock', () => {
  it('should remove log messages from every transaction', () => {
    const block = stubBlockRecord(10);

    const canonical = canonicalizeBlock(block);

    assert.equal(canonical.transactions.length, 1);
    assert.equal(
      canonical.transactions[0].meta !== undefined &&
        'logMessages' in canonical.transactions[0].meta,
      false,
    );
    assert.equal(canonical.transactions[0].meta?.fee, '5000');
  });

  it('should not modify the input record', () => {
    const block = stubBlockRecord(10);
    const before = structuredClone(block);

    canonicalizeBlock(block);

    assert.deepEqual(block, before);
    assert.deepEqual(block.transactions[0].meta?.logMessages, [
      'Program log: hello',
    ]);
  });

  it('should keep transactions without metadata unchanged', () => {
    const [transaction] = stubBlockRecord(10).transactions;
    const { meta: _meta, ...withoutMeta } = transaction;
    const block = stubBlockRecord(10, { transactions: [withoutMeta] });

    const canonical = canonicalizeBlock(block);

    assert.deepEqual(canonical.transactions, [withoutMeta]);
  });

  it('should produce equal output for records differing only in logs', () => {
    const a = stubBlockRecord(10);
    const b = stubBlockRecord(10);
    const [txB] = b.transactions;
    if (txB.meta !== undefined) {
      txB.meta.logMessages = ['Program log: something else'];
    }

    assert.deepEqual(canonicalizeBlock(a), canonicalizeBlock(b));
  });
});
