/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { InvalidIntervalError } from './error.js';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

// Largest delay a Node.js timer honours; longer ones fire after 1ms
export const MAX_DURATION_MS = 2 ** 31 - 1;

const COMPONENT_PATTERN = /(\d+(?:\.\d*)?|\.\d+)(ms|h|m|s)/y;

/**
 * Parses a duration such as '30s', '5m', '1h30m' or '1.5h' into milliseconds.
 * Components may repeat and appear in any order; the total must be positive
 * and fit in a timer delay.
 */
export function parseDuration(input: string): number {
  const trimmed = input.trim();
  if (trimmed === '') {
    throw new InvalidIntervalError(input, 'empty duration');
  }

  let totalMs = 0;
  COMPONENT_PATTERN.lastIndex = 0;
  while (COMPONENT_PATTERN.lastIndex < trimmed.length) {
    const position = COMPONENT_PATTERN.lastIndex;
    const match = COMPONENT_PATTERN.exec(trimmed);
    if (match === null) {
      throw new InvalidIntervalError(
        input,
        `unexpected '${trimmed.slice(position)}' in duration '${trimmed}'`,
      );
    }
    const [, amount, unit] = match;
    totalMs += Number(amount) * UNIT_MS[unit];
  }

  totalMs = Math.round(totalMs);
  if (totalMs <= 0) {
    throw new InvalidIntervalError(
      input,
      `duration '${trimmed}' must be greater than zero`,
    );
  }

  if (totalMs > MAX_DURATION_MS) {
    throw new InvalidIntervalError(
      input,
      `duration '${trimmed}' exceeds the maximum of ${formatDuration(MAX_DURATION_MS)}`,
    );
  }

  return totalMs;
}

export function formatDuration(ms: number): string {
  const parts: string[] = [];
  let remaining = ms;
  for (const unit of ['h', 'm', 's'] as const) {
    const size = UNIT_MS[unit];
    if (remaining >= size) {
      const count = Math.floor(remaining / size);
      parts.push(`${count}${unit}`);
      remaining -= count * size;
    }
  }
  if (remaining > 0 || parts.length === 0) {
    parts.push(`${remaining}ms`);
  }
  return parts.join('');
}
