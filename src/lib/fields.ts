/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { BlockDecodeError } from './error.js';

// Narrowing readers for decoded wire objects. Missing and null values fall
// back to the protocol default; present values of the wrong type throw.

export type FieldRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is FieldRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown, path: string): FieldRecord {
  if (!isRecord(value)) {
    throw new BlockDecodeError(path, 'an object');
  }
  return value;
}

export function optionalRecord(
  obj: FieldRecord,
  key: string,
  path: string,
): FieldRecord | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return asRecord(value, `${path}.${key}`);
}

export function readString(
  obj: FieldRecord,
  key: string,
  path: string,
  fallback = '',
): string {
  const value = obj[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new BlockDecodeError(`${path}.${key}`, 'a string');
  }
  return value;
}

export function readInteger(
  obj: FieldRecord,
  key: string,
  path: string,
  fallback = 0,
): number {
  const value = obj[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw new BlockDecodeError(`${path}.${key}`, 'a safe integer');
  }
  return parsed;
}

export function readOptionalInteger(
  obj: FieldRecord,
  key: string,
  path: string,
): number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  return readInteger(obj, key, path);
}

const INTEGER_STRING = /^-?\d+$/;

/** Reads a 64-bit integer as a decimal string. */
export function readInt64(
  obj: FieldRecord,
  key: string,
  path: string,
  fallback = '0',
): string {
  const value = obj[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  return toInt64String(value, `${path}.${key}`);
}

export function toInt64String(value: unknown, path: string): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return BigInt(value).toString();
  }
  if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    return BigInt(value).toString();
  }
  throw new BlockDecodeError(path, 'a 64-bit integer');
}

export function readBoolean(
  obj: FieldRecord,
  key: string,
  path: string,
): boolean {
  const value = obj[key];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== 'boolean') {
    throw new BlockDecodeError(`${path}.${key}`, 'a boolean');
  }
  return value;
}

export function readArray(
  obj: FieldRecord,
  key: string,
  path: string,
): unknown[] {
  const value = obj[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new BlockDecodeError(`${path}.${key}`, 'an array');
  }
  return value;
}

export function readStringArray(
  obj: FieldRecord,
  key: string,
  path: string,
): string[] {
  return readArray(obj, key, path).map((entry, index) => {
    if (typeof entry !== 'string') {
      throw new BlockDecodeError(`${path}.${key}[${index}]`, 'a string');
    }
    return entry;
  });
}

export function readIntegerArray(
  obj: FieldRecord,
  key: string,
  path: string,
): number[] {
  return readArray(obj, key, path).map((entry, index) => {
    if (typeof entry !== 'number' || !Number.isSafeInteger(entry)) {
      throw new BlockDecodeError(`${path}.${key}[${index}]`, 'a safe integer');
    }
    return entry;
  });
}

export function readBytes(
  obj: FieldRecord,
  key: string,
  path: string,
): Uint8Array {
  const value = obj[key];
  if (value === undefined || value === null) {
    return new Uint8Array(0);
  }
  if (!(value instanceof Uint8Array)) {
    throw new BlockDecodeError(`${path}.${key}`, 'a byte array');
  }
  return value;
}

export function readBytesArray(
  obj: FieldRecord,
  key: string,
  path: string,
): Uint8Array[] {
  return readArray(obj, key, path).map((entry, index) => {
    if (!(entry instanceof Uint8Array)) {
      throw new BlockDecodeError(`${path}.${key}[${index}]`, 'a byte array');
    }
    return entry;
  });
}
