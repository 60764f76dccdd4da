/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { SourceLabel } from '../types.js';

interface DetailedErrorOptions {
  stack?: string;
  cause?: unknown;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON(): Record<string, unknown> {
    const { name, message, ...rest } = this;
    return {
      name,
      message,
      stack: this.stack,
      ...rest,
    };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

//
// Fatal (startup) errors
//

export class InvalidIntervalError extends DetailedError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(
      `invalid interval format: ${reason} (examples: 30s, 5m, 1h)`,
      { input },
    );
    this.input = input;
  }
}

export class StreamConnectionError extends DetailedError {
  readonly endpoint: string;

  constructor(endpoint: string, cause: unknown) {
    super(`failed to connect to Firehose at ${endpoint}: ${errorMessage(cause)}`, {
      endpoint,
      cause,
    });
    this.endpoint = endpoint;
  }
}

//
// Cycle-scoped errors
//

export class SourceFetchError extends DetailedError {
  readonly source: SourceLabel;
  readonly sequence?: number;

  constructor(
    message: string,
    {
      source,
      sequence,
      cause,
    }: { source: SourceLabel; sequence?: number; cause?: unknown },
  ) {
    super(message, { source, sequence, cause });
    this.source = source;
    this.sequence = sequence;
  }
}

export class SkippedSequenceError extends DetailedError {
  readonly source: SourceLabel;
  readonly sequence: number;

  constructor(source: SourceLabel, sequence: number) {
    super(`block ${sequence} was skipped`, { source, sequence });
    this.source = source;
    this.sequence = sequence;
  }
}

export class DeadlineExceededError extends DetailedError {
  readonly source: SourceLabel;
  readonly timeoutMs: number;

  constructor(source: SourceLabel, timeoutMs: number, sequence?: number) {
    super(`deadline exceeded after ${timeoutMs}ms fetching from ${source}`, {
      source,
      sequence,
      timeoutMs,
    });
    this.source = source;
    this.timeoutMs = timeoutMs;
  }
}

export class BlockDecodeError extends DetailedError {
  readonly path: string;

  constructor(path: string, expected: string) {
    super(`Invalid block: '${path}' must be ${expected}`, { path });
    this.path = path;
  }
}

export class FingerprintError extends DetailedError {
  readonly source: SourceLabel;

  constructor(source: SourceLabel, sequence: number, cause: unknown) {
    super(
      `failed to fingerprint ${source} block ${sequence}: ${errorMessage(cause)}`,
      { source, sequence, cause },
    );
    this.source = source;
  }
}

export class ArtifactWriteError extends DetailedError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`failed to write block artifact ${path}: ${errorMessage(cause)}`, {
      path,
      cause,
    });
    this.path = path;
  }
}
