/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Runs an abortable operation with an upper bound on its duration. When the
 * deadline passes, the operation's signal is aborted and the returned promise
 * rejects with the error produced by `onTimeout`, whether or not the operation
 * honours the signal. A `timeoutMs` of 0 disables the deadline.
 */
export async function withDeadline<T>(
  run: (signal: AbortSignal) => Promise<T>,
  {
    timeoutMs,
    onTimeout,
  }: {
    timeoutMs: number;
    onTimeout: () => Error;
  },
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) {
    return run(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
