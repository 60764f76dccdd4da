/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { setTimeout as sleep } from 'node:timers/promises';
import * as winston from 'winston';

import { MAX_DURATION_MS, formatDuration } from '../lib/duration.js';
import { CycleResult } from '../types.js';

export type SchedulerState = 'idle' | 'running' | 'stopping' | 'stopped';

/**
 * Drives comparison cycles on a fixed interval. Cycles never overlap: a cycle
 * that overruns its interval delays the next one, and missed ticks are not
 * replayed. Stop requests are observed between cycles only.
 */
export class ComparisonScheduler {
  // Dependencies
  private log: winston.Logger;
  private runCycle: () => Promise<CycleResult>;
  private now: () => number;

  readonly intervalMs: number;

  // State
  private currentState: SchedulerState = 'idle';
  private waitController: AbortController | undefined;
  private cyclesRun = 0;

  constructor({
    log,
    intervalMs,
    runCycle,
    now = Date.now,
  }: {
    log: winston.Logger;
    intervalMs: number;
    runCycle: () => Promise<CycleResult>;
    now?: () => number;
  }) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`interval must be positive, got ${intervalMs}`);
    }
    if (intervalMs > MAX_DURATION_MS) {
      throw new RangeError(
        `interval must not exceed ${MAX_DURATION_MS}ms, got ${intervalMs}`,
      );
    }
    this.log = log.child({ class: this.constructor.name });
    this.intervalMs = intervalMs;
    this.runCycle = runCycle;
    this.now = now;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  get cycles(): number {
    return this.cyclesRun;
  }

  async start(): Promise<void> {
    const log = this.log.child({ method: 'start' });
    if (this.currentState !== 'idle') {
      throw new Error(`scheduler cannot start from state '${this.currentState}'`);
    }

    this.currentState = 'running';
    log.info('Starting comparison cycles', {
      interval: formatDuration(this.intervalMs),
    });

    while (this.isRunning()) {
      const startedAt = this.now();
      await this.runOnce();

      if (!this.isRunning()) {
        break;
      }

      const elapsed = this.now() - startedAt;
      const delay = Math.max(this.intervalMs - elapsed, 0);
      if (delay === 0) {
        log.warn('Cycle overran interval, starting next cycle immediately', {
          elapsedMs: elapsed,
        });
      }
      await this.wait(delay);
    }

    this.currentState = 'stopped';
    log.info('Comparison cycles stopped', { cycles: this.cyclesRun });
  }

  stop(): void {
    if (this.currentState === 'idle') {
      this.currentState = 'stopped';
      return;
    }
    if (this.currentState !== 'running') {
      return;
    }

    this.log.info('Stop requested, finishing current cycle');
    this.currentState = 'stopping';
    this.waitController?.abort();
  }

  // Reads the field through a method so narrowing in start() does not
  // survive the awaits that let stop() change it
  private isRunning(): boolean {
    return this.currentState === 'running';
  }

  private async runOnce(): Promise<void> {
    this.cyclesRun++;
    try {
      const result = await this.runCycle();
      this.log.debug('Cycle finished', {
        cycle: this.cyclesRun,
        status: result.status,
      });
    } catch (error) {
      // Cycles report their own failures; anything reaching here is a defect
      this.log.error('Cycle threw unexpectedly', {
        cycle: this.cyclesRun,
        error,
      });
    }
  }

  private async wait(delayMs: number): Promise<void> {
    if (delayMs === 0) {
      return;
    }
    const controller = new AbortController();
    this.waitController = controller;
    try {
      await sleep(delayMs, undefined, { signal: controller.signal });
    } catch (error) {
      if (!controller.signal.aborted) {
        throw error;
      }
    } finally {
      this.waitController = undefined;
    }
  }
}
