/*
 * PACKAGE.broker
 * Copyright (C) 2025 Åukasz Bajsarowicz
 * Licensed under AGPL-3.0
 */

// Fixed-interval refresh driver

import { ConfigError, toError } from '../errors';
import type { SyncResult } from '../mirror/types';
import { getLogger, type Logger } from '../utils/logger';

export interface Refreshable {
  refresh(): Promise<SyncResult>;
}

export interface SyncTask {
  intervalSeconds: number;
  nextRunAt: Date;
}

// Longest delay a Node.js timer accepts; larger values fire after 1 ms
const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export interface SyncSchedulerOptions {
  /** Time between the starts of two refresh attempts */
  intervalSeconds: number;
  /** Fire the first tick at start() instead of one interval later */
  runImmediately?: boolean;
  logger?: Logger;
  now?: () => number;
}

/**
 * Invokes `refresh()` on a fixed wall-clock cadence.
 *
 * Tick n is due at `startedAt + n * interval`, regardless of how long earlier
 * refreshes took. A tick that fires while a refresh is still running is skipped,
 * so at most one refresh is ever in flight. Failures are retried by the next tick.
 */
export class SyncScheduler {
  private readonly target: Refreshable;
  private readonly intervalMs: number;
  private readonly intervalSeconds: number;
  private readonly runImmediately: boolean;
  private readonly logger: Logger;
  private readonly now: () => number;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private anchor = 0;
  private tickIndex = 0;
  private nextRunAt: number | null = null;
  private skippedTicks = 0;

  constructor(target: Refreshable, options: SyncSchedulerOptions) {
    if (!Number.isFinite(options.intervalSeconds) || options.intervalSeconds <= 0) {
      throw new ConfigError(`Update interval must be a positive number of seconds, got ${options.intervalSeconds}`);
    }
    this.target = target;
    this.intervalSeconds = options.intervalSeconds;
    this.intervalMs = options.intervalSeconds * 1000;
    this.runImmediately = options.runImmediately ?? false;
    this.logger = options.logger ?? getLogger();
    this.now = options.now ?? (() => Date.now());
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.anchor = this.now();
    this.tickIndex = this.runImmediately ? 0 : 1;
    this.logger.info('Sync scheduler started', { intervalSeconds: this.intervalSeconds });
    this.scheduleNext();
  }

  /**
   * Cancel future ticks and wait for a running refresh to finish
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.nextRunAt = null;
      this.logger.info('Sync scheduler stopped');
    }
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  getTask(): SyncTask | null {
    if (this.nextRunAt === null) {
      return null;
    }
    return { intervalSeconds: this.intervalSeconds, nextRunAt: new Date(this.nextRunAt) };
  }

  getSkippedTicks(): number {
    return this.skippedTicks;
  }

  private scheduleNext(): void {
    const now = this.now();
    let dueAt = this.anchor + this.tickIndex * this.intervalMs;

    // The event loop stalled past one or more boundaries: resume on the grid
    if (dueAt < now) {
      const missed = Math.ceil((now - dueAt) / this.intervalMs);
      this.tickIndex += missed;
      this.skippedTicks += missed;
      dueAt += missed * this.intervalMs;
      this.logger.warn('Sync ticks missed', { missed });
    }

    this.nextRunAt = dueAt;
    this.arm(dueAt);
  }

  /**
   * Wake up at `dueAt`, sleeping in several steps when it is further away than one timer can wait
   */
  private arm(dueAt: number): void {
    const delay = dueAt - this.now();
    if (delay > MAX_TIMER_DELAY_MS) {
      this.timer = setTimeout(() => this.arm(dueAt), MAX_TIMER_DELAY_MS);
      return;
    }
    this.timer = setTimeout(() => this.onTick(), Math.max(delay, 0));
  }

  private onTick(): void {
    this.tickIndex += 1;
    this.scheduleNext();

    if (this.inFlight) {
      this.skippedTicks += 1;
      this.logger.debug('Refresh still running, skipping sync tick');
      return;
    }

    this.inFlight = this.runRefresh().finally(() => {
      this.inFlight = null;
    });
  }

  private async runRefresh(): Promise<void> {
    const startedAt = this.now();
    try {
      const result = await this.target.refresh();
      const durationMs = this.now() - startedAt;
      if (result.success) {
        this.logger.info('Sync completed', {
          revision: result.revision,
          changed: result.changed,
          durationMs,
        });
      } else {
        this.logger.warn('Sync failed, retrying on next tick', {
          error: result.error,
          durationMs,
          nextRunAt: this.getTask()?.nextRunAt.toISOString(),
        });
      }
    } catch (error) {
      this.logger.error('Sync tick failed unexpectedly', {}, toError(error));
    }
  }
}
