/**
 * Rate Limiter
 *
 * Throttles outbound calls to the model API with two limits at once:
 * a minimum spacing of 1000 / rps ms between calls, and at most `rpm`
 * calls in any sliding 60 second window.
 *
 * One instance is shared by every caller in a run. Embedding and
 * captioning draw on the same quota.
 */

import { ConfigError } from '../../errors/index.js';
import { sleep as defaultSleep, type Sleeper } from '../../utils/index.js';
import type { Throttle } from './types.js';

export const WINDOW_MS = 60_000;

export interface RateLimiterOptions {
  /** Maximum calls per second */
  rps: number;
  /** Maximum calls per minute */
  rpm: number;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
  /** Delay function (default: setTimeout-based) */
  sleep?: Sleeper;
}

export interface RateLimiterStats {
  /** Calls recorded in the current window */
  inWindow: number;
  lastCallAt: number | null;
  totalCalls: number;
  /** Total time spent waiting, in ms */
  waitedMs: number;
}

export class RateLimiter implements Throttle {
  private readonly minIntervalMs: number;
  private readonly rpm: number;
  private readonly clock: () => number;
  private readonly sleep: Sleeper;

  private lastCallAt: number | null = null;
  private window: number[] = [];
  private totalCalls = 0;
  private waitedMs = 0;

  /** Settles when the most recent acquire() has been granted */
  private tail: Promise<void> = Promise.resolve();

  constructor(options: RateLimiterOptions) {
    if (!(options.rps > 0)) {
      throw new ConfigError(`rate_limit.rps must be positive (got ${options.rps})`);
    }
    if (!Number.isInteger(options.rpm) || options.rpm < 1) {
      throw new ConfigError(`rate_limit.rpm must be a positive integer (got ${options.rpm})`);
    }

    this.minIntervalMs = 1000 / options.rps;
    this.rpm = options.rpm;
    this.clock = options.clock ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Wait until a call is permitted, then record it. Never rejects on its
   * own; concurrent callers are granted one at a time in call order.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    // The caller awaiting `turn` sees any rejection; the queue moves on
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  getStats(): RateLimiterStats {
    return {
      inWindow: this.window.length,
      lastCallAt: this.lastCallAt,
      totalCalls: this.totalCalls,
      waitedMs: this.waitedMs,
    };
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastCallAt !== null) {
      const elapsed = this.clock() - this.lastCallAt;
      if (elapsed < this.minIntervalMs) {
        await this.pause(this.minIntervalMs - elapsed);
      }
    }

    let now = this.clock();
    this.prune(now);

    while (this.window.length >= this.rpm) {
      const oldest = this.window[0] ?? now;
      await this.pause(oldest + WINDOW_MS - now);
      now = this.clock();
      this.prune(now);
    }

    this.lastCallAt = now;
    this.window.push(now);
    this.totalCalls++;
  }

  private prune(now: number): void {
    this.window = this.window.filter((timestamp) => now - timestamp < WINDOW_MS);
  }

  private async pause(ms: number): Promise<void> {
    this.waitedMs += ms;
    await this.sleep(ms);
  }
}
