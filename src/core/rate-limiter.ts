/**
 * Gateway Rate Limiting
 * One minimum interval between dispatches, shared by every caller and agent
 */

import { ConfigurationError } from './errors.js';
import { Clock, systemClock } from './types.js';

// ============================================================================
// CONFIG
// ============================================================================

export interface RateLimiterOptions {
  requestsPerPeriod: number;
  periodMs: number;
  clock?: Clock;
}

export interface RateLimiter {
  /** Resolves with the dispatch timestamp once a slot is free */
  acquire(): Promise<number>;
}

// ============================================================================
// INTERVAL LIMITER
// ============================================================================

/**
 * The remote API enforces a fixed cadence rather than a burst allowance, so a
 * single "last dispatch" timestamp is enough.
 *
 * Calls queue behind each other: each acquire() runs its
 * check → sleep → update only after the previous one has updated the
 * timestamp, which keeps consecutive dispatches at least minIntervalMs apart.
 */
export class IntervalRateLimiter implements RateLimiter {
  readonly minIntervalMs: number;
  private lastRequestAt: number;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly clock: Clock;

  constructor(options: RateLimiterOptions) {
    const { requestsPerPeriod, periodMs } = options;
    if (!Number.isFinite(requestsPerPeriod) || requestsPerPeriod <= 0) {
      throw new ConfigurationError(
        `requestsPerPeriod must be a positive number, got ${requestsPerPeriod}`,
        { requestsPerPeriod }
      );
    }
    if (!Number.isFinite(periodMs) || periodMs <= 0) {
      throw new ConfigurationError(
        `periodMs must be a positive number, got ${periodMs}`,
        { periodMs }
      );
    }

    this.clock = options.clock ?? systemClock;
    this.minIntervalMs = periodMs / requestsPerPeriod;
    this.lastRequestAt = this.clock.now();
  }

  acquire(): Promise<number> {
    const slot = this.tail.then(() => this.takeSlot());
    // A failed sleep must not wedge everyone queued behind it
    this.tail = slot.catch(() => undefined);
    return slot;
  }

  private async takeSlot(): Promise<number> {
    // Timers may fire early against the wall clock, so re-check after waking
    let elapsed: number;
    while ((elapsed = this.clock.now() - this.lastRequestAt) < this.minIntervalMs) {
      await this.clock.sleep(Math.ceil(this.minIntervalMs - elapsed));
    }
    this.lastRequestAt = this.clock.now();
    return this.lastRequestAt;
  }
}
