import { CancelledError } from '../core/errors';
import { Clock, RandomSource, randomBetween, systemClock } from './timing';

export const MIN_INTERVAL_FLOOR_MS = 300;

export interface RatePolicy {
  minIntervalMs: number;
  jitterMs: readonly [number, number];
}

export const policyFromRpm = (requestsPerMinute: number, jitterMs: readonly [number, number] = [500, 1500]): RatePolicy => ({
  minIntervalMs: 60_000 / requestsPerMinute,
  jitterMs,
});

export const policyFromDelayRange = (delayRangeMs: readonly [number, number]): RatePolicy => ({
  minIntervalMs: delayRangeMs[0],
  jitterMs: [0, delayRangeMs[1] - delayRangeMs[0]],
});

/**
 * Paces requests for one source. Waiters are served in arrival order, so
 * concurrent callers for the same source can never skip the interval.
 */
export class RateLimiter {
  private last: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly name: string,
    private readonly policy: RatePolicy,
    private readonly clock: Clock = systemClock,
    private readonly random: RandomSource = Math.random,
  ) {}

  get lastRequestAt(): number | null {
    return this.last;
  }

  acquireSlot(signal?: AbortSignal): Promise<void> {
    const turn = this.tail.then(() => this.waitTurn(signal));
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private nextInterval(): number {
    return Math.max(MIN_INTERVAL_FLOOR_MS, this.policy.minIntervalMs + randomBetween(this.policy.jitterMs, this.random));
  }

  private async waitTurn(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    if (this.last !== null) {
      const elapsed = this.clock.now() - this.last;
      const interval = this.nextInterval();
      if (elapsed < interval) {
        await this.clock.sleep(interval - elapsed, signal);
      }
    }
    this.last = this.clock.now();
  }
}

export class RateLimiterRegistry {
  private readonly limiters = new Map<string, RateLimiter>();

  constructor(
    private readonly policyFor: (name: string) => RatePolicy,
    private readonly clock: Clock = systemClock,
    private readonly random: RandomSource = Math.random,
  ) {}

  forSource(name: string): RateLimiter {
    let limiter = this.limiters.get(name);
    if (!limiter) {
      limiter = new RateLimiter(name, this.policyFor(name), this.clock, this.random);
      this.limiters.set(name, limiter);
    }
    return limiter;
  }
}
