import pLimit from 'p-limit';
import { Clock, systemClock } from './clock';

export class RateLimiter {
  private limit: ReturnType<typeof pLimit>;
  private minIntervalMs: number;
  private clock: Clock;
  private lastStartedAt: number | null = null;

  constructor(minIntervalMs: number, clock: Clock = systemClock) {
    // Only one request in flight at a time, whatever the caller's concurrency
    this.limit = pLimit(1);
    this.minIntervalMs = Math.max(0, minIntervalMs);
    this.clock = clock;
  }

  /**
   * Run fn once at least minIntervalMs has passed since the previous call started.
   * The first call never waits.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    return this.limit(async () => {
      if (this.lastStartedAt !== null && this.minIntervalMs > 0) {
        const waitMs = this.lastStartedAt + this.minIntervalMs - this.clock.now();
        if (waitMs > 0) {
          await this.clock.sleep(waitMs);
        }
      }
      this.lastStartedAt = this.clock.now();
      return fn();
    });
  }

  getMinIntervalMs(): number {
    return this.minIntervalMs;
  }
}

export const createProviderRateLimiter = (politeDelaySeconds: number, clock: Clock = systemClock): RateLimiter => {
  const delaySeconds = Number.isFinite(politeDelaySeconds) && politeDelaySeconds > 0 ? politeDelaySeconds : 0;
  return new RateLimiter(Math.round(delaySeconds * 1000), clock);
};
