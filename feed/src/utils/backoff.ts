export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  jitter: boolean;
}

/**
 * Delay to wait after failed attempt `attempt` (1-based): base doubled per attempt,
 * capped at maxMs, then scaled by a factor in [0.8, 1.2) when jitter is on.
 */
export function computeBackoffDelay(attempt: number, options: BackoffOptions, random: () => number = Math.random): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(options.baseMs * Math.pow(2, exponent), options.maxMs);

  if (!options.jitter) {
    return delay;
  }

  return Math.round(delay * (0.8 + 0.4 * random()));
}
