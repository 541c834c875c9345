export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  now?: () => number;
}

/**
 * Exponential reconnect backoff. The first failure allows an immediate
 * reconnect; after n >= 2 consecutive failures the next attempt waits
 * min(baseMs * 2^(n-2), maxMs).
 */
export class ReconnectBackoff {
  private failures = 0;
  private notBefore = 0;
  private readonly now: () => number;

  constructor(private readonly options: BackoffOptions) {
    if (options.baseMs <= 0 || options.maxMs < options.baseMs) {
      throw new RangeError("Backoff needs 0 < baseMs <= maxMs");
    }
    this.now = options.now ?? Date.now;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  delayFor(failures: number): number {
    if (failures <= 1) return 0;
    const exponent = Math.min(failures - 2, 30);
    return Math.min(this.options.baseMs * 2 ** exponent, this.options.maxMs);
  }

  recordFailure(): number {
    this.failures += 1;
    const delay = this.delayFor(this.failures);
    this.notBefore = this.now() + delay;
    return delay;
  }

  reset(): void {
    this.failures = 0;
    this.notBefore = 0;
  }

  /** Milliseconds left before another reconnect may be attempted. */
  remainingMs(): number {
    return Math.max(0, this.notBefore - this.now());
  }
}
