export type FetchStats = {
  totalAttempts: number;
  primarySuccesses: number;
  fallbackSuccesses: number;
  totalFailures: number;
  retriesUsed: number;
};

const emptyStats = (): FetchStats => ({
  totalAttempts: 0,
  primarySuccesses: 0,
  fallbackSuccesses: 0,
  totalFailures: 0,
  retriesUsed: 0,
});

/**
 * Accumulates per-entity outcomes for one fetcher; counters only grow until `reset`.
 */
export class FetchStatsTracker {
  private stats: FetchStats = emptyStats();
  private readonly failures = new Map<string, string>();

  recordAttempt(): void {
    this.stats.totalAttempts += 1;
  }

  /**
   * Retries are tallied only here, so exhausted-then-fallback and exhausted-then-failed entities add none.
   */
  recordPrimarySuccess(retries: number): void {
    this.stats.primarySuccesses += 1;
    this.stats.retriesUsed += retries;
  }

  recordFallbackSuccess(): void {
    this.stats.fallbackSuccesses += 1;
  }

  recordFailure(entityKey: string, reason: string): void {
    this.failures.set(entityKey, reason);
    this.stats.totalFailures += 1;
  }

  snapshot(): FetchStats {
    return { ...this.stats };
  }

  failureMap(): Record<string, string> {
    return Object.fromEntries(this.failures);
  }

  failureCount(): number {
    return this.failures.size;
  }

  /**
   * Percentage of attempts that produced data; 100 when nothing was attempted.
   */
  successRate(): number {
    if (this.stats.totalAttempts === 0) {
      return 100;
    }

    const successes = this.stats.primarySuccesses + this.stats.fallbackSuccesses;
    return (successes / this.stats.totalAttempts) * 100;
  }

  reset(): void {
    this.stats = emptyStats();
    this.failures.clear();
  }
}
