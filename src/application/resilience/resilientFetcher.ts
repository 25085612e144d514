import type { ClassifiedFailure } from "../../core/entities/appError";
import type { ProviderAdapter } from "../../core/ports/inboundPorts";
import type { SleepPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { classifyFailure } from "./failureClassifier";
import { FetchStatsTracker, type FetchStats } from "./fetchStatsTracker";
import { RateLimiter } from "./rateLimiter";
import { RetryExecutor, settleOperation } from "./retryExecutor";
import { withMinDelay, type RetryPolicy } from "./retryPolicy";

export const EXHAUSTED_REASON = "All sources exhausted";

export type FetchRequest<T> = Readonly<{
  entityKey: string;
  primary: ProviderAdapter<T>;
  fallback?: ProviderAdapter<T>;
  /** Also the floor added to every backoff delay for this entity. */
  rateLimitDelayMs?: number;
}>;

export type BatchFetchRequest<T> = Readonly<{
  entityKeys: readonly string[];
  primary: ProviderAdapter<T>;
  fallback?: ProviderAdapter<T>;
  /** Pause between consecutive entities. */
  rateLimitDelayMs?: number;
  continueOnFailure?: boolean;
}>;

/** Per-entity terminal state; `exists` is success-like and never counts as a failure. */
export type EntityOutcome<T> =
  | { status: "success"; value: T }
  | { status: "exists" }
  | { status: "failed"; reason: string };

const describeFailure = (failure: ClassifiedFailure): string =>
  `${EXHAUSTED_REASON} (${failure.kind}: ${failure.message})`;

/**
 * Fetches per-entity data from a primary provider with bounded retries and a single fallback attempt.
 * Calls are strictly sequential; the stats tracker belongs to this instance alone.
 */
export class ResilientFetcher {
  private readonly executor: RetryExecutor;
  private readonly tracker = new FetchStatsTracker();

  constructor(
    private readonly policy: RetryPolicy,
    private readonly rateLimiter: RateLimiter,
    private readonly sleeper: SleepPort,
  ) {
    this.executor = new RetryExecutor(sleeper);
  }

  /**
   * Resolves to the provider value, or `null` once every source is exhausted or the resource already exists;
   * it never rejects. Use `fetchEntity` to tell those two apart.
   */
  async fetchWithRetry<T extends object>(
    request: FetchRequest<T>,
  ): Promise<T | null> {
    const outcome = await this.fetchEntity(request);
    return outcome.status === "success" ? outcome.value : null;
  }

  async fetchEntity<T extends object>(
    request: FetchRequest<T>,
  ): Promise<EntityOutcome<T>> {
    const { entityKey, primary, fallback } = request;
    this.tracker.recordAttempt();

    const policy = withMinDelay(this.policy, request.rateLimitDelayMs ?? 0);
    const outcome = await this.executor.execute(
      () => this.callProvider(primary, entityKey),
      policy,
      { entityKey, provider: primary.name },
    );

    if (outcome.status === "success") {
      const retries = outcome.attempts - 1;
      this.tracker.recordPrimarySuccess(retries);
      if (retries > 0) {
        logger.info(
          { entityKey, provider: primary.name, attempts: outcome.attempts },
          "Primary provider succeeded after retry",
        );
      }
      return { status: "success", value: outcome.value };
    }

    if (outcome.status === "exists") {
      logger.info(
        { entityKey, provider: primary.name },
        "Provider reported the resource already exists",
      );
      return { status: "exists" };
    }

    let lastFailure = outcome.failure;

    if (fallback) {
      logger.info(
        { entityKey, primary: primary.name, fallback: fallback.name },
        "Trying fallback provider",
      );

      const result = await settleOperation(
        () => this.callProvider(fallback, entityKey),
        fallback.name,
      );

      if (result.isOk()) {
        this.tracker.recordFallbackSuccess();
        logger.info(
          { entityKey, provider: fallback.name },
          "Fallback provider succeeded",
        );
        return { status: "success", value: result.value };
      }

      lastFailure = classifyFailure(result.error);
      if (lastFailure.kind === "conflict") {
        logger.info(
          { entityKey, provider: fallback.name },
          "Provider reported the resource already exists",
        );
        return { status: "exists" };
      }

      logger.warn(
        {
          entityKey,
          provider: fallback.name,
          kind: lastFailure.kind,
          httpStatus: lastFailure.httpStatus,
          reason: lastFailure.message,
        },
        "Fallback provider failed",
      );
    }

    const reason = describeFailure(lastFailure);
    this.tracker.recordFailure(entityKey, reason);
    logger.error(
      { entityKey, provider: lastFailure.provider, reason },
      "Entity fetch failed",
    );
    return { status: "failed", reason };
  }

  /**
   * Processes keys in input order and returns successes only; failures are read back through `getFailures`.
   * Only a failed entity stops a batch with `continueOnFailure: false`.
   */
  async fetchBatch<T extends object>(
    request: BatchFetchRequest<T>,
  ): Promise<Map<string, T>> {
    const results = new Map<string, T>();
    const delayMs = request.rateLimitDelayMs ?? 0;
    const continueOnFailure = request.continueOnFailure ?? true;

    for (const [index, entityKey] of request.entityKeys.entries()) {
      if (index > 0 && delayMs > 0) {
        await this.sleeper.sleep(delayMs);
      }

      const outcome = await this.fetchEntity({
        entityKey,
        primary: request.primary,
        fallback: request.fallback,
        rateLimitDelayMs: delayMs,
      });

      if (outcome.status === "success") {
        results.set(entityKey, outcome.value);
        continue;
      }

      if (outcome.status === "failed" && !continueOnFailure) {
        logger.error(
          {
            entityKey,
            processed: index + 1,
            skipped: request.entityKeys.length - index - 1,
          },
          "Aborting batch after entity failure",
        );
        break;
      }
    }

    return results;
  }

  getFailures(): Record<string, string> {
    return this.tracker.failureMap();
  }

  hasFailures(): boolean {
    return this.tracker.failureCount() > 0;
  }

  getFailureCount(): number {
    return this.tracker.failureCount();
  }

  getStats(): FetchStats {
    return this.tracker.snapshot();
  }

  getSuccessRate(): number {
    return this.tracker.successRate();
  }

  reset(): void {
    this.tracker.reset();
  }

  logSummary(): void {
    const stats = this.tracker.snapshot();

    logger.info(
      { ...stats, successRate: Number(this.getSuccessRate().toFixed(1)) },
      "Fetch summary",
    );

    if (this.hasFailures()) {
      logger.warn(
        { failedEntities: Object.keys(this.getFailures()) },
        "Fetch summary: failed entities",
      );
    }
  }

  private async callProvider<T>(provider: ProviderAdapter<T>, entityKey: string) {
    await this.rateLimiter.waitIfNeeded(provider.name, provider.minIntervalMs);
    return provider.fetch(entityKey);
  }
}
