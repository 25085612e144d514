import type { AssetClass } from "../../core/entities/quote";
import type { QuoteProviderPort } from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";
import type { RateLimiter } from "../resilience/rateLimiter";
import type { RetryExecutor } from "../resilience/retryExecutor";
import { createRetryPolicy } from "../resilience/retryPolicy";

export const DISCREPANCY_THRESHOLD_PCT = 1;

export type ProviderQuoteResult = {
  provider: string;
  price: number | null;
  tradingDay?: string;
  error?: string;
};

export type PriceDiscrepancy = {
  min: number;
  max: number;
  difference: number;
  differencePct: number;
  flagged: boolean;
};

export type SymbolComparison = {
  symbol: string;
  assetClass: AssetClass;
  results: ProviderQuoteResult[];
  /** Present only when at least two providers returned a price. */
  discrepancy: PriceDiscrepancy | null;
};

export type ComparisonRequest = {
  symbol: string;
  assetClass: AssetClass;
  providers: readonly QuoteProviderPort[];
};

export type ComparisonSummary = {
  symbols: number;
  queries: number;
  successful: number;
  failed: number;
  successRate: number;
};

export type ComparisonReport = {
  comparisons: SymbolComparison[];
  summary: ComparisonSummary;
};

const SINGLE_ATTEMPT = createRetryPolicy({ maxRetries: 0 });

export const analyzeDiscrepancy = (
  prices: readonly number[],
): PriceDiscrepancy | null => {
  if (prices.length < 2) {
    return null;
  }

  const min = Math.min(...prices);
  const max = Math.max(...prices);
  const difference = max - min;
  const differencePct = min > 0 ? (difference * 100) / min : 0;

  return {
    min,
    max,
    difference,
    differencePct,
    flagged: differencePct > DISCREPANCY_THRESHOLD_PCT,
  };
};

export const summarizeComparisons = (
  comparisons: readonly SymbolComparison[],
): ComparisonSummary => {
  const results = comparisons.flatMap((comparison) => comparison.results);
  const successful = results.filter((result) => result.price !== null).length;

  return {
    symbols: comparisons.length,
    queries: results.length,
    successful,
    failed: results.length - successful,
    successRate:
      results.length === 0 ? 0 : (successful * 100) / results.length,
  };
};

/**
 * Asks every configured provider for the same symbol once and reports how far their prices disagree.
 * A failed provider is recorded, never retried; pacing still goes through the shared rate limiter.
 */
export class PriceComparisonService {
  constructor(
    private readonly executor: RetryExecutor,
    private readonly rateLimiter: RateLimiter,
  ) {}

  async compare(request: ComparisonRequest): Promise<SymbolComparison> {
    const symbol = request.symbol.toUpperCase();
    const results: ProviderQuoteResult[] = [];

    for (const provider of request.providers) {
      const outcome = await this.executor.execute(
        async () => {
          await this.rateLimiter.waitIfNeeded(
            provider.name,
            provider.minIntervalMs,
          );
          return provider.fetch(symbol);
        },
        SINGLE_ATTEMPT,
        { entityKey: symbol, provider: provider.name },
      );

      switch (outcome.status) {
        case "success":
          results.push({
            provider: provider.name,
            price: outcome.value.price,
            tradingDay: outcome.value.tradingDay,
          });
          break;
        case "exists":
          results.push({
            provider: provider.name,
            price: null,
            error: outcome.error.message,
          });
          break;
        case "failure":
          results.push({
            provider: provider.name,
            price: null,
            error: `${outcome.failure.kind}: ${outcome.failure.message}`,
          });
          break;
      }
    }

    const discrepancy = analyzeDiscrepancy(
      results.flatMap((result) => (result.price === null ? [] : [result.price])),
    );

    if (discrepancy?.flagged) {
      logger.warn(
        { symbol, ...discrepancy },
        "Provider prices disagree by more than the threshold",
      );
    }

    return { symbol, assetClass: request.assetClass, results, discrepancy };
  }

  async compareAll(
    requests: readonly ComparisonRequest[],
  ): Promise<ComparisonReport> {
    const comparisons: SymbolComparison[] = [];

    for (const request of requests) {
      comparisons.push(await this.compare(request));
    }

    return { comparisons, summary: summarizeComparisons(comparisons) };
  }
}
