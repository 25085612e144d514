import type { NormalizedQuote } from "../core/entities/quote";
import type { FetchStats } from "../application/resilience/fetchStatsTracker";
import type {
  ComparisonReport,
  SymbolComparison,
} from "../application/services/priceComparisonService";

const formatUsd = (value: number): string =>
  `$${value.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;

/**
 * Renders fetched quotes and the run's fetch statistics for terminal reading.
 */
export const formatQuoteReport = (
  quotes: readonly NormalizedQuote[],
  failures: Record<string, string>,
  stats: FetchStats,
  successRate: number,
): string => {
  const lines: string[] = [];

  lines.push("Quotes:");
  if (quotes.length === 0) {
    lines.push("- none");
  }
  quotes.forEach((quote) => {
    lines.push(
      `- ${quote.symbol} (${quote.assetClass}) ${formatUsd(quote.price)} via ${quote.provider}${quote.tradingDay ? ` on ${quote.tradingDay}` : ""}`,
    );
  });

  const failed = Object.entries(failures);
  if (failed.length > 0) {
    lines.push("");
    lines.push("Failures:");
    failed.forEach(([symbol, reason]) => lines.push(`- ${symbol}: ${reason}`));
  }

  lines.push("");
  lines.push(
    `Attempts: ${stats.totalAttempts}, primary: ${stats.primarySuccesses}, fallback: ${stats.fallbackSuccesses}, failed: ${stats.totalFailures}, retries: ${stats.retriesUsed}, success rate: ${successRate.toFixed(1)}%`,
  );

  return lines.join("\n");
};

const formatComparison = (comparison: SymbolComparison): string[] => {
  const lines: string[] = [];
  lines.push(`${comparison.symbol} (${comparison.assetClass.toUpperCase()})`);

  comparison.results.forEach((result) => {
    const price = result.price === null ? "N/A" : formatUsd(result.price);
    const status = result.price === null ? `failed: ${result.error ?? "unknown"}` : "ok";
    lines.push(
      `- ${result.provider}: ${price} on ${result.tradingDay ?? "N/A"} (${status})`,
    );
  });

  const valid = comparison.results.filter((result) => result.price !== null);
  const discrepancy = comparison.discrepancy;
  if (discrepancy) {
    lines.push(
      `  min ${formatUsd(discrepancy.min)}, max ${formatUsd(discrepancy.max)}, difference ${formatUsd(discrepancy.difference)} (${discrepancy.differencePct.toFixed(2)}%)`,
    );
    lines.push(
      discrepancy.flagged
        ? "  WARNING: price discrepancy exceeds 1%"
        : "  Prices are consistent",
    );
  } else if (valid.length === 1) {
    lines.push("  Only one source returned valid data");
  } else {
    lines.push("  No valid prices retrieved from any source");
  }

  return lines;
};

export const formatComparisonReport = (report: ComparisonReport): string => {
  const lines = report.comparisons.flatMap((comparison) => [
    ...formatComparison(comparison),
    "",
  ]);
  const { summary } = report;

  lines.push("Summary:");
  lines.push(`- symbols queried: ${summary.symbols}`);
  lines.push(`- provider queries: ${summary.queries}`);
  lines.push(`- successful: ${summary.successful}`);
  lines.push(`- failed: ${summary.failed}`);
  lines.push(`- success rate: ${summary.successRate.toFixed(1)}%`);

  return lines.join("\n");
};
