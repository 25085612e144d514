import { describe, expect, it } from "vitest";
import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../core/entities/appError";
import type { NormalizedQuote } from "../../core/entities/quote";
import type { QuoteProviderPort } from "../../core/ports/inboundPorts";
import { ManualClock } from "../../__tests__/support/manualClock";
import { RateLimiter } from "../resilience/rateLimiter";
import { RetryExecutor } from "../resilience/retryExecutor";
import {
  analyzeDiscrepancy,
  PriceComparisonService,
  summarizeComparisons,
} from "./priceComparisonService";

const fixedProvider = (
  name: string,
  respond: (symbol: string) => Result<NormalizedQuote, ProviderError>,
  minIntervalMs = 0,
): QuoteProviderPort & { calls: string[] } => {
  const calls: string[] = [];
  return {
    name,
    minIntervalMs,
    calls,
    fetch: async (symbol) => {
      calls.push(symbol);
      return respond(symbol);
    },
  };
};

const priced = (name: string, price: number, tradingDay = "2026-01-02") =>
  fixedProvider(name, (symbol) =>
    ok({
      symbol,
      provider: name,
      assetClass: "stock",
      price,
      currency: "USD",
      tradingDay,
      rawPayload: {},
    }),
  );

const build = () => {
  const clock = new ManualClock();
  const service = new PriceComparisonService(
    new RetryExecutor(clock),
    new RateLimiter(clock, clock),
  );
  return { clock, service };
};

describe("analyzeDiscrepancy", () => {
  it("needs at least two prices", () => {
    expect(analyzeDiscrepancy([])).toBeNull();
    expect(analyzeDiscrepancy([100])).toBeNull();
  });

  it("flags spreads above one percent of the lowest price", () => {
    expect(analyzeDiscrepancy([200, 205])).toEqual({
      min: 200,
      max: 205,
      difference: 5,
      differencePct: 2.5,
      flagged: true,
    });
    expect(analyzeDiscrepancy([200, 202])?.flagged).toBe(false);
  });
});

describe("PriceComparisonService", () => {
  it("queries every provider once and records failures without retrying", async () => {
    const { clock, service } = build();
    const flaky = fixedProvider("flaky", () =>
      err({
        provider: "flaky",
        code: "non_success_status",
        message: "HTTP request failed with status 503.",
        httpStatus: 503,
      }),
    );

    const comparison = await service.compare({
      symbol: "aapl",
      assetClass: "stock",
      providers: [priced("alpha", 200), flaky, priced("beta", 201)],
    });

    expect(flaky.calls).toEqual(["AAPL"]);
    expect(clock.sleeps).toEqual([]);
    expect(comparison).toEqual({
      symbol: "AAPL",
      assetClass: "stock",
      results: [
        { provider: "alpha", price: 200, tradingDay: "2026-01-02" },
        {
          provider: "flaky",
          price: null,
          error: "server_error: HTTP request failed with status 503.",
        },
        { provider: "beta", price: 201, tradingDay: "2026-01-02" },
      ],
      discrepancy: {
        min: 200,
        max: 201,
        difference: 1,
        differencePct: 0.5,
        flagged: false,
      },
    });
  });

  it("paces repeated calls to the same provider", async () => {
    const { clock, service } = build();
    const slow = fixedProvider(
      "slow",
      (symbol) =>
        ok({
          symbol,
          provider: "slow",
          assetClass: "stock",
          price: 10,
          currency: "USD",
          rawPayload: {},
        }),
      2_000,
    );

    const report = await service.compareAll([
      { symbol: "AAPL", assetClass: "stock", providers: [slow] },
      { symbol: "MSFT", assetClass: "stock", providers: [slow] },
    ]);

    expect(clock.sleeps).toEqual([2_000]);
    expect(report.summary).toEqual({
      symbols: 2,
      queries: 2,
      successful: 2,
      failed: 0,
      successRate: 100,
    });
  });
});

describe("summarizeComparisons", () => {
  it("reports a zero success rate when nothing was queried", () => {
    expect(summarizeComparisons([])).toEqual({
      symbols: 0,
      queries: 0,
      successful: 0,
      failed: 0,
      successRate: 0,
    });
  });
});
