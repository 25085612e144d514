import { ok, type Result } from "neverthrow";
import type { ProviderError } from "../../../core/entities/appError";
import type { AssetClass, NormalizedQuote } from "../../../core/entities/quote";
import type { QuoteProviderPort } from "../../../core/ports/inboundPorts";

/**
 * Derives a stable pseudo-price from the ticker so repeated runs print the same numbers.
 */
const pseudoPrice = (symbol: string, assetClass: AssetClass): number => {
  const seed = [...symbol].reduce(
    (total, char, index) => total + char.charCodeAt(0) * (index + 1),
    0,
  );
  const base = assetClass === "crypto" ? 20_000 : 50;
  return Math.round((base + (seed % 400) * 1.25) * 100) / 100;
};

/**
 * Provides predictable quotes so the fetch pipeline can run without provider keys.
 */
export class MockQuoteProvider implements QuoteProviderPort {
  readonly name = "mock";
  readonly minIntervalMs = 0;

  constructor(
    private readonly assetClass: AssetClass = "stock",
    private readonly tradingDay = "2026-01-02",
  ) {}

  async fetch(
    entityKey: string,
  ): Promise<Result<NormalizedQuote, ProviderError>> {
    const symbol = entityKey.trim().toUpperCase();
    const price = pseudoPrice(symbol, this.assetClass);

    return ok({
      symbol,
      provider: this.name,
      assetClass: this.assetClass,
      price,
      currency: "USD",
      tradingDay: this.tradingDay,
      rawPayload: { symbol, price },
    });
  }
}
