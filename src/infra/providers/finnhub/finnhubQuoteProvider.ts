import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../../core/entities/appError";
import type { AssetClass, NormalizedQuote } from "../../../core/entities/quote";
import type { QuoteProviderPort } from "../../../core/ports/inboundPorts";
import { HttpJsonClient, toProviderHttpError } from "../../http/httpJsonClient";
import { toIsoDate } from "../utils/dateUtils";
import { isJsonObject, nonObjectPayloadError } from "../utils/payloadUtils";
import { parsePrice } from "../utils/priceUtils";

type FinnhubQuoteResponse = {
  c?: number;
  d?: number | null;
  dp?: number | null;
  h?: number;
  l?: number;
  o?: number;
  pc?: number;
  t?: number;
  error?: string;
};

const PROVIDER = "finnhub";

/**
 * Maps a plain crypto ticker onto the Binance USDT pair Finnhub quotes it under.
 */
export const toFinnhubSymbol = (
  symbol: string,
  assetClass: AssetClass,
): string =>
  assetClass === "crypto" ? `BINANCE:${symbol}USDT` : symbol;

/**
 * Translates Finnhub /quote payloads into normalized quotes.
 */
export class FinnhubQuoteProvider implements QuoteProviderPort {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly assetClass: AssetClass = "stock",
    readonly minIntervalMs = 1_300,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "FINNHUB_API_KEY is required when Finnhub is a quote provider.",
      );
    }
  }

  async fetch(
    entityKey: string,
  ): Promise<Result<NormalizedQuote, ProviderError>> {
    const symbol = entityKey.trim().toUpperCase();

    const url = new URL("/api/v1/quote", this.baseUrl);
    url.searchParams.set("symbol", toFinnhubSymbol(symbol, this.assetClass));
    url.searchParams.set("token", this.apiKey);

    const response = await this.httpClient.requestJson<FinnhubQuoteResponse>({
      url: url.toString(),
      method: "GET",
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(toProviderHttpError(PROVIDER, response.error));
    }

    const payload = response.value;
    if (!isJsonObject(payload)) {
      return err(nonObjectPayloadError(PROVIDER, "Finnhub", payload));
    }

    if (payload.error) {
      return err({
        provider: PROVIDER,
        code: "provider_rejected",
        message: payload.error,
      });
    }

    // Unknown symbols come back as 200 with every field zeroed
    if (payload.c === undefined || payload.c === 0) {
      return err({
        provider: PROVIDER,
        code: "not_found",
        message: `Finnhub returned no quote for ${symbol}.`,
      });
    }

    const price = parsePrice(payload.c);
    if (price === null) {
      return err({
        provider: PROVIDER,
        code: "malformed_response",
        message: `Finnhub quote for ${symbol} had no usable price.`,
        cause: payload,
      });
    }

    return ok({
      symbol,
      provider: PROVIDER,
      assetClass: this.assetClass,
      price,
      currency: "USD",
      tradingDay:
        typeof payload.t === "number" && payload.t > 0
          ? toIsoDate(new Date(payload.t * 1000))
          : undefined,
      rawPayload: payload,
    });
  }
}
