import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../../core/entities/appError";
import type { AssetClass, NormalizedQuote } from "../../../core/entities/quote";
import type { QuoteProviderPort } from "../../../core/ports/inboundPorts";
import { HttpJsonClient, toProviderHttpError } from "../../http/httpJsonClient";
import { tradingDayFromTimestamp } from "../utils/dateUtils";
import { isJsonObject, nonObjectPayloadError } from "../utils/payloadUtils";
import { parsePrice } from "../utils/priceUtils";

type AlphaVantageNotice = {
  Information?: string;
  Note?: string;
  "Error Message"?: string;
};

type AlphaVantageGlobalQuoteResponse = AlphaVantageNotice & {
  "Global Quote"?: {
    "01. symbol"?: string;
    "05. price"?: string;
    "07. latest trading day"?: string;
  };
};

type AlphaVantageExchangeRateResponse = AlphaVantageNotice & {
  "Realtime Currency Exchange Rate"?: {
    "1. From_Currency Code"?: string;
    "3. To_Currency Code"?: string;
    "5. Exchange Rate"?: string;
    "6. Last Refreshed"?: string;
  };
};

const PROVIDER = "alphavantage";

const RATE_LIMIT_NOTICE = /rate|frequency|limit|calls per minute/i;
const AUTH_NOTICE = /api key|unauthorized|authentication/i;

/**
 * Adapts Alpha Vantage GLOBAL_QUOTE (stocks) and CURRENCY_EXCHANGE_RATE (crypto to USD) payloads into normalized quotes.
 */
export class AlphaVantageQuoteProvider implements QuoteProviderPort {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly assetClass: AssetClass = "stock",
    readonly minIntervalMs = 12_000,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "ALPHA_VANTAGE_API_KEY is required when Alpha Vantage is a quote provider.",
      );
    }
  }

  async fetch(
    entityKey: string,
  ): Promise<Result<NormalizedQuote, ProviderError>> {
    const symbol = entityKey.trim().toUpperCase();

    return this.assetClass === "crypto"
      ? this.fetchExchangeRate(symbol)
      : this.fetchGlobalQuote(symbol);
  }

  private async fetchGlobalQuote(
    symbol: string,
  ): Promise<Result<NormalizedQuote, ProviderError>> {
    const url = new URL("/query", this.baseUrl);
    url.searchParams.set("function", "GLOBAL_QUOTE");
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("apikey", this.apiKey);

    const response =
      await this.httpClient.requestJson<AlphaVantageGlobalQuoteResponse>({
        url: url.toString(),
        method: "GET",
        timeoutMs: this.timeoutMs,
      });

    if (response.isErr()) {
      return err(toProviderHttpError(PROVIDER, response.error));
    }

    const payload = response.value;
    if (!isJsonObject(payload)) {
      return err(nonObjectPayloadError(PROVIDER, "Alpha Vantage", payload));
    }

    const notice = this.readNotice(payload);
    if (notice) {
      return err(notice);
    }

    const quote = payload["Global Quote"];
    if (!quote || Object.keys(quote).length === 0) {
      return err({
        provider: PROVIDER,
        code: "not_found",
        message: `Alpha Vantage returned no quote for ${symbol}.`,
      });
    }

    const price = parsePrice(quote["05. price"]);
    if (price === null) {
      return err({
        provider: PROVIDER,
        code: "malformed_response",
        message: `Alpha Vantage quote for ${symbol} had no usable price.`,
        cause: quote,
      });
    }

    return ok({
      symbol,
      provider: PROVIDER,
      assetClass: "stock",
      price,
      currency: "USD",
      tradingDay: tradingDayFromTimestamp(quote["07. latest trading day"]),
      rawPayload: payload,
    });
  }

  private async fetchExchangeRate(
    symbol: string,
  ): Promise<Result<NormalizedQuote, ProviderError>> {
    const url = new URL("/query", this.baseUrl);
    url.searchParams.set("function", "CURRENCY_EXCHANGE_RATE");
    url.searchParams.set("from_currency", symbol);
    url.searchParams.set("to_currency", "USD");
    url.searchParams.set("apikey", this.apiKey);

    const response =
      await this.httpClient.requestJson<AlphaVantageExchangeRateResponse>({
        url: url.toString(),
        method: "GET",
        timeoutMs: this.timeoutMs,
      });

    if (response.isErr()) {
      return err(toProviderHttpError(PROVIDER, response.error));
    }

    const payload = response.value;
    if (!isJsonObject(payload)) {
      return err(nonObjectPayloadError(PROVIDER, "Alpha Vantage", payload));
    }

    const notice = this.readNotice(payload);
    if (notice) {
      return err(notice);
    }

    const rate = payload["Realtime Currency Exchange Rate"];
    if (!rate) {
      return err({
        provider: PROVIDER,
        code: "not_found",
        message: `Alpha Vantage returned no exchange rate for ${symbol}.`,
      });
    }

    const price = parsePrice(rate["5. Exchange Rate"]);
    if (price === null) {
      return err({
        provider: PROVIDER,
        code: "malformed_response",
        message: `Alpha Vantage exchange rate for ${symbol} had no usable value.`,
        cause: rate,
      });
    }

    return ok({
      symbol,
      provider: PROVIDER,
      assetClass: "crypto",
      price,
      currency: "USD",
      tradingDay: tradingDayFromTimestamp(rate["6. Last Refreshed"]),
      rawPayload: payload,
    });
  }

  /**
   * Alpha Vantage reports quota and key problems inside a 200 body, so they are surfaced here.
   */
  private readNotice(payload: AlphaVantageNotice): ProviderError | null {
    const note = payload.Note?.trim() || payload.Information?.trim();
    if (note) {
      return {
        provider: PROVIDER,
        code: RATE_LIMIT_NOTICE.test(note) ? "rate_limited" : "provider_rejected",
        message: note,
      };
    }

    const errorMessage = payload["Error Message"]?.trim();
    if (errorMessage) {
      return {
        provider: PROVIDER,
        code: AUTH_NOTICE.test(errorMessage) ? "auth_invalid" : "provider_rejected",
        message: errorMessage,
      };
    }

    return null;
  }
}
