import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../../core/entities/appError";
import type { NormalizedQuote } from "../../../core/entities/quote";
import type { QuoteProviderPort } from "../../../core/ports/inboundPorts";
import { HttpJsonClient, toProviderHttpError } from "../../http/httpJsonClient";
import { tradingDayFromTimestamp } from "../utils/dateUtils";
import { isJsonObject, nonObjectPayloadError } from "../utils/payloadUtils";
import { parsePrice } from "../utils/priceUtils";

type MarketstackEodRow = {
  symbol?: string;
  close?: number;
  date?: string;
};

type MarketstackEodResponse = {
  data?: MarketstackEodRow[];
  error?: { code?: string; message?: string };
};

const PROVIDER = "marketstack";

/**
 * Reads the latest end-of-day close from Marketstack; stocks only.
 */
export class MarketstackQuoteProvider implements QuoteProviderPort {
  readonly name = PROVIDER;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    readonly minIntervalMs = 2_000,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "MARKETSTACK_API_KEY is required when Marketstack is a quote provider.",
      );
    }
  }

  async fetch(
    entityKey: string,
  ): Promise<Result<NormalizedQuote, ProviderError>> {
    const symbol = entityKey.trim().toUpperCase();

    const url = new URL("/v1/eod/latest", this.baseUrl);
    url.searchParams.set("access_key", this.apiKey);
    url.searchParams.set("symbols", symbol);

    const response = await this.httpClient.requestJson<MarketstackEodResponse>(
      {
        url: url.toString(),
        method: "GET",
        timeoutMs: this.timeoutMs,
      },
    );

    if (response.isErr()) {
      return err(toProviderHttpError(PROVIDER, response.error));
    }

    const payload = response.value;
    if (!isJsonObject(payload)) {
      return err(nonObjectPayloadError(PROVIDER, "Marketstack", payload));
    }

    if (payload.error) {
      return err({
        provider: PROVIDER,
        code: "provider_rejected",
        message:
          payload.error.message?.trim() ||
          `Marketstack rejected the request (${payload.error.code ?? "unknown"}).`,
      });
    }

    const row = payload.data?.[0];
    if (!row) {
      return err({
        provider: PROVIDER,
        code: "not_found",
        message: `Marketstack returned no end-of-day data for ${symbol}.`,
      });
    }

    const price = parsePrice(row.close);
    if (price === null) {
      return err({
        provider: PROVIDER,
        code: "malformed_response",
        message: `Marketstack row for ${symbol} had no usable close.`,
        cause: row,
      });
    }

    return ok({
      symbol,
      provider: PROVIDER,
      assetClass: "stock",
      price,
      currency: "USD",
      tradingDay: tradingDayFromTimestamp(row.date),
      rawPayload: payload,
    });
  }
}
