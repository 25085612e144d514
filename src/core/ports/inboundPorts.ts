import type { Result } from "neverthrow";
import type { ProviderError } from "../entities/appError";
import type { DeliveryReceipt } from "../entities/subscriber";
import type { NormalizedQuote } from "../entities/quote";

/**
 * Normalizes one external source behind a single call; retry and pacing stay with the caller.
 */
export interface ProviderAdapter<T> {
  /** Rate-limiter key and log label. */
  readonly name: string;
  /** Minimum spacing between two calls to this provider. */
  readonly minIntervalMs: number;
  fetch(entityKey: string): Promise<Result<T, ProviderError>>;
}

export type QuoteProviderPort = ProviderAdapter<NormalizedQuote>;

export type DeliveryProviderPort = ProviderAdapter<DeliveryReceipt>;
