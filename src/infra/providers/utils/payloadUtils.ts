import type { ProviderError } from "../../../core/entities/appError";

/**
 * A parsed body can still be `null`, a number or an array; only an object carries the fields an adapter reads.
 */
export const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const nonObjectPayloadError = (
  provider: string,
  label: string,
  payload: unknown,
): ProviderError => ({
  provider,
  code: "malformed_response",
  message: `${label} response body was not a JSON object.`,
  cause: payload,
});
