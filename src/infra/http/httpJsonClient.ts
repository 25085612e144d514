import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../core/entities/appError";

type HttpMethod = "GET" | "POST";

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
};

export type HttpClientError = {
  code:
    | "timeout"
    | "transport_error"
    | "non_success_status"
    | "empty_response"
    | "invalid_json";
  message: string;
  httpStatus?: number;
  cause?: unknown;
};

const MAX_ERROR_BODY_LENGTH = 200;

const isAbortError = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === "AbortError" || error.name === "TimeoutError");

/**
 * Tags an HTTP failure with the adapter that saw it.
 */
export const toProviderHttpError = (
  provider: string,
  error: HttpClientError,
): ProviderError => ({
  provider,
  code: error.code,
  message: error.message,
  httpStatus: error.httpStatus,
  cause: error.cause,
});

/**
 * Centralizes HTTP JSON IO so adapters share one timeout and status-parsing policy.
 * Performs exactly one request; retrying is the caller's decision.
 */
export class HttpJsonClient {
  async requestJson<T>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        const detail = text.trim().slice(0, MAX_ERROR_BODY_LENGTH);

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          cause: detail || undefined,
        });
      }

      if (!text.trim()) {
        return err({
          code: "empty_response",
          message: "HTTP response body was empty.",
          httpStatus: response.status,
        });
      }

      try {
        return ok(JSON.parse(text) as T);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          httpStatus: response.status,
          cause: jsonError,
        });
      }
    } catch (error) {
      if (isAbortError(error)) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
