import type {
  ClassifiedFailure,
  FailureKind,
  ProviderError,
} from "../../core/entities/appError";

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const readErrorCode = (error: Error): string | undefined => {
  if (!("code" in error)) {
    return undefined;
  }

  return typeof error.code === "string" ? error.code : undefined;
};

const resolveKind = (error: ProviderError): FailureKind => {
  const status = error.httpStatus;

  if (error.code === "already_exists" || status === 409) {
    return "conflict";
  }

  if (error.code === "not_found" || status === 404) {
    return "not_found";
  }

  if (error.code === "rate_limited" || status === 429) {
    return "rate_limited";
  }

  if (typeof status === "number" && status >= 500) {
    return "server_error";
  }

  if (error.code === "timeout" || error.code === "transport_error") {
    return "transient_network";
  }

  if (error.code === "unknown_error") {
    return "unknown";
  }

  return "client_error";
};

/**
 * Maps a provider failure onto the retry taxonomy. Pure; the first matching rule wins.
 */
export const classifyFailure = (error: ProviderError): ClassifiedFailure => ({
  kind: resolveKind(error),
  provider: error.provider,
  message: error.message,
  httpStatus: error.httpStatus,
  error,
});

export const isRetryableFailure = (kind: FailureKind): boolean => {
  switch (kind) {
    case "transient_network":
    case "rate_limited":
    case "server_error":
      return true;
    case "client_error":
    case "not_found":
    case "conflict":
    case "unknown":
      return false;
    default: {
      const unhandled: never = kind;
      return unhandled;
    }
  }
};

/**
 * Converts an exception that escaped an adapter into a provider error so it can be classified like any other.
 */
export const toProviderError = (
  thrown: unknown,
  provider: string,
): ProviderError => {
  if (!(thrown instanceof Error)) {
    return {
      provider,
      code: "unknown_error",
      message: `Provider threw a non-error value: ${String(thrown)}`,
      cause: thrown,
    };
  }

  if (thrown.name === "AbortError" || thrown.name === "TimeoutError") {
    return {
      provider,
      code: "timeout",
      message: thrown.message || "Provider call timed out.",
      cause: thrown,
    };
  }

  const errorCode = readErrorCode(thrown);
  if (errorCode && NETWORK_ERROR_CODES.has(errorCode)) {
    return {
      provider,
      code: "transport_error",
      message: thrown.message,
      cause: thrown,
    };
  }

  return {
    provider,
    code: "unexpected_error",
    message: thrown.message,
    cause: thrown,
  };
};
