/**
 * Describes canonical error codes adapters attach at provider boundaries.
 */
export type ProviderErrorCode =
  | "timeout"
  | "transport_error"
  | "non_success_status"
  | "invalid_json"
  | "empty_response"
  | "malformed_response"
  | "rate_limited"
  | "provider_rejected"
  | "auth_invalid"
  | "not_found"
  | "already_exists"
  | "unexpected_error"
  | "unknown_error";

/**
 * Describes a provider failure while preserving adapter provenance and HTTP status for classification.
 */
export type ProviderError = {
  provider: string;
  code: ProviderErrorCode;
  message: string;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Closed taxonomy the retry layer reasons about; adapters never pick a kind themselves.
 */
export type FailureKind =
  | "transient_network"
  | "rate_limited"
  | "server_error"
  | "client_error"
  | "not_found"
  | "conflict"
  | "unknown";

export type ClassifiedFailure = {
  kind: FailureKind;
  provider: string;
  message: string;
  httpStatus?: number;
  error: ProviderError;
};
