import { err, type Result } from "neverthrow";
import type {
  ClassifiedFailure,
  ProviderError,
} from "../../core/entities/appError";
import type { SleepPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  classifyFailure,
  isRetryableFailure,
  toProviderError,
} from "./failureClassifier";
import { computeBackoffDelay, type RetryPolicy } from "./retryPolicy";

export type ProviderOperation<T> = () => Promise<Result<T, ProviderError>>;

export type RetryContext = {
  entityKey: string;
  provider: string;
};

export type CallOutcome<T> =
  | { status: "success"; value: T; attempts: number }
  | { status: "exists"; error: ProviderError; attempts: number }
  | {
      status: "failure";
      failure: ClassifiedFailure;
      attempts: number;
      exhausted: boolean;
    };

/**
 * Runs one provider call and folds a thrown exception into an error result.
 */
export const settleOperation = async <T>(
  operation: ProviderOperation<T>,
  provider: string,
): Promise<Result<T, ProviderError>> => {
  try {
    return await operation();
  } catch (error) {
    return err(toProviderError(error, provider));
  }
};

/**
 * Single retry loop shared by every provider call site; callers pick the operation and the policy.
 */
export class RetryExecutor {
  constructor(private readonly sleeper: SleepPort) {}

  /**
   * Resolves to an outcome and never rejects, so one entity's failure cannot abort a caller's batch.
   */
  async execute<T>(
    operation: ProviderOperation<T>,
    policy: RetryPolicy,
    context: RetryContext,
  ): Promise<CallOutcome<T>> {
    const maxAttempts = policy.maxRetries + 1;

    for (let attempt = 1; ; attempt += 1) {
      const result = await settleOperation(operation, context.provider);
      if (result.isOk()) {
        return { status: "success", value: result.value, attempts: attempt };
      }

      const failure = classifyFailure(result.error);
      if (failure.kind === "conflict") {
        return { status: "exists", error: result.error, attempts: attempt };
      }

      const retryable = isRetryableFailure(failure.kind);
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!retryable || !hasAttemptsLeft) {
        logger.warn(
          {
            ...context,
            attempt,
            maxAttempts,
            kind: failure.kind,
            httpStatus: failure.httpStatus,
            reason: failure.message,
          },
          retryable
            ? "Provider call exhausted retries"
            : "Provider call failed with non-retryable error",
        );

        return {
          status: "failure",
          failure,
          attempts: attempt,
          exhausted: retryable,
        };
      }

      const delayMs = computeBackoffDelay(policy, attempt - 1);
      logger.warn(
        {
          ...context,
          attempt,
          maxAttempts,
          delayMs,
          kind: failure.kind,
          httpStatus: failure.httpStatus,
          reason: failure.message,
        },
        "Provider call failed; retrying after backoff",
      );

      await this.sleeper.sleep(delayMs);
    }
  }
}
