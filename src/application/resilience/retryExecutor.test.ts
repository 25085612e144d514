import { afterEach, describe, expect, it, vi } from "vitest";
import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../core/entities/appError";
import { logger } from "../../shared/logger/logger";
import { ManualClock } from "../../__tests__/support/manualClock";
import { RetryExecutor } from "./retryExecutor";
import { createRetryPolicy } from "./retryPolicy";

const context = { entityKey: "AAPL", provider: "stub" };

const httpFailure = (status: number): ProviderError => ({
  provider: "stub",
  code: "non_success_status",
  message: `HTTP request failed with status ${status}.`,
  httpStatus: status,
});

/**
 * Replays the scripted results in order, repeating the last one once the script runs out.
 */
const scripted = <T>(results: Array<Result<T, ProviderError>>) => {
  let calls = 0;
  const operation = vi.fn(async () => {
    const result = results[Math.min(calls, results.length - 1)];
    calls += 1;
    if (!result) {
      throw new Error("empty script");
    }
    return result;
  });
  return operation;
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("RetryExecutor", () => {
  it("retries transient failures with exponential backoff and logs each retry", async () => {
    const clock = new ManualClock();
    const warn = vi.spyOn(logger, "warn");
    const executor = new RetryExecutor(clock);
    const operation = scripted<{ price: number }>([
      err(httpFailure(503)),
      err(httpFailure(503)),
      ok({ price: 101.5 }),
    ]);

    const outcome = await executor.execute(
      operation,
      createRetryPolicy({ maxRetries: 3, backoffBase: 2, initialDelayMs: 1_000 }),
      context,
    );

    expect(outcome).toEqual({
      status: "success",
      value: { price: 101.5 },
      attempts: 3,
    });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([1_000, 2_000]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("surfaces non-retryable failures immediately without sleeping", async () => {
    const clock = new ManualClock();
    const executor = new RetryExecutor(clock);
    const operation = scripted<never>([err(httpFailure(400))]);

    const outcome = await executor.execute(
      operation,
      createRetryPolicy({ maxRetries: 3 }),
      context,
    );

    expect(outcome.status).toBe("failure");
    if (outcome.status !== "failure") {
      throw new Error("expected failure outcome");
    }
    expect(outcome.failure.kind).toBe("client_error");
    expect(outcome.attempts).toBe(1);
    expect(outcome.exhausted).toBe(false);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });

  it("gives up after maxRetries + 1 attempts", async () => {
    const clock = new ManualClock();
    const executor = new RetryExecutor(clock);
    const operation = scripted<never>([err(httpFailure(500))]);

    const outcome = await executor.execute(
      operation,
      createRetryPolicy({ maxRetries: 2, backoffBase: 2, initialDelayMs: 10 }),
      context,
    );

    expect(outcome.status).toBe("failure");
    if (outcome.status !== "failure") {
      throw new Error("expected failure outcome");
    }
    expect(outcome.exhausted).toBe(true);
    expect(outcome.attempts).toBe(3);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([10, 20]);
  });

  it("short-circuits already-exists responses as a distinct outcome", async () => {
    const clock = new ManualClock();
    const warn = vi.spyOn(logger, "warn");
    const executor = new RetryExecutor(clock);
    const operation = scripted<void>([
      err({
        provider: "stub",
        code: "already_exists",
        message: "Subscriber already exists.",
      }),
    ]);

    const outcome = await executor.execute(
      operation,
      createRetryPolicy({ maxRetries: 3 }),
      context,
    );

    expect(outcome.status).toBe("exists");
    expect(outcome.attempts).toBe(1);
    expect(clock.sleeps).toEqual([]);
    expect(warn).not.toHaveBeenCalled();
  });

  it("classifies thrown exceptions instead of letting them escape", async () => {
    const clock = new ManualClock();
    const executor = new RetryExecutor(clock);
    let calls = 0;

    const outcome = await executor.execute(
      async () => {
        calls += 1;
        if (calls === 1) {
          throw Object.assign(new Error("socket hang up"), {
            code: "ECONNRESET",
          });
        }
        return ok("recovered");
      },
      createRetryPolicy({ maxRetries: 1, initialDelayMs: 5 }),
      context,
    );

    expect(outcome).toEqual({
      status: "success",
      value: "recovered",
      attempts: 2,
    });
    expect(clock.sleeps).toEqual([5]);
  });

  it("makes exactly one attempt when maxRetries is zero", async () => {
    const clock = new ManualClock();
    const executor = new RetryExecutor(clock);
    const operation = scripted<never>([err(httpFailure(503))]);

    const outcome = await executor.execute(
      operation,
      createRetryPolicy({ maxRetries: 0 }),
      context,
    );

    expect(outcome.status).toBe("failure");
    expect(operation).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
  });
});
