import { describe, expect, it } from "vitest";
import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../core/entities/appError";
import type { ProviderAdapter } from "../../core/ports/inboundPorts";
import { ManualClock } from "../../__tests__/support/manualClock";
import { RateLimiter } from "./rateLimiter";
import { ResilientFetcher } from "./resilientFetcher";
import { createRetryPolicy, type RetryPolicy } from "./retryPolicy";

type Quote = { symbol: string; price: number; source: string };

type Responder = (
  entityKey: string,
  call: number,
) => Result<Quote, ProviderError>;

class ScriptedProvider implements ProviderAdapter<Quote> {
  readonly calls: string[] = [];

  constructor(
    readonly name: string,
    private readonly respond: Responder,
    readonly minIntervalMs = 0,
  ) {}

  async fetch(entityKey: string): Promise<Result<Quote, ProviderError>> {
    this.calls.push(entityKey);
    return this.respond(entityKey, this.calls.length);
  }
}

const quote = (symbol: string, source: string): Quote => ({
  symbol,
  price: 100,
  source,
});

const httpFailure = (provider: string, status: number): ProviderError => ({
  provider,
  code: "non_success_status",
  message: `HTTP request failed with status ${status}.`,
  httpStatus: status,
});

const alwaysOk = (name: string) =>
  new ScriptedProvider(name, (key) => ok(quote(key, name)));

const alwaysFailing = (name: string, status: number) =>
  new ScriptedProvider(name, () => err(httpFailure(name, status)));

const buildFetcher = (
  policy: RetryPolicy = createRetryPolicy({
    maxRetries: 3,
    backoffBase: 2,
    initialDelayMs: 1_000,
  }),
) => {
  const clock = new ManualClock();
  const fetcher = new ResilientFetcher(
    policy,
    new RateLimiter(clock, clock),
    clock,
  );
  return { clock, fetcher };
};

describe("ResilientFetcher.fetchWithRetry", () => {
  it("counts retries that preceded a primary success", async () => {
    const { clock, fetcher } = buildFetcher();
    const primary = new ScriptedProvider("primary", (key, call) =>
      call < 3 ? err(httpFailure("primary", 503)) : ok(quote(key, "primary")),
    );

    const value = await fetcher.fetchWithRetry({ entityKey: "AAPL", primary });

    expect(value).toEqual(quote("AAPL", "primary"));
    expect(fetcher.getStats()).toEqual({
      totalAttempts: 1,
      primarySuccesses: 1,
      fallbackSuccesses: 0,
      totalFailures: 0,
      retriesUsed: 2,
    });
    expect(clock.sleeps).toEqual([1_000, 2_000]);
  });

  it("fails fast on client errors without sleeping or a fallback", async () => {
    const { clock, fetcher } = buildFetcher();
    const primary = alwaysFailing("primary", 400);

    const value = await fetcher.fetchWithRetry({ entityKey: "AAPL", primary });

    expect(value).toBeNull();
    expect(primary.calls).toEqual(["AAPL"]);
    expect(clock.sleeps).toEqual([]);
    expect(fetcher.getStats().totalFailures).toBe(1);
    expect(fetcher.getFailures()).toEqual({
      AAPL: "All sources exhausted (client_error: HTTP request failed with status 400.)",
    });
  });

  it("uses the fallback once after the primary exhausts every attempt", async () => {
    const { fetcher } = buildFetcher();
    const primary = alwaysFailing("primary", 500);
    const fallback = alwaysOk("fallback");

    const value = await fetcher.fetchWithRetry({
      entityKey: "MSFT",
      primary,
      fallback,
    });

    expect(value).toEqual(quote("MSFT", "fallback"));
    expect(primary.calls).toHaveLength(4);
    expect(fallback.calls).toEqual(["MSFT"]);
    expect(fetcher.getStats()).toEqual({
      totalAttempts: 1,
      primarySuccesses: 0,
      fallbackSuccesses: 1,
      totalFailures: 0,
      retriesUsed: 0,
    });
    expect(fetcher.hasFailures()).toBe(false);
  });

  it("records a failure when the fallback also fails, without retrying it", async () => {
    const { fetcher } = buildFetcher(createRetryPolicy({ maxRetries: 1, initialDelayMs: 1 }));
    const primary = alwaysFailing("primary", 503);
    const fallback = alwaysFailing("fallback", 502);

    const value = await fetcher.fetchWithRetry({
      entityKey: "NVDA",
      primary,
      fallback,
    });

    expect(value).toBeNull();
    expect(fallback.calls).toEqual(["NVDA"]);
    expect(fetcher.getFailures()).toEqual({
      NVDA: "All sources exhausted (server_error: HTTP request failed with status 502.)",
    });
    expect(fetcher.getStats().retriesUsed).toBe(0);
  });

  it("returns null without a failure record when the resource already exists", async () => {
    const { fetcher } = buildFetcher();
    const primary = new ScriptedProvider("primary", () =>
      err({
        provider: "primary",
        code: "already_exists",
        message: "duplicate",
      }),
    );

    const value = await fetcher.fetchWithRetry({ entityKey: "AAPL", primary });

    expect(value).toBeNull();
    expect(primary.calls).toHaveLength(1);
    expect(fetcher.hasFailures()).toBe(false);
    expect(fetcher.getStats().totalFailures).toBe(0);
  });

  it("reports the already-exists outcome distinctly through fetchEntity", async () => {
    const { fetcher } = buildFetcher();
    const primary = new ScriptedProvider("primary", () =>
      err({ provider: "primary", code: "already_exists", message: "duplicate" }),
    );

    const outcome = await fetcher.fetchEntity({ entityKey: "AAPL", primary });

    expect(outcome).toEqual({ status: "exists" });
  });

  it("reports the exhausted reason through fetchEntity on failure", async () => {
    const { fetcher } = buildFetcher();
    const primary = alwaysFailing("primary", 404);

    const outcome = await fetcher.fetchEntity({ entityKey: "AAPL", primary });

    expect(outcome).toEqual({
      status: "failed",
      reason: "All sources exhausted (not_found: HTTP request failed with status 404.)",
    });
  });

  it("waits on the rate limiter before every provider call", async () => {
    const { clock, fetcher } = buildFetcher(
      createRetryPolicy({ maxRetries: 2, backoffBase: 2, initialDelayMs: 100 }),
    );
    const primary = new ScriptedProvider(
      "primary",
      (key, call) =>
        call < 3 ? err(httpFailure("primary", 503)) : ok(quote(key, "primary")),
      1_000,
    );

    await fetcher.fetchWithRetry({ entityKey: "AAPL", primary });

    // backoff 100, limiter tops up to 1000, backoff 200, limiter tops up to 1000
    expect(clock.sleeps).toEqual([100, 900, 200, 800]);
  });

  it("adds the per-call rate-limit delay as a floor on every backoff", async () => {
    const { clock, fetcher } = buildFetcher(
      createRetryPolicy({ maxRetries: 2, backoffBase: 2, initialDelayMs: 100 }),
    );
    const primary = alwaysFailing("primary", 503);

    await fetcher.fetchWithRetry({
      entityKey: "AAPL",
      primary,
      rateLimitDelayMs: 50,
    });

    expect(clock.sleeps).toEqual([150, 250]);
  });
});

describe("ResilientFetcher.fetchBatch", () => {
  it("returns only successes and pauses between entities, not before the first", async () => {
    const { clock, fetcher } = buildFetcher();
    const primary = new ScriptedProvider("primary", (key) =>
      key === "TSLA" ? err(httpFailure("primary", 404)) : ok(quote(key, "primary")),
    );

    const results = await fetcher.fetchBatch({
      entityKeys: ["AAPL", "TSLA", "MSFT"],
      primary,
      rateLimitDelayMs: 500,
    });

    expect([...results.keys()]).toEqual(["AAPL", "MSFT"]);
    expect(primary.calls).toEqual(["AAPL", "TSLA", "MSFT"]);
    expect(clock.sleeps).toEqual([500, 500]);
    expect(Object.keys(fetcher.getFailures())).toEqual(["TSLA"]);
    expect(fetcher.getFailureCount()).toBe(1);
    expect(fetcher.getSuccessRate()).toBeCloseTo(66.667, 2);
  });

  it("stops at the first failed entity when continueOnFailure is false", async () => {
    const { fetcher } = buildFetcher();
    const primary = new ScriptedProvider("primary", (key) =>
      key === "TSLA" ? err(httpFailure("primary", 400)) : ok(quote(key, "primary")),
    );

    const results = await fetcher.fetchBatch({
      entityKeys: ["AAPL", "TSLA", "MSFT"],
      primary,
      continueOnFailure: false,
    });

    expect([...results.keys()]).toEqual(["AAPL"]);
    expect(primary.calls).toEqual(["AAPL", "TSLA"]);
    expect(fetcher.getStats().totalAttempts).toBe(2);
  });

  it("keeps going past an existing entity when continueOnFailure is false", async () => {
    const { fetcher } = buildFetcher();
    const primary = new ScriptedProvider("primary", (key) =>
      key === "DUP"
        ? err({ provider: "primary", code: "already_exists", message: "duplicate" })
        : ok(quote(key, "primary")),
    );

    const results = await fetcher.fetchBatch({
      entityKeys: ["DUP", "NEXT"],
      primary,
      continueOnFailure: false,
    });

    expect(primary.calls).toEqual(["DUP", "NEXT"]);
    expect([...results.keys()]).toEqual(["NEXT"]);
    expect(fetcher.hasFailures()).toBe(false);
    expect(fetcher.getStats().totalAttempts).toBe(2);
  });

  it("keeps the stats invariant across mixed outcomes", async () => {
    const { fetcher } = buildFetcher(createRetryPolicy({ maxRetries: 1, initialDelayMs: 1 }));
    const primary = new ScriptedProvider("primary", (key) => {
      if (key === "AAPL") return ok(quote(key, "primary"));
      if (key === "EXISTS") {
        return err({ provider: "primary", code: "already_exists", message: "dup" });
      }
      return err(httpFailure("primary", 503));
    });
    const fallback = new ScriptedProvider("fallback", (key) =>
      key === "MSFT" ? ok(quote(key, "fallback")) : err(httpFailure("fallback", 500)),
    );

    await fetcher.fetchBatch({
      entityKeys: ["AAPL", "MSFT", "TSLA", "EXISTS"],
      primary,
      fallback,
    });

    const stats = fetcher.getStats();
    expect(stats).toEqual({
      totalAttempts: 4,
      primarySuccesses: 1,
      fallbackSuccesses: 1,
      totalFailures: 1,
      retriesUsed: 0,
    });
    expect(
      stats.primarySuccesses + stats.fallbackSuccesses + stats.totalFailures,
    ).toBeLessThanOrEqual(stats.totalAttempts);
  });

  it("starts from zero after reset", async () => {
    const { fetcher } = buildFetcher();
    await fetcher.fetchBatch({
      entityKeys: ["AAPL", "TSLA"],
      primary: alwaysFailing("primary", 400),
    });

    fetcher.reset();

    expect(fetcher.getStats()).toEqual({
      totalAttempts: 0,
      primarySuccesses: 0,
      fallbackSuccesses: 0,
      totalFailures: 0,
      retriesUsed: 0,
    });
    expect(fetcher.getFailures()).toEqual({});
    expect(fetcher.getSuccessRate()).toBe(100);
  });
});
