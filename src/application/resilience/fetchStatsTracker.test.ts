import { describe, expect, it } from "vitest";
import { FetchStatsTracker } from "./fetchStatsTracker";

describe("FetchStatsTracker", () => {
  it("reports a full success rate when nothing was attempted", () => {
    expect(new FetchStatsTracker().successRate()).toBe(100);
  });

  it("counts primary and fallback successes towards the success rate", () => {
    const tracker = new FetchStatsTracker();

    tracker.recordAttempt();
    tracker.recordPrimarySuccess(2);
    tracker.recordAttempt();
    tracker.recordFallbackSuccess();
    tracker.recordAttempt();
    tracker.recordFailure("TSLA", "All sources exhausted");
    tracker.recordAttempt();
    tracker.recordFailure("GOOGL", "All sources exhausted");

    expect(tracker.snapshot()).toEqual({
      totalAttempts: 4,
      primarySuccesses: 1,
      fallbackSuccesses: 1,
      totalFailures: 2,
      retriesUsed: 2,
    });
    expect(tracker.successRate()).toBe(50);
  });

  it("overwrites the reason when the same entity fails twice", () => {
    const tracker = new FetchStatsTracker();

    tracker.recordFailure("MSFT", "first");
    tracker.recordFailure("MSFT", "second");

    expect(tracker.failureMap()).toEqual({ MSFT: "second" });
    expect(tracker.failureCount()).toBe(1);
    expect(tracker.snapshot().totalFailures).toBe(2);
  });

  it("returns copies that callers cannot use to mutate internal state", () => {
    const tracker = new FetchStatsTracker();
    tracker.recordFailure("AAPL", "reason");

    const stats = tracker.snapshot();
    stats.totalFailures = 99;
    const failures = tracker.failureMap();
    failures.NVDA = "injected";

    expect(tracker.snapshot().totalFailures).toBe(1);
    expect(tracker.failureMap()).toEqual({ AAPL: "reason" });
  });

  it("zeroes every counter and clears failures on reset", () => {
    const tracker = new FetchStatsTracker();
    tracker.recordAttempt();
    tracker.recordPrimarySuccess(1);
    tracker.recordFailure("AAPL", "reason");

    tracker.reset();

    expect(tracker.snapshot()).toEqual({
      totalAttempts: 0,
      primarySuccesses: 0,
      fallbackSuccesses: 0,
      totalFailures: 0,
      retriesUsed: 0,
    });
    expect(tracker.failureMap()).toEqual({});
  });
});
