import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";
import { logger, toErrorDetails } from "../../shared/logger/logger";

/**
 * Spaces calls per provider key. State lives as long as the instance; share one instance across every call site.
 */
export class RateLimiter {
  private readonly lastCallAtMs = new Map<string, number>();
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly clock: ClockPort,
    private readonly sleeper: SleepPort,
  ) {}

  /**
   * Suspends until `minIntervalMs` has passed since the previous call for the key, then claims the slot.
   * The slot is claimed whether or not the caller's request later succeeds. Never rejects.
   */
  async waitIfNeeded(providerKey: string, minIntervalMs: number): Promise<void> {
    // Check-then-record must not interleave for one key.
    const previous = this.queues.get(providerKey) ?? Promise.resolve();
    const current = previous.then(() =>
      this.claimSlot(providerKey, minIntervalMs),
    );
    this.queues.set(providerKey, current);
    await current;
  }

  lastCallAt(providerKey: string): Date | undefined {
    const timestamp = this.lastCallAtMs.get(providerKey);
    return timestamp === undefined ? undefined : new Date(timestamp);
  }

  private async claimSlot(
    providerKey: string,
    minIntervalMs: number,
  ): Promise<void> {
    const lastCall = this.lastCallAtMs.get(providerKey);

    if (lastCall !== undefined) {
      const elapsedMs = this.clock.now().getTime() - lastCall;
      if (elapsedMs < minIntervalMs) {
        const waitMs = minIntervalMs - elapsedMs;
        logger.debug(
          { provider: providerKey, waitMs, minIntervalMs },
          "Rate limit: waiting before provider call",
        );
        try {
          await this.sleeper.sleep(waitMs);
        } catch (error) {
          logger.warn(
            { provider: providerKey, waitMs, error: toErrorDetails(error) },
            "Rate limit: wait interrupted, claiming slot anyway",
          );
        }
      }
    }

    this.lastCallAtMs.set(providerKey, this.clock.now().getTime());
  }
}
