import { err, ok, type Result } from "neverthrow";
import type { SubscriptionError } from "../../core/entities/subscriber";
import type {
  ClockPort,
  SubscriberRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { CallOutcome, RetryExecutor } from "../resilience/retryExecutor";
import type { RetryPolicy } from "../resilience/retryPolicy";
import { validateEmail } from "./emailValidation";

export type SubscribeResult = {
  status: "created" | "exists";
  message: string;
};

export type UnsubscribeResult = {
  status: "unsubscribed";
  message: string;
};

const storageError = (
  action: string,
  outcome: Extract<CallOutcome<unknown>, { status: "failure" }>,
): SubscriptionError => ({
  code: "storage_error",
  message: `Failed to ${action}: ${outcome.failure.message}`,
  failure: outcome.failure,
});

/**
 * Owns the mailing-list lifecycle; every storage call goes through the shared retry loop.
 */
export class SubscriptionService {
  constructor(
    private readonly repository: SubscriberRepositoryPort,
    private readonly executor: RetryExecutor,
    private readonly policy: RetryPolicy,
    private readonly clock: ClockPort,
  ) {}

  /**
   * Treats a duplicate signup as a friendly outcome rather than an error.
   */
  async subscribe(
    rawEmail: string | undefined,
  ): Promise<Result<SubscribeResult, SubscriptionError>> {
    const validated = validateEmail(rawEmail);
    if (validated.isErr()) {
      return err(validated.error);
    }

    const email = validated.value;
    const outcome = await this.executor.execute(
      () =>
        this.repository.create({
          email,
          subscribedAt: this.clock.now(),
          isActive: true,
        }),
      this.policy,
      { entityKey: email, provider: this.repository.name },
    );

    switch (outcome.status) {
      case "success":
        logger.info({ email }, "Subscriber created");
        return ok({
          status: "created",
          message: "Thank you for subscribing! You'll receive weekly updates.",
        });
      case "exists":
        return ok({ status: "exists", message: "You're already subscribed!" });
      case "failure":
        logger.error(
          { email, kind: outcome.failure.kind, attempts: outcome.attempts },
          "Subscribe failed",
        );
        return err(storageError(`subscribe ${email}`, outcome));
    }
  }

  /**
   * Soft-deletes the subscriber so the original signup date survives.
   */
  async unsubscribe(
    rawEmail: string | undefined,
  ): Promise<Result<UnsubscribeResult, SubscriptionError>> {
    const validated = validateEmail(rawEmail);
    if (validated.isErr()) {
      return err(validated.error);
    }

    const email = validated.value;
    const outcome = await this.executor.execute(
      () => this.repository.deactivate(email, this.clock.now()),
      this.policy,
      { entityKey: email, provider: this.repository.name },
    );

    if (outcome.status === "failure") {
      if (outcome.failure.kind === "not_found") {
        return err({
          code: "not_found",
          message: `Email not found: ${email}`,
          failure: outcome.failure,
        });
      }

      logger.error(
        { email, kind: outcome.failure.kind, attempts: outcome.attempts },
        "Unsubscribe failed",
      );
      return err(storageError(`unsubscribe ${email}`, outcome));
    }

    logger.info({ email }, "Subscriber deactivated");
    return ok({
      status: "unsubscribed",
      message: "You've been unsubscribed successfully.",
    });
  }

  async listActiveEmails(): Promise<Result<string[], SubscriptionError>> {
    const outcome = await this.executor.execute(
      () => this.repository.listActiveEmails(),
      this.policy,
      { entityKey: "active-subscribers", provider: this.repository.name },
    );

    switch (outcome.status) {
      case "success":
        return ok(outcome.value);
      case "exists":
        return err({
          code: "storage_error",
          message: `Failed to get subscribers: ${outcome.error.message}`,
        });
      case "failure":
        return err(storageError("get subscribers", outcome));
    }
  }
}
