import type { DeliveryProviderPort } from "../../core/ports/inboundPorts";
import type {
  MailerPort,
  NewsletterContent,
  NewsletterContentPort,
} from "../../core/ports/outboundPorts";
import { logger, toErrorDetails } from "../../shared/logger/logger";
import type { ResilientFetcher } from "../resilience/resilientFetcher";
import type { SubscriptionService } from "./subscriptionService";

export type FailedDelivery = {
  email: string;
  error: string;
};

export type WeeklySendSummary = {
  status: "completed" | "error";
  message: string;
  total: number;
  sent: number;
  failed: number;
  failedEmails: string[];
  failures: FailedDelivery[];
};

const errorSummary = (message: string, total = 0): WeeklySendSummary => ({
  status: "error",
  message,
  total,
  sent: 0,
  failed: 0,
  failedEmails: [],
  failures: [],
});

/**
 * Presents the mailer as a per-recipient provider so delivery shares the fetch layer's retry and pacing.
 */
export const toDeliveryProvider = (
  mailer: MailerPort,
  content: NewsletterContent,
  minIntervalMs: number,
): DeliveryProviderPort => ({
  name: mailer.name,
  minIntervalMs,
  fetch: (recipient) =>
    mailer.send({ to: recipient, subject: content.subject, html: content.html }),
});

/**
 * Sends the weekly newsletter to every active subscriber, one recipient at a time.
 */
export class NewsletterService {
  constructor(
    private readonly subscriptions: SubscriptionService,
    private readonly mailer: MailerPort,
    private readonly fetcher: ResilientFetcher,
    private readonly content: NewsletterContentPort,
    private readonly minIntervalMs = 0,
  ) {}

  /**
   * Always resolves to a summary; per-recipient failures are listed rather than raised.
   */
  async sendWeekly(): Promise<WeeklySendSummary> {
    const subscribers = await this.subscriptions.listActiveEmails();
    if (subscribers.isErr()) {
      logger.error({ error: subscribers.error }, "Newsletter aborted");
      return errorSummary(subscribers.error.message);
    }

    const recipients = subscribers.value;
    if (recipients.length === 0) {
      logger.info("No active subscribers found");
      return {
        status: "completed",
        message: "No active subscribers",
        total: 0,
        sent: 0,
        failed: 0,
        failedEmails: [],
        failures: [],
      };
    }

    logger.info({ total: recipients.length }, "Found active subscribers");

    let content: NewsletterContent;
    try {
      content = await this.content.render();
    } catch (error) {
      logger.error({ error: toErrorDetails(error) }, "Newsletter render failed");
      const reason = error instanceof Error ? error.message : String(error);
      return errorSummary(
        `Failed to render newsletter: ${reason}`,
        recipients.length,
      );
    }

    this.fetcher.reset();
    const receipts = await this.fetcher.fetchBatch({
      entityKeys: recipients,
      primary: toDeliveryProvider(this.mailer, content, this.minIntervalMs),
      continueOnFailure: true,
    });

    const reasons = this.fetcher.getFailures();
    const failures: FailedDelivery[] = recipients
      .filter((email) => Object.hasOwn(reasons, email))
      .map((email) => ({ email, error: reasons[email] ?? "" }));
    const failedEmails = failures.map((failure) => failure.email);
    this.fetcher.logSummary();

    logger.info(
      { sent: receipts.size, total: recipients.length },
      "Weekly newsletter sent",
    );

    return {
      status: "completed",
      message: `Newsletter sent to ${receipts.size} subscribers`,
      total: recipients.length,
      sent: receipts.size,
      failed: failures.length,
      failedEmails,
      failures,
    };
  }
}
