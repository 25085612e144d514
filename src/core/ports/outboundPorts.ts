import type { Result } from "neverthrow";
import type { ProviderError } from "../entities/appError";
import type {
  DeliveryReceipt,
  OutboundEmail,
  SubscriberEntity,
} from "../entities/subscriber";

export interface SubscriberRepositoryPort {
  readonly name: string;
  /**
   * Inserts or reactivates a subscriber; an already active row yields an `already_exists` error.
   */
  create(subscriber: SubscriberEntity): Promise<Result<void, ProviderError>>;
  /**
   * Soft-deletes a subscriber; a missing row yields a `not_found` error.
   */
  deactivate(email: string, at: Date): Promise<Result<void, ProviderError>>;
  listActiveEmails(): Promise<Result<string[], ProviderError>>;
}

export interface MailerPort {
  readonly name: string;
  send(email: OutboundEmail): Promise<Result<DeliveryReceipt, ProviderError>>;
}

export type NewsletterContent = {
  subject: string;
  html: string;
};

export interface NewsletterContentPort {
  render(): Promise<NewsletterContent>;
}

export interface NewsletterSchedulerPort {
  scheduleWeekly(cron: string): Promise<void>;
  enqueueNow(): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}

export interface SleepPort {
  sleep(ms: number): Promise<void>;
}
