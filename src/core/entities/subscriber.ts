import type { ClassifiedFailure } from "./appError";

export type SubscriberEntity = {
  email: string;
  subscribedAt: Date;
  isActive: boolean;
  unsubscribedAt?: Date;
};

export type OutboundEmail = {
  to: string;
  subject: string;
  html: string;
};

export type DeliveryReceipt = {
  recipient: string;
  messageId: string;
};

export type SubscriptionError = {
  code: "validation_error" | "not_found" | "storage_error";
  message: string;
  failure?: ClassifiedFailure;
};
