import { err, ok, type Result } from "neverthrow";
import type { SubscriptionError } from "../../core/entities/subscriber";

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MIN_EMAIL_LENGTH = 6;
const MAX_EMAIL_LENGTH = 254;

const invalid = (message: string): SubscriptionError => ({
  code: "validation_error",
  message,
});

/**
 * Returns the trimmed, lower-cased address that storage keys on.
 */
export const normalizeEmail = (email: string): string =>
  email.trim().toLowerCase();

export const validateEmail = (
  email: string | undefined,
): Result<string, SubscriptionError> => {
  const trimmed = email?.trim() ?? "";

  if (!trimmed) {
    return err(invalid("Email is required"));
  }

  if (trimmed.length < MIN_EMAIL_LENGTH) {
    return err(invalid("Email address is too short"));
  }

  if (trimmed.length > MAX_EMAIL_LENGTH) {
    return err(invalid("Email address is too long"));
  }

  if (!EMAIL_PATTERN.test(trimmed)) {
    return err(invalid("Invalid email format"));
  }

  return ok(normalizeEmail(trimmed));
};
