import { z } from "zod";

const retryPolicySchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  backoffBase: z.number().gt(1).default(2),
  initialDelayMs: z.number().min(0).default(1_000),
  minDelayMs: z.number().min(0).default(0),
});

export type RetryPolicy = Readonly<z.infer<typeof retryPolicySchema>>;

export type RetryPolicyInput = z.input<typeof retryPolicySchema>;

/**
 * Validates and freezes a policy; throws a ZodError on out-of-range values.
 */
export const createRetryPolicy = (input: RetryPolicyInput = {}): RetryPolicy =>
  Object.freeze(retryPolicySchema.parse(input));

export const DEFAULT_RETRY_POLICY: RetryPolicy = createRetryPolicy();

/**
 * Delay before the retry at `retryIndex` (0 for the first retry).
 */
export const computeBackoffDelay = (
  policy: RetryPolicy,
  retryIndex: number,
): number =>
  policy.minDelayMs + policy.initialDelayMs * policy.backoffBase ** retryIndex;

/**
 * Returns the same policy when the floor is already high enough, otherwise a frozen copy with the raised floor.
 */
export const withMinDelay = (
  policy: RetryPolicy,
  minDelayMs: number,
): RetryPolicy => {
  if (minDelayMs <= policy.minDelayMs) {
    return policy;
  }

  return Object.freeze({ ...policy, minDelayMs });
};
