import { and, asc, eq } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { err, ok, type Result } from "neverthrow";
import type { ProviderError } from "../../core/entities/appError";
import type { SubscriberEntity } from "../../core/entities/subscriber";
import type { SubscriberRepositoryPort } from "../../core/ports/outboundPorts";
import { subscribersTable } from "./schema";

const PROVIDER = "postgres-subscribers";

// connection_failure class, admin_shutdown, too_many_connections, serialization_failure
const TRANSIENT_SQLSTATES = new Set(["57P01", "53300", "40001"]);
const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "CONNECTION_CLOSED",
  "CONNECTION_ENDED",
  "CONNECT_TIMEOUT",
]);

const readCode = (error: unknown): string | undefined => {
  if (!error || typeof error !== "object" || !("code" in error)) {
    return undefined;
  }

  return typeof error.code === "string" ? error.code : undefined;
};

/**
 * Maps a thrown driver error onto the provider error codes the retry layer classifies.
 */
export const toStorageError = (error: unknown): ProviderError => {
  const code = readCode(error);
  const message =
    error instanceof Error ? error.message : "Subscriber storage failed.";

  if (code === "23505") {
    return { provider: PROVIDER, code: "already_exists", message, cause: error };
  }

  if (
    code !== undefined &&
    (code.startsWith("08") ||
      TRANSIENT_SQLSTATES.has(code) ||
      NETWORK_ERROR_CODES.has(code))
  ) {
    return { provider: PROVIDER, code: "transport_error", message, cause: error };
  }

  return { provider: PROVIDER, code: "unexpected_error", message, cause: error };
};

/**
 * Keeps subscriber rows as soft-deletable records so an unsubscribe never loses the original signup date.
 */
export class PostgresSubscriberRepository implements SubscriberRepositoryPort {
  readonly name = PROVIDER;

  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  /**
   * Reactivates a previously unsubscribed row; an active row is left untouched and reported as existing.
   */
  async create(
    subscriber: SubscriberEntity,
  ): Promise<Result<void, ProviderError>> {
    try {
      const inserted = await this.db
        .insert(subscribersTable)
        .values({
          email: subscriber.email,
          subscribedAt: subscriber.subscribedAt,
          isActive: subscriber.isActive,
          unsubscribedAt: subscriber.unsubscribedAt ?? null,
        })
        .onConflictDoUpdate({
          target: subscribersTable.email,
          set: {
            isActive: true,
            subscribedAt: subscriber.subscribedAt,
            unsubscribedAt: null,
          },
          setWhere: eq(subscribersTable.isActive, false),
        })
        .returning({ email: subscribersTable.email });

      if (inserted.length === 0) {
        return err({
          provider: PROVIDER,
          code: "already_exists",
          message: `Subscriber already exists: ${subscriber.email}`,
        });
      }

      return ok(undefined);
    } catch (error) {
      return err(toStorageError(error));
    }
  }

  /**
   * Only active rows are touched, so unsubscribing twice reports the second call as not found.
   */
  async deactivate(
    email: string,
    at: Date,
  ): Promise<Result<void, ProviderError>> {
    try {
      const updated = await this.db
        .update(subscribersTable)
        .set({ isActive: false, unsubscribedAt: at })
        .where(
          and(
            eq(subscribersTable.email, email),
            eq(subscribersTable.isActive, true),
          ),
        )
        .returning({ email: subscribersTable.email });

      if (updated.length === 0) {
        return err({
          provider: PROVIDER,
          code: "not_found",
          message: `Email not found: ${email}`,
        });
      }

      return ok(undefined);
    } catch (error) {
      return err(toStorageError(error));
    }
  }

  async listActiveEmails(): Promise<Result<string[], ProviderError>> {
    try {
      const rows = await this.db
        .select({ email: subscribersTable.email })
        .from(subscribersTable)
        .where(eq(subscribersTable.isActive, true))
        .orderBy(asc(subscribersTable.subscribedAt));

      return ok(rows.map((row) => row.email));
    } catch (error) {
      return err(toStorageError(error));
    }
  }
}
