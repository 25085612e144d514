import { boolean, index, pgTable, text, timestamp } from "drizzle-orm/pg-core";

export const subscribersTable = pgTable(
  "subscribers",
  {
    email: text("email").primaryKey(),
    subscribedAt: timestamp("subscribed_at", { withTimezone: true }).notNull(),
    isActive: boolean("is_active").notNull().default(true),
    unsubscribedAt: timestamp("unsubscribed_at", { withTimezone: true }),
  },
  (table) => ({
    activeIdx: index("subscribers_active_idx").on(table.isActive),
  }),
);
