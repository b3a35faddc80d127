/**
 * Monitors table. One row per monitor, owned by a user.
 * The API creates and deletes rows; the scheduler only writes status and lastChecked.
 */

import {
  index,
  integer,
  pgTable,
  text,
  timestamp,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";

export const monitors = pgTable(
  "monitors",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ownerId: varchar("ownerId").notNull(), // user id from the auth provider
    url: text("url"),
    name: varchar("name"),
    interval: integer("interval").default(60), // seconds between checks
    status: varchar("status", { enum: ["pending", "up", "down"] })
      .notNull()
      .default("pending"),
    lastChecked: timestamp("lastChecked", { withTimezone: true }), // null = never
    createdAt: timestamp("createdAt", { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    ownerIdx: index("monitors_owner_idx").on(table.ownerId),
  }),
);
