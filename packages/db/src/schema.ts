import { pgTable, uuid, varchar, text, timestamp } from "drizzle-orm/pg-core";

// tiktok_tokens: one row per creator account (open_id)
export const tiktokTokens = pgTable("tiktok_tokens", {
  id: uuid("id").primaryKey().defaultRandom(),
  openId: varchar("open_id", { length: 255 }).notNull().unique(),
  accessToken: text("access_token").notNull(),
  refreshToken: text("refresh_token").notNull(),
  tokenExpiry: timestamp("token_expiry", { withTimezone: true }).notNull(),
  refreshTokenExpiry: timestamp("refresh_token_expiry", {
    withTimezone: true,
  }),
  scopes: text("scopes").notNull(),
  createdAt: timestamp("created_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
  updatedAt: timestamp("updated_at", { withTimezone: true })
    .defaultNow()
    .notNull(),
});

export type TiktokToken = typeof tiktokTokens.$inferSelect;
export type NewTiktokToken = typeof tiktokTokens.$inferInsert;
