import { db, tiktokTokens, type TiktokToken } from "@reelpost/db";
import { eq } from "drizzle-orm";
import type { TokenListing, TokenStore } from "./token-store.js";
import type { StoredTokens } from "./types.js";

function toStoredTokens(row: TiktokToken): StoredTokens {
  return {
    userId: row.openId,
    accessToken: row.accessToken,
    refreshToken: row.refreshToken,
    expiry: row.tokenExpiry,
    refreshExpiry: row.refreshTokenExpiry ?? undefined,
    scopes: row.scopes,
  };
}

/**
 * Tokens in the tiktok_tokens table, one row per open_id.
 */
export class DbTokenStore implements TokenStore {
  async get(userId: string): Promise<StoredTokens | null> {
    const rows = await db
      .select()
      .from(tiktokTokens)
      .where(eq(tiktokTokens.openId, userId))
      .limit(1);

    return rows.length > 0 ? toStoredTokens(rows[0]) : null;
  }

  /** Upsert by open_id */
  async put(tokens: StoredTokens): Promise<void> {
    await db
      .insert(tiktokTokens)
      .values({
        openId: tokens.userId,
        accessToken: tokens.accessToken,
        refreshToken: tokens.refreshToken,
        tokenExpiry: tokens.expiry,
        refreshTokenExpiry: tokens.refreshExpiry ?? null,
        scopes: tokens.scopes,
      })
      .onConflictDoUpdate({
        target: tiktokTokens.openId,
        set: {
          accessToken: tokens.accessToken,
          refreshToken: tokens.refreshToken,
          tokenExpiry: tokens.expiry,
          refreshTokenExpiry: tokens.refreshExpiry ?? null,
          scopes: tokens.scopes,
          updatedAt: new Date(),
        },
      });
  }

  async list(): Promise<TokenListing> {
    const rows = await db.select().from(tiktokTokens);
    return { tokens: rows.map(toStoredTokens), rejected: [] };
  }
}
