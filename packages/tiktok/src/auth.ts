import { z } from "zod";
import {
  AuthError,
  InvalidInputError,
  errorMessage,
} from "./errors.js";
import { classifyHttpStatus, sendRequest } from "./http.js";
import type { TokenStore } from "./token-store.js";
import type { AccessToken, StoredTokens } from "./types.js";

const DEFAULT_ACCESS_TOKEN_TTL_SEC = 86_400;

const tokenResponseSchema = z.object({
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
  refresh_expires_in: z.number().optional(),
  open_id: z.string().optional(),
  scope: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

/**
 * What the upload driver needs from the token side: a usable token per user,
 * and a way to force a refresh after the platform rejected one.
 */
export interface TokenProvider {
  getValidToken(userId: string): Promise<AccessToken>;
  refreshToken(userId: string): Promise<AccessToken>;
}

export interface TokenManagerOptions {
  apiBase: string;
  clientKey?: string;
  clientSecret?: string;
  /** Tokens expiring within this window are refreshed before use */
  safetyMarginMs: number;
  timeoutMs: number;
  now?: () => number;
}

export type RefreshOutcome = "valid" | "refreshed" | "reauth_required" | "failed";

export interface RefreshReport {
  userId: string;
  outcome: RefreshOutcome;
  expiry?: Date;
  error?: string;
}

export function toAccessToken(tokens: StoredTokens): AccessToken {
  return {
    value: tokens.accessToken,
    expiresAt: tokens.expiry,
    userId: tokens.userId,
  };
}

export class TokenManager implements TokenProvider {
  private readonly now: () => number;

  constructor(
    private readonly store: TokenStore,
    private readonly options: TokenManagerOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  private async load(userId: string): Promise<StoredTokens> {
    const stored = await this.store.get(userId);
    if (!stored) {
      throw new AuthError(
        `No TikTok tokens found for ${userId}. Please authenticate first.`,
      );
    }
    return stored;
  }

  private isFresh(tokens: StoredTokens): boolean {
    return tokens.expiry.getTime() > this.now() + this.options.safetyMarginMs;
  }

  /**
   * Return the stored token as-is while it is valid beyond the safety margin,
   * otherwise refresh it first.
   */
  async getValidToken(userId: string): Promise<AccessToken> {
    const stored = await this.load(userId);
    if (this.isFresh(stored)) {
      return toAccessToken(stored);
    }
    return this.refreshToken(userId);
  }

  /**
   * Exchange the refresh token for a new pair and persist it.
   * Refreshing needs no user redirect, just the client credentials.
   */
  async refreshToken(userId: string): Promise<AccessToken> {
    const stored = await this.load(userId);

    if (!stored.refreshToken) {
      throw new AuthError(`No refresh token stored for ${userId}`);
    }
    if (
      stored.refreshExpiry &&
      stored.refreshExpiry.getTime() <= this.now()
    ) {
      throw new AuthError(
        `Refresh token expired for ${userId}. Re-authentication required.`,
      );
    }

    const { clientKey, clientSecret } = this.options;
    if (!clientKey || !clientSecret) {
      throw new InvalidInputError(
        "TIKTOK_CLIENT_KEY and TIKTOK_CLIENT_SECRET must be set to refresh tokens",
      );
    }

    const body = new URLSearchParams({
      client_key: clientKey,
      client_secret: clientSecret,
      grant_type: "refresh_token",
      refresh_token: stored.refreshToken,
    });

    const response = await sendRequest(
      `${this.options.apiBase}/v2/oauth/token/`,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          "Cache-Control": "no-cache",
        },
        body: body.toString(),
      },
      { timeoutMs: this.options.timeoutMs },
    );

    const text = await response.text().catch(() => "");
    if (response.status === 429 || response.status >= 500) {
      throw classifyHttpStatus(
        response.status,
        `Token refresh for ${userId} failed with status ${response.status}`,
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      raw = undefined;
    }
    const parsed = tokenResponseSchema.safeParse(raw);
    const data = parsed.success ? parsed.data : undefined;

    if (!data || data.error || !data.access_token) {
      const reason =
        data?.error_description || data?.error || text || "Token refresh failed";
      console.error(`[TikTok] Token refresh error for ${userId}:`, reason);
      throw new AuthError(`Token refresh failed for ${userId}: ${reason}`, {
        status: response.status,
        platformCode: data?.error,
      });
    }

    const issuedAt = this.now();
    const updated: StoredTokens = {
      userId,
      accessToken: data.access_token,
      refreshToken: data.refresh_token || stored.refreshToken,
      expiry: new Date(
        issuedAt + (data.expires_in || DEFAULT_ACCESS_TOKEN_TTL_SEC) * 1000,
      ),
      refreshExpiry:
        data.refresh_expires_in !== undefined
          ? new Date(issuedAt + data.refresh_expires_in * 1000)
          : stored.refreshExpiry,
      scopes: data.scope || stored.scopes,
    };

    await this.store.put(updated);
    console.log(`[TikTok] Token refreshed successfully for ${userId}`);
    return toAccessToken(updated);
  }

  /**
   * Walk every stored account and refresh the tokens that are expired or
   * about to expire. Accounts whose refresh token is gone need a new login;
   * unreadable entries are reported as failed.
   */
  async refreshExpiredTokens(): Promise<RefreshReport[]> {
    const reports: RefreshReport[] = [];
    const { tokens, rejected } = await this.store.list();

    for (const stored of tokens) {
      if (this.isFresh(stored)) {
        reports.push({ userId: stored.userId, outcome: "valid", expiry: stored.expiry });
        continue;
      }

      if (stored.refreshExpiry && stored.refreshExpiry.getTime() <= this.now()) {
        console.warn(
          `[TikTok] Refresh token expired for ${stored.userId}. Re-authentication required.`,
        );
        reports.push({ userId: stored.userId, outcome: "reauth_required" });
        continue;
      }

      try {
        const token = await this.refreshToken(stored.userId);
        reports.push({
          userId: stored.userId,
          outcome: "refreshed",
          expiry: token.expiresAt,
        });
      } catch (error) {
        console.error(
          `[TikTok] Failed to refresh token for ${stored.userId}:`,
          errorMessage(error),
        );
        reports.push({
          userId: stored.userId,
          outcome: "failed",
          error: errorMessage(error),
        });
      }
    }

    for (const { userId, error } of rejected) {
      reports.push({ userId, outcome: "failed", error: error.message });
    }

    return reports;
  }
}
