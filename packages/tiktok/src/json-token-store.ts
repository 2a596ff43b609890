import { readFile, rename, writeFile } from "node:fs/promises";
import { z } from "zod";
import { InvalidInputError } from "./errors.js";
import type { TokenListing, TokenStore } from "./token-store.js";
import type { StoredTokens } from "./types.js";

const tokenEntrySchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().default(""),
  expires_at: z.coerce.date(),
  refresh_expires_at: z.coerce.date().optional(),
  scope: z.string().default(""),
  open_id: z.string().optional(),
});

type TokenEntry = z.infer<typeof tokenEntrySchema>;

function toStoredTokens(userId: string, entry: TokenEntry): StoredTokens {
  return {
    userId,
    accessToken: entry.access_token,
    refreshToken: entry.refresh_token,
    expiry: entry.expires_at,
    refreshExpiry: entry.refresh_expires_at,
    scopes: entry.scope,
  };
}

function toEntry(tokens: StoredTokens): Record<string, string> {
  const entry: Record<string, string> = {
    access_token: tokens.accessToken,
    refresh_token: tokens.refreshToken,
    expires_at: tokens.expiry.toISOString(),
    scope: tokens.scopes,
    open_id: tokens.userId,
  };
  if (tokens.refreshExpiry) {
    entry.refresh_expires_at = tokens.refreshExpiry.toISOString();
  }
  return entry;
}

/**
 * Tokens kept in a local JSON file keyed by user id (TikTok open_id):
 *
 *   { "<user_id>": { access_token, refresh_token, expires_at, scope } }
 *
 * A missing file reads as empty. Each user's entry is validated on its own,
 * so one bad entry only affects that user. Writes go through a temp file +
 * rename.
 */
export class JsonFileTokenStore implements TokenStore {
  constructor(private readonly filePath: string) {}

  private async readRaw(): Promise<Record<string, unknown>> {
    let text: string;
    try {
      text = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return {};
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new InvalidInputError(`Token file ${this.filePath} is not valid JSON`, {
        cause: error,
      });
    }

    const parsed = z.record(z.string(), z.unknown()).safeParse(raw);
    if (!parsed.success) {
      throw new InvalidInputError(
        `Token file ${this.filePath} must contain an object keyed by user id`,
      );
    }
    return parsed.data;
  }

  private malformed(userId: string, error: z.ZodError): InvalidInputError {
    return new InvalidInputError(
      `Token file ${this.filePath} is malformed: ${error.issues
        .map((issue) => `${[userId, ...issue.path].join(".")} ${issue.message}`)
        .join("; ")}`,
    );
  }

  async get(userId: string): Promise<StoredTokens | null> {
    const raw = await this.readRaw();
    if (!Object.hasOwn(raw, userId)) return null;

    const parsed = tokenEntrySchema.safeParse(raw[userId]);
    if (!parsed.success) throw this.malformed(userId, parsed.error);
    return toStoredTokens(userId, parsed.data);
  }

  async put(tokens: StoredTokens): Promise<void> {
    // Keep other users' entries exactly as they were on disk
    const data = await this.readRaw();
    data[tokens.userId] = toEntry(tokens);

    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
    await rename(tempPath, this.filePath);
    console.log(`[TokenStore] Saved tokens for ${tokens.userId}`);
  }

  async list(): Promise<TokenListing> {
    const listing: TokenListing = { tokens: [], rejected: [] };

    for (const [userId, value] of Object.entries(await this.readRaw())) {
      const parsed = tokenEntrySchema.safeParse(value);
      if (parsed.success) {
        listing.tokens.push(toStoredTokens(userId, parsed.data));
        continue;
      }
      const error = this.malformed(userId, parsed.error);
      console.warn(`[TokenStore] Skipping ${userId}:`, error.message);
      listing.rejected.push({ userId, error });
    }

    return listing;
  }
}
