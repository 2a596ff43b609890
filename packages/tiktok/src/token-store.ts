import type { InvalidInputError } from "./errors.js";
import type { StoredTokens } from "./types.js";

/** A stored entry that could not be read, kept apart from the usable ones */
export interface RejectedTokenEntry {
  userId: string;
  error: InvalidInputError;
}

export interface TokenListing {
  tokens: StoredTokens[];
  rejected: RejectedTokenEntry[];
}

/**
 * Where per-user TikTok tokens live. The upload pipeline only sees this
 * interface, so it never touches the token file or the database directly.
 */
export interface TokenStore {
  get(userId: string): Promise<StoredTokens | null>;
  put(tokens: StoredTokens): Promise<void>;
  list(): Promise<TokenListing>;
}

export class MemoryTokenStore implements TokenStore {
  private readonly tokens = new Map<string, StoredTokens>();

  constructor(initial: StoredTokens[] = []) {
    for (const entry of initial) {
      this.tokens.set(entry.userId, { ...entry });
    }
  }

  async get(userId: string): Promise<StoredTokens | null> {
    const entry = this.tokens.get(userId);
    return entry ? { ...entry } : null;
  }

  async put(tokens: StoredTokens): Promise<void> {
    this.tokens.set(tokens.userId, { ...tokens });
  }

  async list(): Promise<TokenListing> {
    return {
      tokens: [...this.tokens.values()].map((entry) => ({ ...entry })),
      rejected: [],
    };
  }
}
