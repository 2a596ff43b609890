import { describe, it, expect } from "vitest";
import { getTableConfig } from "drizzle-orm/pg-core";
import { tiktokTokens } from "./schema.js";

describe("Database Schema", () => {
  it("should have tiktok_tokens table with correct columns", () => {
    expect(tiktokTokens).toBeDefined();
    expect(tiktokTokens.id).toBeDefined();
    expect(tiktokTokens.openId).toBeDefined();
    expect(tiktokTokens.accessToken).toBeDefined();
    expect(tiktokTokens.refreshToken).toBeDefined();
    expect(tiktokTokens.tokenExpiry).toBeDefined();
    expect(tiktokTokens.refreshTokenExpiry).toBeDefined();
    expect(tiktokTokens.scopes).toBeDefined();
    expect(tiktokTokens.createdAt).toBeDefined();
    expect(tiktokTokens.updatedAt).toBeDefined();
  });

  it("should key tokens by a unique open_id", () => {
    const config = getTableConfig(tiktokTokens);

    expect(config.name).toBe("tiktok_tokens");
    const openId = config.columns.find((column) => column.name === "open_id");
    expect(openId?.isUnique).toBe(true);
    expect(openId?.notNull).toBe(true);
  });

  it("should allow a missing refresh token expiry", () => {
    const config = getTableConfig(tiktokTokens);
    const column = config.columns.find(
      (c) => c.name === "refresh_token_expiry",
    );

    expect(column?.notNull).toBe(false);
  });
});
