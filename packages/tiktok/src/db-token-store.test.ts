import { describe, it, expect, vi, beforeEach } from "vitest";

// Mock the db package
const mockSelect = vi.fn();
const mockFrom = vi.fn();
const mockWhere = vi.fn();
const mockLimit = vi.fn();
const mockInsert = vi.fn();
const mockValues = vi.fn();
const mockOnConflictDoUpdate = vi.fn();

vi.mock("@reelpost/db", () => ({
  db: {
    select: () => ({
      from: (table: unknown) => {
        mockFrom(table);
        return {
          where: (condition: unknown) => {
            mockWhere(condition);
            return {
              limit: (n: number) => {
                mockLimit(n);
                return mockSelect();
              },
            };
          },
          then: (resolve: (rows: unknown) => unknown) => resolve(mockSelect()),
        };
      },
    }),
    insert: (table: unknown) => {
      mockInsert(table);
      return {
        values: (vals: unknown) => {
          mockValues(vals);
          return { onConflictDoUpdate: mockOnConflictDoUpdate };
        },
      };
    },
  },
  tiktokTokens: {
    openId: "open_id",
    accessToken: "access_token",
    refreshToken: "refresh_token",
    tokenExpiry: "token_expiry",
    refreshTokenExpiry: "refresh_token_expiry",
    scopes: "scopes",
  },
}));

vi.mock("drizzle-orm", () => ({
  eq: (col: string, val: string) => ({ col, val }),
}));

const row = {
  id: "00000000-0000-0000-0000-000000000001",
  openId: "user-1",
  accessToken: "test-access",
  refreshToken: "test-refresh",
  tokenExpiry: new Date("2026-03-01T00:00:00Z"),
  refreshTokenExpiry: null,
  scopes: "video.publish",
  createdAt: new Date("2026-01-01T00:00:00Z"),
  updatedAt: new Date("2026-01-01T00:00:00Z"),
};

beforeEach(() => {
  vi.clearAllMocks();
  mockOnConflictDoUpdate.mockResolvedValue(undefined);
});

describe("DbTokenStore", () => {
  it("should look up tokens by open_id", async () => {
    const { DbTokenStore } = await import("./db-token-store.js");
    mockSelect.mockResolvedValueOnce([row]);

    const tokens = await new DbTokenStore().get("user-1");

    expect(tokens).toEqual({
      userId: "user-1",
      accessToken: "test-access",
      refreshToken: "test-refresh",
      expiry: new Date("2026-03-01T00:00:00Z"),
      refreshExpiry: undefined,
      scopes: "video.publish",
    });
    expect(mockWhere).toHaveBeenCalledWith({ col: "open_id", val: "user-1" });
    expect(mockLimit).toHaveBeenCalledWith(1);
  });

  it("should return null when no row matches", async () => {
    const { DbTokenStore } = await import("./db-token-store.js");
    mockSelect.mockResolvedValueOnce([]);

    await expect(new DbTokenStore().get("nobody")).resolves.toBeNull();
  });

  it("should upsert on open_id", async () => {
    const { DbTokenStore } = await import("./db-token-store.js");

    await new DbTokenStore().put({
      userId: "user-1",
      accessToken: "test-access",
      refreshToken: "test-refresh",
      expiry: new Date("2026-03-01T00:00:00Z"),
      refreshExpiry: new Date("2027-03-01T00:00:00Z"),
      scopes: "video.publish",
    });

    expect(mockValues).toHaveBeenCalledWith({
      openId: "user-1",
      accessToken: "test-access",
      refreshToken: "test-refresh",
      tokenExpiry: new Date("2026-03-01T00:00:00Z"),
      refreshTokenExpiry: new Date("2027-03-01T00:00:00Z"),
      scopes: "video.publish",
    });
    expect(mockOnConflictDoUpdate).toHaveBeenCalledWith(
      expect.objectContaining({
        target: "open_id",
        set: expect.objectContaining({
          accessToken: "test-access",
          refreshTokenExpiry: new Date("2027-03-01T00:00:00Z"),
          updatedAt: expect.any(Date),
        }),
      }),
    );
  });

  it("should list every row", async () => {
    const { DbTokenStore } = await import("./db-token-store.js");
    mockSelect.mockResolvedValueOnce([row, { ...row, openId: "user-2" }]);

    const { tokens, rejected } = await new DbTokenStore().list();

    expect(tokens.map((entry) => entry.userId)).toEqual(["user-1", "user-2"]);
    expect(rejected).toEqual([]);
  });
});
