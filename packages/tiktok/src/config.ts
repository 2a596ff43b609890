import { z } from "zod";

const envSchema = z.object({
  // TikTok OAuth client (only needed for token refresh)
  TIKTOK_CLIENT_KEY: z.string().optional(),
  TIKTOK_CLIENT_SECRET: z.string().optional(),

  // Content Posting API
  TIKTOK_API_BASE: z.string().url().default("https://open.tiktokapis.com"),
  TIKTOK_POST_MODE: z.enum(["direct", "inbox"]).default("direct"),

  // Token storage
  TIKTOK_TOKEN_STORE: z.enum(["file", "db"]).default("file"),
  TIKTOK_TOKEN_FILE: z.string().min(1).default("user_tokens.json"),
  TIKTOK_TOKEN_SAFETY_MARGIN_SEC: z.coerce.number().int().min(0).default(300),

  // Retry / polling budgets
  TIKTOK_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  TIKTOK_RETRY_BASE_MS: z.coerce.number().int().positive().default(1_000),
  TIKTOK_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
  TIKTOK_POLL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  TIKTOK_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5 * 60 * 1000),
});

export type UploaderEnv = z.infer<typeof envSchema>;

export interface UploaderConfig {
  clientKey?: string;
  clientSecret?: string;
  apiBase: string;
  postMode: UploaderEnv["TIKTOK_POST_MODE"];
  tokenStore: UploaderEnv["TIKTOK_TOKEN_STORE"];
  tokenFile: string;
  tokenSafetyMarginMs: number;
  maxRetries: number;
  retryBaseMs: number;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  requestTimeoutMs: number;
}

/**
 * Validate uploader settings from the environment.
 * Throws a ZodError naming every invalid variable.
 */
export function loadConfig(
  source: NodeJS.ProcessEnv = process.env,
): UploaderConfig {
  const env = envSchema.parse(source);
  return {
    clientKey: env.TIKTOK_CLIENT_KEY,
    clientSecret: env.TIKTOK_CLIENT_SECRET,
    apiBase: env.TIKTOK_API_BASE.replace(/\/$/, ""),
    postMode: env.TIKTOK_POST_MODE,
    tokenStore: env.TIKTOK_TOKEN_STORE,
    tokenFile: env.TIKTOK_TOKEN_FILE,
    tokenSafetyMarginMs: env.TIKTOK_TOKEN_SAFETY_MARGIN_SEC * 1000,
    maxRetries: env.TIKTOK_MAX_RETRIES,
    retryBaseMs: env.TIKTOK_RETRY_BASE_MS,
    pollIntervalMs: env.TIKTOK_POLL_INTERVAL_MS,
    pollTimeoutMs: env.TIKTOK_POLL_TIMEOUT_MS,
    requestTimeoutMs: env.TIKTOK_REQUEST_TIMEOUT_MS,
  };
}
