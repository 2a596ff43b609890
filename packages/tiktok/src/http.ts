import { isSafeNumber, parse as parseLosslessJson } from "lossless-json";
import { z } from "zod";
import {
  AuthError,
  RemoteRejectedError,
  TransientNetworkError,
  errorMessage,
  type UploadError,
} from "./errors.js";

const AUTH_ERROR_CODES = new Set([
  "access_token_invalid",
  "scope_not_authorized",
  "scope_permission_missed",
]);

const TRANSIENT_ERROR_CODES = new Set(["rate_limit_exceeded", "internal_error"]);

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string().default(""),
      log_id: z.string().optional(),
    })
    .optional(),
});

export type TiktokApiEnvelope = z.infer<typeof envelopeSchema>;

export interface RequestOptions {
  timeoutMs: number;
}

/**
 * Map an HTTP status to the error taxonomy.
 * 401/403 = auth, 429/5xx = transient, any other non-2xx = rejected.
 */
export function classifyHttpStatus(
  status: number,
  message: string,
  platformCode?: string,
): UploadError {
  if (status === 401 || status === 403) {
    return new AuthError(message, { status, platformCode });
  }
  if (status === 429 || status >= 500) {
    return new TransientNetworkError(message, { status, platformCode });
  }
  return new RemoteRejectedError(message, { status, platformCode });
}

/**
 * TikTok answers some failures with HTTP 200 and a non-"ok" error code.
 */
export function classifyPlatformError(
  code: string,
  message: string,
  status: number,
): UploadError {
  const text = message || `TikTok API error: ${code}`;
  if (AUTH_ERROR_CODES.has(code)) {
    return new AuthError(text, { status, platformCode: code });
  }
  if (TRANSIENT_ERROR_CODES.has(code)) {
    return new TransientNetworkError(text, { status, platformCode: code });
  }
  if (status >= 400) {
    return classifyHttpStatus(status, text, code);
  }
  return new RemoteRejectedError(text, { status, platformCode: code });
}

/**
 * fetch with a timeout; connection failures surface as TransientNetworkError.
 */
export async function sendRequest(
  url: string,
  init: RequestInit,
  options: RequestOptions,
): Promise<Response> {
  try {
    return await fetch(url, {
      ...init,
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === "TimeoutError";
    const reason = timedOut
      ? `timed out after ${options.timeoutMs}ms`
      : errorMessage(error);
    throw new TransientNetworkError(`Request to ${url} failed: ${reason}`, {
      cause: error,
    });
  }
}

/**
 * Parse an API body. Numbers a double cannot hold exactly (int64 post ids)
 * are kept as their digit strings.
 */
export function parseApiJson(text: string): unknown {
  return parseLosslessJson(text, null, (value) =>
    isSafeNumber(value) ? Number(value) : value,
  );
}

function parseEnvelope(text: string): TiktokApiEnvelope | null {
  if (!text) return null;
  try {
    const parsed = envelopeSchema.safeParse(parseApiJson(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * POST a JSON body to an Open API endpoint and validate `data` against
 * `schema`. Every failure is thrown as an UploadError subclass.
 */
export async function postTiktokApi<T>(
  url: string,
  accessToken: string,
  body: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: RequestOptions,
): Promise<T> {
  const response = await sendRequest(
    url,
    {
      method: "POST",
      headers: {
        Authorization: `Bearer ${accessToken}`,
        "Content-Type": "application/json; charset=UTF-8",
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    },
    options,
  );

  const text = await response.text().catch(() => "");
  const envelope = parseEnvelope(text);
  const apiError = envelope?.error;

  if (apiError && apiError.code !== "ok") {
    throw classifyPlatformError(apiError.code, apiError.message, response.status);
  }
  if (!response.ok) {
    throw classifyHttpStatus(
      response.status,
      `TikTok API request failed with status ${response.status}: ${text || response.statusText}`,
    );
  }
  if (!envelope) {
    throw new RemoteRejectedError(`TikTok API returned a non-JSON body`, {
      status: response.status,
    });
  }

  const parsed = schema.safeParse(envelope.data);
  if (!parsed.success) {
    throw new RemoteRejectedError(
      `Unexpected TikTok API response: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "data"} ${issue.message}`)
        .join("; ")}`,
      { status: response.status },
    );
  }
  return parsed.data;
}
