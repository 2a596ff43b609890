import { z } from "zod";
import { postTiktokApi, type RequestOptions } from "./http.js";
import { TimeoutError, errorMessage, isTransient } from "./errors.js";
import { sleep as defaultSleep, type Sleep } from "./retry.js";
import type { FinalizeResult, UploadSession } from "./types.js";

const publishStatusSchema = z.object({
  status: z.string(),
  fail_reason: z.string().optional(),
  publicaly_available_post_id: z
    .array(z.union([z.string(), z.number().transform(String)]))
    .optional(),
});

export type PublishStatusData = z.infer<typeof publishStatusSchema>;

export interface FinalizeOptions extends RequestOptions {
  apiBase: string;
  pollIntervalMs: number;
  pollTimeoutMs: number;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Fetch the publish status once (no polling).
 */
export async function fetchPublishStatus(
  session: UploadSession,
  options: Pick<FinalizeOptions, "apiBase" | "timeoutMs">,
): Promise<PublishStatusData> {
  return postTiktokApi(
    `${options.apiBase}/v2/post/publish/status/fetch/`,
    session.accessToken.value,
    { publish_id: session.publishId },
    publishStatusSchema,
    options,
  );
}

function isPublished(session: UploadSession, status: string): boolean {
  if (status === "PUBLISH_COMPLETE") return true;
  // Drafts never get past the creator's inbox
  return session.mode === "inbox" && status === "SEND_TO_USER_INBOX";
}

/**
 * Poll publish status until PUBLISH_COMPLETE / FAILED, or throw TimeoutError
 * once `pollTimeoutMs` has passed without a terminal status.
 *
 * PROCESSING_UPLOAD, PROCESSING_DOWNLOAD, SEND_TO_USER_INBOX keep polling.
 */
export async function finalizeUpload(
  session: UploadSession,
  options: FinalizeOptions,
): Promise<FinalizeResult> {
  const wait = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;
  const startedAt = now();
  let lastStatus = "UNKNOWN";

  session.status = "PROCESSING";

  while (now() - startedAt < options.pollTimeoutMs) {
    await wait(options.pollIntervalMs);

    let data: PublishStatusData;
    try {
      data = await fetchPublishStatus(session, options);
    } catch (error) {
      if (!isTransient(error)) {
        console.error("[TikTok] Status poll error:", errorMessage(error));
        throw error;
      }
      console.warn(
        `[TikTok] Status poll for ${session.publishId} failed, will retry:`,
        errorMessage(error),
      );
      continue;
    }

    lastStatus = data.status;

    if (isPublished(session, data.status)) {
      session.status = "PUBLISHED";
      return {
        status: "PUBLISHED",
        publishId: session.publishId,
        publicPostIds: data.publicaly_available_post_id,
      };
    }

    if (data.status === "FAILED") {
      session.status = "FAILED";
      return {
        status: "FAILED",
        publishId: session.publishId,
        failReason: data.fail_reason || "Video publishing failed",
      };
    }
  }

  throw new TimeoutError(session.publishId, now() - startedAt, lastStatus);
}
