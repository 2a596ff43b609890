import { z } from "zod";
import { postTiktokApi, type RequestOptions } from "./http.js";
import { errorMessage } from "./errors.js";
import type {
  AccessToken,
  PostInfo,
  PostMode,
  SourceInfo,
  UploadSession,
} from "./types.js";

const INIT_PATHS: Record<PostMode, string> = {
  direct: "/v2/post/publish/video/init/",
  inbox: "/v2/post/publish/inbox/video/init/",
};

const initResponseSchema = z.object({
  publish_id: z.string().min(1),
  upload_url: z.string().url(),
});

export interface InitializeOptions extends RequestOptions {
  apiBase: string;
  mode: PostMode;
}

/**
 * Request body for /video/init/. Inbox uploads become drafts, so they carry
 * no post_info at all.
 */
export function buildInitBody(
  source: SourceInfo,
  post: PostInfo,
  mode: PostMode,
): Record<string, unknown> {
  const sourceInfo = {
    source: "FILE_UPLOAD",
    video_size: source.videoSize,
    chunk_size: source.chunkSize,
    total_chunk_count: source.totalChunkCount,
  };

  if (mode === "inbox") {
    return { source_info: sourceInfo };
  }

  const postInfo: Record<string, unknown> = {
    title: post.title,
    privacy_level: post.privacyLevel,
    disable_duet: post.disableDuet,
    disable_comment: post.disableComment,
    disable_stitch: post.disableStitch,
    brand_content_toggle: post.brandContentToggle,
    brand_organic_toggle: post.brandOrganicToggle,
    is_aigc: post.isAigc,
  };
  if (post.videoCoverTimestampMs !== undefined) {
    postInfo.video_cover_timestamp_ms = post.videoCoverTimestampMs;
  }

  return { post_info: postInfo, source_info: sourceInfo };
}

/**
 * Open a FILE_UPLOAD session. One request, no retries here: the driver
 * decides whether a TransientNetworkError or AuthError is worth another try.
 */
export async function initializeUpload(
  token: AccessToken,
  source: SourceInfo,
  post: PostInfo,
  options: InitializeOptions,
): Promise<UploadSession> {
  try {
    const data = await postTiktokApi(
      `${options.apiBase}${INIT_PATHS[options.mode]}`,
      token.value,
      buildInitBody(source, post, options.mode),
      initResponseSchema,
      options,
    );

    console.log(
      `[TikTok] Upload session ${data.publish_id} opened for ${token.userId} (${source.totalChunkCount} chunks, ${source.videoSize} bytes)`,
    );

    return {
      publishId: data.publish_id,
      uploadUrl: data.upload_url,
      totalSize: source.videoSize,
      chunkSize: source.chunkSize,
      chunkCount: source.totalChunkCount,
      mode: options.mode,
      accessToken: token,
      status: "INITIALIZED",
    };
  } catch (error) {
    console.error("[TikTok] Video init error:", errorMessage(error));
    throw error;
  }
}
