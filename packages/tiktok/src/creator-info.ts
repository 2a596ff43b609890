import { z } from "zod";
import { DEFAULT_CHUNK_CONSTRAINTS } from "./chunk-planner.js";
import { postTiktokApi, type RequestOptions } from "./http.js";
import { errorMessage } from "./errors.js";
import {
  PRIVACY_LEVELS,
  type AccessToken,
  type PrivacyLevel,
  type TiktokCreatorInfo,
  type UploadConstraints,
} from "./types.js";

const PRIVACY_LEVEL_PRIORITY: readonly PrivacyLevel[] = PRIVACY_LEVELS;

const creatorInfoSchema = z.object({
  creator_avatar_url: z.string().default(""),
  creator_nickname: z.string().default(""),
  privacy_level_options: z.array(z.string()).default([]),
  comment_disabled: z.boolean().default(false),
  duet_disabled: z.boolean().default(false),
  stitch_disabled: z.boolean().default(false),
  max_video_post_duration_sec: z.number().nonnegative().default(0),
});

export interface CreatorInfoOptions extends RequestOptions {
  apiBase: string;
}

function isPrivacyLevel(value: string): value is PrivacyLevel {
  return PRIVACY_LEVELS.some((level) => level === value);
}

/**
 * Query creator info to get available privacy level options.
 * Posting fails unless the request metadata matches these settings.
 */
export async function queryCreatorInfo(
  token: AccessToken,
  options: CreatorInfoOptions,
): Promise<TiktokCreatorInfo> {
  try {
    const data = await postTiktokApi(
      `${options.apiBase}/v2/post/publish/creator_info/query/`,
      token.value,
      undefined,
      creatorInfoSchema,
      options,
    );

    return {
      creatorAvatarUrl: data.creator_avatar_url,
      creatorNickname: data.creator_nickname,
      privacyLevelOptions: data.privacy_level_options.filter(isPrivacyLevel),
      commentDisabled: data.comment_disabled,
      duetDisabled: data.duet_disabled,
      stitchDisabled: data.stitch_disabled,
      maxVideoPostDurationSec: data.max_video_post_duration_sec,
    };
  } catch (error) {
    console.error(
      `[TikTok] Creator info query error (${token.userId}):`,
      errorMessage(error),
    );
    throw error;
  }
}

/**
 * Select the most public privacy level from available options
 */
export function selectBestPrivacyLevel(
  options: readonly PrivacyLevel[],
): PrivacyLevel {
  for (const level of PRIVACY_LEVEL_PRIORITY) {
    if (options.includes(level)) {
      return level;
    }
  }
  return options[0] ?? "SELF_ONLY";
}

/**
 * Upload constraints for one creator: the Media Transfer chunk limits plus
 * the profile settings the post has to respect.
 */
export async function getUploadConstraints(
  token: AccessToken,
  options: CreatorInfoOptions,
): Promise<UploadConstraints> {
  const info = await queryCreatorInfo(token, options);
  return {
    chunk: { ...DEFAULT_CHUNK_CONSTRAINTS },
    maxVideoPostDurationSec: info.maxVideoPostDurationSec,
    privacyLevelOptions: info.privacyLevelOptions,
    commentDisabled: info.commentDisabled,
    duetDisabled: info.duetDisabled,
    stitchDisabled: info.stitchDisabled,
  };
}
