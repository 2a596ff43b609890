import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { z } from "zod";
import { IOError, InvalidInputError, errorMessage } from "./errors.js";
import { PRIVACY_LEVELS, type UploadJob } from "./types.js";

const jobSchema = z.object({
  user_id: z.string().min(1),
  video_path: z.string().min(1),
  description: z.string(),
  tags: z.array(z.string()).default([]),
  privacy_level: z.enum(PRIVACY_LEVELS).optional(),
  disable_comment: z.boolean().optional(),
  disable_duet: z.boolean().optional(),
  disable_stitch: z.boolean().optional(),
  video_cover_timestamp_ms: z.number().int().nonnegative().optional(),
  brand_content_toggle: z.boolean().optional(),
  brand_organic_toggle: z.boolean().optional(),
  is_aigc: z.boolean().optional(),
  duration_sec: z.number().positive().optional(),
});

export type JobEntry = z.infer<typeof jobSchema>;

/** A queue entry that failed validation and was never run */
export interface RejectedJob {
  index: number;
  error: InvalidInputError;
}

export interface LoadedJobs {
  jobs: UploadJob[];
  rejected: RejectedJob[];
}

/**
 * Post title: the description followed by the tags as hashtags.
 */
export function buildTitle(description: string, tags: readonly string[]): string {
  const hashtags = tags
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0)
    .map((tag) => (tag.startsWith("#") ? tag : `#${tag}`));

  return [description.trim(), ...hashtags].filter((part) => part.length > 0).join(" ");
}

function toUploadJob(entry: JobEntry, baseDir: string): UploadJob {
  return {
    userId: entry.user_id,
    videoPath: isAbsolute(entry.video_path)
      ? entry.video_path
      : resolve(baseDir, entry.video_path),
    description: entry.description,
    tags: entry.tags,
    post: {
      privacyLevel: entry.privacy_level,
      disableComment: entry.disable_comment,
      disableDuet: entry.disable_duet,
      disableStitch: entry.disable_stitch,
      videoCoverTimestampMs: entry.video_cover_timestamp_ms,
      brandContentToggle: entry.brand_content_toggle,
      brandOrganicToggle: entry.brand_organic_toggle,
      isAigc: entry.is_aigc,
      durationSec: entry.duration_sec,
    },
  };
}

/**
 * Validate a decoded job queue. Bad entries are rejected one by one;
 * a document that is not an array rejects the whole queue.
 */
export function parseJobs(raw: unknown, baseDir: string): LoadedJobs {
  if (!Array.isArray(raw)) {
    throw new InvalidInputError("Job queue must be a JSON array of upload jobs");
  }

  const jobs: UploadJob[] = [];
  const rejected: RejectedJob[] = [];

  raw.forEach((item: unknown, index) => {
    const parsed = jobSchema.safeParse(item);
    if (parsed.success) {
      jobs.push(toUploadJob(parsed.data, baseDir));
      return;
    }
    rejected.push({
      index,
      error: new InvalidInputError(
        `Job #${index} is malformed: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "entry"} ${issue.message}`)
          .join("; ")}`,
      ),
    });
  });

  return { jobs, rejected };
}

export async function loadJobs(filePath: string): Promise<LoadedJobs> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new IOError(`Cannot read job queue ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new InvalidInputError(`Job queue ${filePath} is not valid JSON`, {
      cause: error,
    });
  }

  return parseJobs(raw, dirname(resolve(filePath)));
}
