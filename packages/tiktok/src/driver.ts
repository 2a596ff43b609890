import type { Stats } from "node:fs";
import { stat } from "node:fs/promises";
import type { TokenProvider } from "./auth.js";
import { planChunks } from "./chunk-planner.js";
import type { UploaderConfig } from "./config.js";
import { getUploadConstraints, selectBestPrivacyLevel } from "./creator-info.js";
import {
  AuthError,
  ConstraintViolationError,
  IOError,
  InvalidInputError,
  errorMessage,
  isUploadError,
  type UploadErrorKind,
} from "./errors.js";
import { finalizeUpload } from "./finalizer.js";
import { buildTitle } from "./jobs.js";
import { withRetry, type Sleep } from "./retry.js";
import { initializeUpload } from "./session.js";
import { transmitChunks } from "./transmitter.js";
import type {
  AccessToken,
  ChunkPlan,
  FinalizeResult,
  PostInfo,
  PrivacyLevel,
  SourceInfo,
  TransmitResult,
  UploadConstraints,
  UploadJob,
  UploadSession,
} from "./types.js";

export type FailureKind = UploadErrorKind | "PublishFailed" | "Unexpected";

export interface FailureReason {
  kind: FailureKind;
  message: string;
  /** Set once a session was opened, so the upload can be looked up later */
  publishId?: string;
}

export type JobOutcome =
  | {
      success: true;
      publishId: string;
      privacyLevel: PrivacyLevel;
      publicPostIds?: string[];
    }
  | { success: false; reason: FailureReason };

export interface JobResult {
  job: UploadJob;
  outcome: JobOutcome;
}

/**
 * The network and file steps of one upload, injectable so the driver can be
 * exercised without a real file or API.
 */
export interface UploadSteps {
  fileSize(path: string): Promise<number>;
  getConstraints(token: AccessToken): Promise<UploadConstraints>;
  initialize(
    token: AccessToken,
    source: SourceInfo,
    post: PostInfo,
  ): Promise<UploadSession>;
  transmit(
    session: UploadSession,
    plan: ChunkPlan,
    filePath: string,
  ): Promise<TransmitResult>;
  finalize(session: UploadSession): Promise<FinalizeResult>;
}

export interface UploadDriverOptions {
  tokens: TokenProvider;
  steps: UploadSteps;
  maxRetries: number;
  retryBaseMs: number;
  sleep?: Sleep;
  now?: () => number;
}

export async function statVideoFile(path: string): Promise<number> {
  let info: Stats;
  try {
    info = await stat(path);
  } catch (error) {
    throw new IOError(`Video file not found: ${path} (${errorMessage(error)})`, {
      cause: error,
    });
  }
  if (!info.isFile()) {
    throw new InvalidInputError(`Not a regular file: ${path}`);
  }
  return info.size;
}

export function createUploadSteps(
  config: UploaderConfig,
  overrides: { sleep?: Sleep; now?: () => number } = {},
): UploadSteps {
  const request = { apiBase: config.apiBase, timeoutMs: config.requestTimeoutMs };

  return {
    fileSize: statVideoFile,
    getConstraints: (token) => getUploadConstraints(token, request),
    initialize: (token, source, post) =>
      initializeUpload(token, source, post, { ...request, mode: config.postMode }),
    transmit: (session, plan, filePath) =>
      transmitChunks(session, plan, filePath, {
        timeoutMs: config.requestTimeoutMs,
        maxRetries: config.maxRetries,
        retryBaseMs: config.retryBaseMs,
        sleep: overrides.sleep,
      }),
    finalize: (session) =>
      finalizeUpload(session, {
        ...request,
        pollIntervalMs: config.pollIntervalMs,
        pollTimeoutMs: config.pollTimeoutMs,
        sleep: overrides.sleep,
        now: overrides.now,
      }),
  };
}

/**
 * Creator settings win over job options: a creator with comments turned off
 * always posts with disable_comment.
 */
export function resolvePostInfo(
  job: UploadJob,
  constraints: UploadConstraints,
): PostInfo {
  const { post } = job;
  const allowed = constraints.privacyLevelOptions;

  if (
    post.privacyLevel !== undefined &&
    allowed.length > 0 &&
    !allowed.includes(post.privacyLevel)
  ) {
    throw new ConstraintViolationError(
      `Privacy level ${post.privacyLevel} is not available for ${job.userId} (allowed: ${allowed.join(", ")})`,
    );
  }

  if (
    post.durationSec !== undefined &&
    constraints.maxVideoPostDurationSec > 0 &&
    post.durationSec > constraints.maxVideoPostDurationSec
  ) {
    throw new ConstraintViolationError(
      `Video is ${post.durationSec}s long, ${job.userId} may post at most ${constraints.maxVideoPostDurationSec}s`,
    );
  }

  return {
    title: buildTitle(job.description, job.tags),
    privacyLevel: post.privacyLevel ?? selectBestPrivacyLevel(allowed),
    disableComment: constraints.commentDisabled || (post.disableComment ?? false),
    disableDuet: constraints.duetDisabled || (post.disableDuet ?? false),
    disableStitch: constraints.stitchDisabled || (post.disableStitch ?? false),
    brandContentToggle: post.brandContentToggle ?? false,
    brandOrganicToggle: post.brandOrganicToggle ?? false,
    isAigc: post.isAigc ?? false,
    videoCoverTimestampMs: post.videoCoverTimestampMs,
  };
}

export function toFailureReason(error: unknown, publishId?: string): FailureReason {
  if (isUploadError(error)) {
    return { kind: error.kind, message: error.message, publishId };
  }
  return { kind: "Unexpected", message: errorMessage(error), publishId };
}

/**
 * Runs upload jobs one after another. A failing job is recorded and the next
 * one starts; the run itself never throws for a job-level problem.
 */
export class UploadDriver {
  private readonly now: () => number;

  constructor(private readonly options: UploadDriverOptions) {
    this.now = options.now ?? Date.now;
  }

  async run(jobs: readonly UploadJob[]): Promise<JobResult[]> {
    const results: JobResult[] = [];

    for (const [index, job] of jobs.entries()) {
      console.log(
        `[Uploader] Job ${index + 1}/${jobs.length}: ${job.videoPath} for ${job.userId}`,
      );
      const outcome = await this.runJob(job);

      if (outcome.success) {
        console.log(
          `[Uploader] Job ${index + 1}/${jobs.length} published (publish_id: ${outcome.publishId})`,
        );
      } else {
        console.error(
          `[Uploader] Job ${index + 1}/${jobs.length} failed [${outcome.reason.kind}]: ${outcome.reason.message}`,
        );
      }
      results.push({ job, outcome });
    }

    return results;
  }

  private retryTransient<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      maxRetries: this.options.maxRetries,
      baseDelayMs: this.options.retryBaseMs,
      sleep: this.options.sleep,
      onRetry: (attempt, delayMs, error) => {
        console.warn(
          `[Uploader] ${label} attempt ${attempt} failed, retrying in ${delayMs}ms:`,
          errorMessage(error),
        );
      },
    });
  }

  private assertUsable(token: AccessToken): AccessToken {
    if (token.expiresAt.getTime() <= this.now()) {
      throw new AuthError(`Access token for ${token.userId} has expired`);
    }
    return token;
  }

  private async runJob(job: UploadJob): Promise<JobOutcome> {
    const { tokens, steps } = this.options;
    let publishId: string | undefined;

    try {
      const totalSize = await steps.fileSize(job.videoPath);
      let token = this.assertUsable(await tokens.getValidToken(job.userId));

      // One refresh per job, shared by every call made before the session exists
      let refreshed = false;
      const withAuthRetry = async <T>(
        label: string,
        fn: (token: AccessToken) => Promise<T>,
      ): Promise<T> => {
        try {
          return await this.retryTransient(label, () => fn(token));
        } catch (error) {
          if (!(error instanceof AuthError) || refreshed) throw error;
          refreshed = true;
          console.warn(
            `[Uploader] ${label} rejected the access token for ${job.userId}, refreshing once`,
          );
          token = this.assertUsable(await tokens.refreshToken(job.userId));
          return this.retryTransient(label, () => fn(token));
        }
      };

      const constraints = await withAuthRetry("Creator info", (t) =>
        steps.getConstraints(t),
      );
      const post = resolvePostInfo(job, constraints);
      const plan = planChunks(totalSize, constraints.chunk);
      const source: SourceInfo = {
        videoSize: totalSize,
        chunkSize: Math.min(totalSize, constraints.chunk.maxChunk),
        totalChunkCount: plan.length,
      };

      const session = await withAuthRetry("Init", (t) =>
        steps.initialize(t, source, post),
      );
      publishId = session.publishId;
      const sessionToken = token;

      const assertSameToken = () => {
        if (session.accessToken.value !== sessionToken.value) {
          throw new AuthError(
            `Access token for ${job.userId} changed during upload ${session.publishId}`,
          );
        }
      };

      assertSameToken();
      await steps.transmit(session, plan, job.videoPath);
      assertSameToken();

      const result = await steps.finalize(session);
      if (result.status === "FAILED") {
        return {
          success: false,
          reason: {
            kind: "PublishFailed",
            message: result.failReason ?? "Video publishing failed",
            publishId,
          },
        };
      }

      return {
        success: true,
        publishId: result.publishId,
        privacyLevel: post.privacyLevel,
        publicPostIds: result.publicPostIds,
      };
    } catch (error) {
      return { success: false, reason: toFailureReason(error, publishId) };
    }
  }
}
