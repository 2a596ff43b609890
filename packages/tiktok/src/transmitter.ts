import { open, type FileHandle } from "node:fs/promises";
import { plannedBytes } from "./chunk-planner.js";
import {
  ChunkUploadFailedError,
  IOError,
  InvalidInputError,
  RemoteRejectedError,
  errorMessage,
  isTransient,
} from "./errors.js";
import { classifyHttpStatus, sendRequest, type RequestOptions } from "./http.js";
import { withRetry, type Sleep } from "./retry.js";
import type {
  ChunkPlan,
  ChunkRange,
  TransmitResult,
  UploadSession,
} from "./types.js";

export interface TransmitOptions extends RequestOptions {
  maxRetries: number;
  retryBaseMs: number;
  sleep?: Sleep;
}

export function contentRange(chunk: ChunkRange, totalSize: number): string {
  return `bytes ${chunk.start}-${chunk.end}/${totalSize}`;
}

/**
 * Read exactly `chunk.size` bytes at `chunk.start`. Positional reads leave
 * the handle's cursor alone, so no seek is shared between chunks.
 */
export async function readChunk(
  handle: FileHandle,
  chunk: ChunkRange,
): Promise<Buffer> {
  const buffer = Buffer.alloc(chunk.size);
  let bytesRead: number;
  try {
    ({ bytesRead } = await handle.read(buffer, 0, chunk.size, chunk.start));
  } catch (error) {
    throw new IOError(`Failed to read chunk ${chunk.index}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (bytesRead !== chunk.size) {
    throw new IOError(
      `Chunk ${chunk.index} expected ${chunk.size} bytes at offset ${chunk.start}, read ${bytesRead}`,
    );
  }
  return buffer;
}

/**
 * PUT one chunk. Returns the HTTP status: 206 while more chunks are
 * expected, 201 once TikTok has the whole file.
 */
async function putChunk(
  session: UploadSession,
  chunk: ChunkRange,
  body: Buffer,
  options: RequestOptions,
): Promise<number> {
  const response = await sendRequest(
    session.uploadUrl,
    {
      method: "PUT",
      headers: {
        "Content-Range": contentRange(chunk, session.totalSize),
        "Content-Length": String(chunk.size),
        "Content-Type": "video/mp4",
      },
      body,
    },
    options,
  );

  if (!response.ok) {
    const text = await response.text().catch(() => "");
    throw classifyHttpStatus(
      response.status,
      `Chunk ${chunk.index} upload failed with status ${response.status}${text ? `: ${text}` : ""}`,
    );
  }
  return response.status;
}

function assertPlanMatchesSession(session: UploadSession, plan: ChunkPlan): void {
  if (plan.length !== session.chunkCount) {
    throw new InvalidInputError(
      `Plan has ${plan.length} chunks but session ${session.publishId} expects ${session.chunkCount}`,
    );
  }
  const total = plannedBytes(plan);
  if (total !== session.totalSize) {
    throw new InvalidInputError(
      `Plan covers ${total} bytes but session ${session.publishId} expects ${session.totalSize}`,
    );
  }
}

/**
 * Upload every chunk of the plan in order. Each chunk is retried on its own
 * after transient failures; running out of retries aborts the whole upload.
 */
export async function transmitChunks(
  session: UploadSession,
  plan: ChunkPlan,
  filePath: string,
  options: TransmitOptions,
): Promise<TransmitResult> {
  assertPlanMatchesSession(session, plan);

  let handle: FileHandle;
  try {
    handle = await open(filePath, "r");
  } catch (error) {
    throw new IOError(`Cannot open ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let chunksSent = 0;
  let uploadComplete = false;

  try {
    for (const chunk of plan) {
      const body = await readChunk(handle, chunk);
      const isLast = chunk.index === plan.length - 1;

      let attempts = 0;
      const status = await withRetry(
        (attempt) => {
          attempts = attempt;
          return putChunk(session, chunk, body, options);
        },
        {
          maxRetries: options.maxRetries,
          baseDelayMs: options.retryBaseMs,
          sleep: options.sleep,
          onRetry: (attempt, delayMs, error) => {
            console.warn(
              `[TikTok] Chunk ${chunk.index + 1}/${plan.length} attempt ${attempt} failed, retrying in ${delayMs}ms:`,
              errorMessage(error),
            );
          },
        },
      ).catch((error: unknown) => {
        if (isTransient(error)) {
          throw new ChunkUploadFailedError(chunk.index, attempts, error);
        }
        throw error;
      });

      chunksSent++;
      if (session.status === "INITIALIZED") {
        session.status = "UPLOADING";
      }

      if (status === 201) {
        if (!isLast) {
          throw new RemoteRejectedError(
            `Upload ${session.publishId} reported complete after chunk ${chunk.index + 1}/${plan.length}`,
            { status },
          );
        }
        uploadComplete = true;
        session.status = "PROCESSING";
      }

      console.log(
        `[TikTok] Chunk ${chunk.index + 1}/${plan.length} uploaded (${contentRange(chunk, session.totalSize)})`,
      );
    }
  } finally {
    // A failed close must not replace the upload error being thrown
    await handle.close().catch((error: unknown) => {
      console.warn(`[TikTok] Failed to close ${filePath}:`, errorMessage(error));
    });
  }

  return { chunksSent, uploadComplete };
}
