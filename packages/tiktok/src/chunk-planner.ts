import { ConstraintViolationError, InvalidInputError } from "./errors.js";
import type { ChunkConstraints, ChunkPlan, ChunkRange } from "./types.js";

const MiB = 1024 * 1024;

// Media Transfer guide: 5MB-64MB chunks, at most 1000 of them
export const DEFAULT_CHUNK_CONSTRAINTS: Readonly<ChunkConstraints> = {
  minChunk: 5 * MiB,
  maxChunk: 64 * MiB,
  maxChunks: 1000,
};

function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidInputError(`${name} must be a positive integer, got ${value}`);
  }
}

function range(index: number, start: number, size: number): ChunkRange {
  return { index, start, end: start + size - 1, size };
}

/**
 * Split `totalSize` bytes into ordered, contiguous byte ranges.
 *
 * Files up to `maxChunk` go as a single chunk. Larger files are cut into
 * `floor(totalSize / maxChunk)` pieces of `maxChunk` bytes and the last piece
 * takes the remainder, so `total_chunk_count` matches the Media Transfer rule.
 */
export function planChunks(
  totalSize: number,
  constraints: ChunkConstraints = DEFAULT_CHUNK_CONSTRAINTS,
): ChunkPlan {
  if (totalSize === 0) {
    throw new InvalidInputError("Cannot plan an upload for an empty file");
  }
  assertPositiveInteger(totalSize, "totalSize");

  const { minChunk, maxChunk, maxChunks } = constraints;
  assertPositiveInteger(minChunk, "minChunk");
  assertPositiveInteger(maxChunk, "maxChunk");
  assertPositiveInteger(maxChunks, "maxChunks");
  if (minChunk > maxChunk) {
    throw new InvalidInputError(
      `minChunk (${minChunk}) must not exceed maxChunk (${maxChunk})`,
    );
  }

  if (maxChunk * maxChunks < totalSize) {
    throw new ConstraintViolationError(
      `${totalSize} bytes cannot fit in ${maxChunks} chunks of at most ${maxChunk} bytes`,
    );
  }

  if (totalSize <= maxChunk) {
    return [range(0, 0, totalSize)];
  }

  const fullChunks = Math.floor(totalSize / maxChunk);
  const remainder = totalSize % maxChunk;
  const plan: ChunkRange[] = [];

  for (let index = 0; index < fullChunks; index++) {
    plan.push(range(index, index * maxChunk, maxChunk));
  }

  if (remainder > 0) {
    const last = plan[plan.length - 1];
    plan[plan.length - 1] = range(last.index, last.start, last.size + remainder);
  }

  return plan;
}

/** Sum of chunk sizes, for cross-checking a plan against a session */
export function plannedBytes(plan: ChunkPlan): number {
  return plan.reduce((total, chunk) => total + chunk.size, 0);
}
