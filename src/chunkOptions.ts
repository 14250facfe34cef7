import { InvalidConfigError } from "./errors.js";

/**
 * Window parameters for fixed-size character chunking.
 */
export interface ChunkingOptions {
  /** Maximum number of characters per chunk. */
  size: number;
  /** Number of characters shared by consecutive chunks. */
  overlap: number;
}

export const DEFAULT_CHUNKING_OPTIONS: ChunkingOptions = {
  size: 500,
  overlap: 50,
};

/**
 * Rejects parameters under which the window start would not advance.
 * @throws {InvalidConfigError} when `size <= 0`, `overlap < 0` or `overlap >= size`.
 */
export function validateChunkingOptions(options: ChunkingOptions): ChunkingOptions {
  const { size, overlap } = options;
  if (!Number.isInteger(size) || size <= 0) {
    throw new InvalidConfigError(`Chunk size must be a positive integer, got ${size}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw new InvalidConfigError(`Chunk overlap must be a non-negative integer, got ${overlap}`);
  }
  if (overlap >= size) {
    throw new InvalidConfigError(`Chunk overlap (${overlap}) must be smaller than chunk size (${size})`);
  }
  return { size, overlap };
}
