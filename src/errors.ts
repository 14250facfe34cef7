/**
 * Error kinds raised by the indexing pipeline.
 * The driver reports `kind` alongside the stage that failed.
 */
export type IndexingErrorKind =
  | "InvalidConfig"
  | "DocumentUnreadable"
  | "EmbeddingUnavailable"
  | "EmbeddingRejected"
  | "EmbeddingShapeError"
  | "InvalidArgument"
  | "DimensionMismatch"
  | "StoreCorrupted"
  | "StoreLocked";

/**
 * Base class for every error the pipeline raises on purpose.
 */
export abstract class IndexingError extends Error {
  abstract readonly kind: IndexingErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    // Keeps instanceof working on subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/** Chunking or environment parameters that cannot work. */
export class InvalidConfigError extends IndexingError {
  readonly kind = "InvalidConfig";
}

/** A document could not be read or parsed as a PDF. */
export class DocumentUnreadableError extends IndexingError {
  readonly kind = "DocumentUnreadable";

  constructor(readonly sourceId: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Document '${sourceId}' is unreadable: ${reason}`, { cause });
  }
}

/** Identifies a chunk in error messages without carrying its text. */
export interface ChunkRef {
  sourceId: string;
  chunkIndex: number;
}

const formatChunkRefs = (refs: readonly ChunkRef[]): string =>
  refs.map(ref => `${ref.sourceId}#${ref.chunkIndex}`).join(", ");

/**
 * The provider kept failing with transient errors until the retry ceiling was hit.
 */
export class EmbeddingUnavailableError extends IndexingError {
  readonly kind = "EmbeddingUnavailable";

  constructor(readonly chunks: readonly ChunkRef[], readonly attempts: number, cause: Error) {
    super(
      `Embedding provider unavailable after ${attempts} attempts for chunks [${formatChunkRefs(chunks)}]: ${cause.message}`,
      { cause }
    );
  }

  get chunkIndices(): number[] {
    return this.chunks.map(ref => ref.chunkIndex);
  }
}

/** The provider refused the request (authentication, malformed input). Never retried. */
export class EmbeddingRejectedError extends IndexingError {
  readonly kind = "EmbeddingRejected";

  constructor(readonly chunks: readonly ChunkRef[], cause: Error) {
    super(`Embedding provider rejected chunks [${formatChunkRefs(chunks)}]: ${cause.message}`, { cause });
  }
}

/** The provider answered with the wrong number of vectors or vectors of the wrong shape. */
export class EmbeddingShapeError extends IndexingError {
  readonly kind = "EmbeddingShapeError";
}

export class InvalidArgumentError extends IndexingError {
  readonly kind = "InvalidArgument";
}

export class DimensionMismatchError extends IndexingError {
  readonly kind = "DimensionMismatch";

  constructor(readonly expected: number, readonly actual: number, context: string) {
    super(`Dimension mismatch (${context}): expected ${expected}, got ${actual}`);
  }
}

/** The persisted index and metadata table disagree, or one of them is missing or malformed. */
export class StoreCorruptedError extends IndexingError {
  readonly kind = "StoreCorrupted";
}

export class StoreLockedError extends IndexingError {
  readonly kind = "StoreLocked";

  constructor(readonly lockPath: string) {
    super(`Vector store is locked by another run (lock file: ${lockPath})`);
  }
}

/** Extracts a printable message from anything thrown. */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
