import type { Logger } from "pino";
import type { Chunk } from "./chunk.js";
import { isTransientEmbeddingError, type EmbeddingProvider } from "./embeddingProvider.js";
import {
    type ChunkRef,
    EmbeddingRejectedError,
    EmbeddingShapeError,
    EmbeddingUnavailableError,
    InvalidConfigError,
} from "./errors.js";
import { retry } from "./retry.js";
import type { RetryOptions } from "./retryOptions.js";

export type EmbeddingVector = number[];

export interface EmbeddingServiceOptions {
    /** Width every returned vector must have. */
    dimensions: number;
    /** The number of chunks to embed in a single API call. */
    batchSize?: number;
    /** Delay in milliseconds between consecutive batch API calls. */
    apiDelayMs?: number;
    /** Retry policy for transient provider failures. */
    retryOptions?: Partial<Omit<RetryOptions, "isRetryable" | "onRetry">>;
    logger: Logger;
}

/**
 * Service responsible for generating embeddings for chunks through an {@link EmbeddingProvider}.
 * Handles batching, delays, retries and shape validation.
 */
export class EmbeddingService {
    private readonly dimensions: number;
    private readonly batchSize: number;
    private readonly apiDelayMs: number;
    private readonly retryOptions: Partial<RetryOptions>;
    private readonly logger: Logger;

    constructor(private readonly provider: EmbeddingProvider, options: EmbeddingServiceOptions) {
        this.dimensions = options.dimensions;
        this.batchSize = options.batchSize ?? 16;
        this.apiDelayMs = options.apiDelayMs ?? 0;
        this.retryOptions = { maxAttempts: 3, initialDelay: 1000, ...options.retryOptions };
        this.logger = options.logger;
    }

    /**
     * Embeds chunks in order. `result[i]` is the vector of `chunks[i]`.
     * Batches are sent one after another, never concurrently.
     * @throws {EmbeddingUnavailableError} when a batch keeps failing transiently past the retry ceiling.
     * @throws {EmbeddingRejectedError} when the provider refuses a batch.
     * @throws {EmbeddingShapeError} when a batch comes back with the wrong count or width.
     */
    async embed(chunks: readonly Chunk[], batchSize: number = this.batchSize): Promise<EmbeddingVector[]> {
        if (!Number.isInteger(batchSize) || batchSize <= 0) {
            throw new InvalidConfigError(`Embedding batch size must be a positive integer, got ${batchSize}`);
        }
        if (chunks.length === 0) {
            return [];
        }

        const totalBatches = Math.ceil(chunks.length / batchSize);
        this.logger.info(
            `Embedding ${chunks.length} chunks with ${this.provider.modelId} in ${totalBatches} batches of up to ${batchSize} (Delay: ${this.apiDelayMs}ms)`
        );
        const allEmbeddings: EmbeddingVector[] = [];

        for (let i = 0; i < chunks.length; i += batchSize) {
            const batch = chunks.slice(i, i + batchSize);
            const batchNumber = Math.floor(i / batchSize) + 1;

            allEmbeddings.push(...(await this.embedBatch(batch, batchNumber, totalBatches)));

            if (this.apiDelayMs > 0 && i + batchSize < chunks.length) {
                await new Promise(resolve => setTimeout(resolve, this.apiDelayMs));
            }
        }

        this.logger.info(`Successfully generated ${allEmbeddings.length} embeddings.`);
        return allEmbeddings;
    }

    private async embedBatch(batch: readonly Chunk[], batchNumber: number, totalBatches: number): Promise<EmbeddingVector[]> {
        const refs: ChunkRef[] = batch.map(({ sourceId, chunkIndex }) => ({ sourceId, chunkIndex }));
        const texts = batch.map(chunk => chunk.text);
        const startedAt = performance.now();

        const outcome = await retry(() => this.provider.embedBatch(texts), {
            ...this.retryOptions,
            isRetryable: isTransientEmbeddingError,
            onRetry: (error, attempt, delayMs) => {
                this.logger.warn(
                    `Retry attempt ${attempt} for batch ${batchNumber}/${totalBatches} (size ${batch.length}) in ${Math.round(delayMs)}ms: ${error.message}`
                );
            },
        });
        const durationMs = Math.round(performance.now() - startedAt);

        if (!outcome.ok) {
            this.logger.error(
                { batch: batchNumber, size: batch.length, attempts: outcome.attempts, durationMs },
                `Embedding batch ${batchNumber}/${totalBatches} failed (${outcome.reason}): ${outcome.error.message}`
            );
            throw outcome.reason === "exhausted"
                ? new EmbeddingUnavailableError(refs, outcome.attempts, outcome.error)
                : new EmbeddingRejectedError(refs, outcome.error);
        }

        this.validateBatch(outcome.value, batch.length, batchNumber);
        this.logger.info(
            { batch: batchNumber, size: batch.length, attempts: outcome.attempts, durationMs },
            `Embedded batch ${batchNumber}/${totalBatches} in ${durationMs}ms`
        );
        return outcome.value;
    }

    private validateBatch(vectors: number[][], expectedCount: number, batchNumber: number): void {
        if (vectors.length !== expectedCount) {
            throw new EmbeddingShapeError(
                `Embedding count mismatch in batch ${batchNumber}: expected ${expectedCount}, got ${vectors.length}`
            );
        }
        vectors.forEach((vector, position) => {
            if (vector.length !== this.dimensions) {
                throw new EmbeddingShapeError(
                    `Vector ${position} of batch ${batchNumber} has ${vector.length} dimensions, expected ${this.dimensions}`
                );
            }
            if (!vector.every(Number.isFinite)) {
                throw new EmbeddingShapeError(`Vector ${position} of batch ${batchNumber} contains non-finite values`);
            }
        });
    }
}
