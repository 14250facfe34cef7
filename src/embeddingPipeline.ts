import type { Chunk, Document } from "./chunk.js";
import type { EmbeddingPipelineOptions } from "./embeddingPipelineOptions.js";
import { DocumentUnreadableError, IndexingError, InvalidArgumentError } from "./errors.js";
import { timed } from "./stageTimer.js";
import { cleanText } from "./textCleaner.js";
import type { ChunkMetadata } from "./vectorStore.js";

export type PipelineStage = "extracting" | "cleaning" | "chunking" | "embedding" | "storing";
export type PipelineState = "idle" | PipelineStage | "done" | "failed";

/** Wall-clock duration in milliseconds of every stage that ran. */
export type StageDurations = Partial<Record<PipelineStage, number>>;

export type PipelineRunResult =
    | {
          status: "done";
          /** Ids the store assigned to this run's chunks, in chunk order. */
          assignedIds: number[];
          documentCount: number;
          chunkCount: number;
          /** Documents skipped as unreadable in a multi-document run. */
          skippedDocuments: string[];
          durations: StageDurations;
      }
    | {
          status: "failed";
          stage: PipelineStage;
          error: Error;
          durations: StageDurations;
      };

/**
 * Orchestrates one indexing run: extract → clean → chunk → embed → store.
 * Stages run strictly one after another. Any fatal error moves the run to `failed` and skips
 * the remaining stages, so nothing reaches the store unless every chunk was embedded.
 * All chunks of all documents of a run go into a single append.
 */
export class EmbeddingPipeline {
    private readonly options: EmbeddingPipelineOptions;
    private currentState: PipelineState = "idle";
    private history: PipelineState[] = [];

    constructor(options: EmbeddingPipelineOptions) {
        this.options = options;
    }

    get state(): PipelineState {
        return this.currentState;
    }

    /** States visited by the latest run, in order. */
    get transitions(): readonly PipelineState[] {
        return this.history;
    }

    /**
     * Executes the pipeline over the given documents.
     * Fatal errors do not reject the promise; they come back as a `failed` result naming the stage.
     */
    async run(documentPaths: readonly string[]): Promise<PipelineRunResult> {
        const { logger } = this.options;
        const durations: StageDurations = {};
        let activeStage: PipelineStage = "extracting";
        this.history = [];

        const stage = <T>(name: PipelineStage, work: () => Promise<T> | T): Promise<T> => {
            activeStage = name;
            this.enter(name);
            return timed(name, logger, work, durationMs => {
                durations[name] = durationMs;
            });
        };

        logger.info(`Starting embedding pipeline for ${documentPaths.length} documents...`);
        try {
            // 1. Read the raw text of every document
            const { documents, skippedDocuments } = await stage("extracting", () => this.extractDocuments(documentPaths));

            // 2. Normalize once per document so chunk offsets refer to the cleaned text
            const cleaned = await stage("cleaning", () => documents.map(document => this.cleanDocument(document)));

            // 3. Split into overlapping windows
            const chunks = await stage("chunking", () => cleaned.flatMap(document => this.options.chunker.chunkDocument(document)));
            logger.info(`Prepared ${chunks.length} chunks from ${cleaned.length} documents.`);

            // 4. Embed every chunk; a failure here ends the run before anything is stored
            const vectors = await stage("embedding", () => this.options.embeddingService.embed(chunks));

            // 5. One append for the whole run
            const assignedIds = await stage("storing", () =>
                this.options.vectorStore.append(vectors, chunks.map(chunk => this.toMetadata(chunk)))
            );

            this.enter("done");
            logger.info({ durations }, `Embedding pipeline completed successfully: ${assignedIds.length} entries stored.`);
            return {
                status: "done",
                assignedIds,
                documentCount: documents.length,
                chunkCount: chunks.length,
                skippedDocuments,
                durations,
            };
        } catch (caught) {
            const error = caught instanceof Error ? caught : new Error(String(caught));
            const kind = error instanceof IndexingError ? error.kind : error.name;
            this.enter("failed");
            logger.error({ stage: activeStage, kind, durations }, `Embedding pipeline failed during ${activeStage} (${kind}): ${error.message}`);
            return { status: "failed", stage: activeStage, error, durations };
        }
    }

    private enter(state: PipelineState): void {
        this.currentState = state;
        this.history.push(state);
    }

    /**
     * An unreadable document is skipped when the run has several documents and fatal when it
     * has one. A run where every document is unreadable fails with the last extraction error.
     */
    private async extractDocuments(
        documentPaths: readonly string[]
    ): Promise<{ documents: Document[]; skippedDocuments: string[] }> {
        if (documentPaths.length === 0) {
            throw new InvalidArgumentError("No documents were given to index.");
        }

        const documents: Document[] = [];
        const skippedDocuments: string[] = [];
        let lastFailure: DocumentUnreadableError | undefined;

        for (const documentPath of documentPaths) {
            try {
                const document = await this.options.extractor.extract(documentPath);
                this.options.logger.info(
                    `Extracted ${document.text.length} characters from ${document.pageCount} pages of ${document.sourceId}`
                );
                documents.push(document);
            } catch (error) {
                if (!(error instanceof DocumentUnreadableError) || documentPaths.length === 1) {
                    throw error;
                }
                this.options.logger.warn(`Skipping ${documentPath}: ${error.message}`);
                skippedDocuments.push(documentPath);
                lastFailure = error;
            }
        }

        if (documents.length === 0 && lastFailure) {
            throw lastFailure;
        }
        return { documents, skippedDocuments };
    }

    private cleanDocument(document: Document): Document {
        const text = cleanText(document.text, this.options.cleanOptions);
        this.options.logger.debug(`Preview of cleaned text of ${document.sourceId}: ${text.slice(0, 200)}`);
        return { ...document, text };
    }

    private toMetadata(chunk: Chunk): ChunkMetadata {
        const { course } = this.options;
        return {
            sourceId: chunk.sourceId,
            chunkIndex: chunk.chunkIndex,
            text: chunk.text,
            startOffset: chunk.startOffset,
            ...(course !== undefined ? { course } : {}),
        };
    }
}
