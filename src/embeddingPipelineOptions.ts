import type { Logger } from "pino";
import type { Chunker } from "./chunker.js";
import type { EmbeddingService } from "./embeddingService.js";
import type { DocumentExtractor } from "./pdfExtractor.js";
import type { CleanTextOptions } from "./textCleaner.js";
import type { VectorStore } from "./vectorStore.js";

/**
 * Defines the configuration and dependency injection options
 * required by the EmbeddingPipeline.
 */
export interface EmbeddingPipelineOptions {
    /** Course tag written into the metadata of every chunk of the run. */
    course?: string;
    /** Options for the text normalization applied before chunking. */
    cleanOptions?: CleanTextOptions;

    // --- Injected Dependencies ---
    /** Reads raw text out of source documents. */
    extractor: DocumentExtractor;
    /** Splits cleaned text into overlapping windows. */
    chunker: Chunker;
    /** Generates chunk embeddings using an external model. */
    embeddingService: EmbeddingService;
    /** Receives the run's single append. */
    vectorStore: VectorStore;
    logger: Logger;
}
