#!/usr/bin/env node
import dotenv from "dotenv";
import { Chunker } from "./chunker.js";
import { loadConfig, type IndexerConfig } from "./config.js";
import { EmbeddingPipeline } from "./embeddingPipeline.js";
import type { EmbeddingPipelineOptions } from "./embeddingPipelineOptions.js";
import { AiSdkEmbeddingProvider, createEmbeddingModel } from "./embeddingProvider.js";
import { EmbeddingService } from "./embeddingService.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { PdfExtractor } from "./pdfExtractor.js";
import { acquireStoreLock } from "./storeLock.js";
import { VectorStore } from "./vectorStore.js";

dotenv.config();

/**
 * Main application entry point.
 * Loads configuration, initializes services, opens the store under its lock and runs the pipeline.
 * @returns The process exit code.
 */
async function main(argv: string[]): Promise<number> {
  let config: IndexerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(`Invalid configuration: ${errorMessage(error)}`);
    return 1;
  }

  const logger = createLogger({ level: config.logLevel, logDir: config.logDir });
  const documentPaths = argv.length > 0 ? argv : config.pdfPaths;

  try {
    // --- Service Initialization ---
    const chunker = new Chunker(config.chunking, logger);
    const embeddingModel = createEmbeddingModel(config.provider);
    const embeddingService = new EmbeddingService(
      new AiSdkEmbeddingProvider(embeddingModel, config.embeddingTimeoutMs),
      {
        dimensions: config.dimensions,
        batchSize: config.embeddingBatchSize,
        apiDelayMs: config.embeddingApiDelayMs,
        retryOptions: {
          maxAttempts: config.embeddingMaxAttempts,
          initialDelay: config.embeddingRetryInitialDelayMs,
        },
        logger,
      }
    );
    logger.info(
      `Services initialized (model ${config.provider.model}, chunk size ${chunker.size}, overlap ${chunker.overlap}, store ${config.storeDir}).`
    );

    // --- Run Pipeline ---
    const releaseLock = await acquireStoreLock(config.storeDir);
    try {
      const vectorStore = await VectorStore.open(config.storeDir, config.dimensions, logger);
      const pipelineOptions: EmbeddingPipelineOptions = {
        course: config.course,
        cleanOptions: config.cleaning,
        extractor: new PdfExtractor(),
        chunker,
        embeddingService,
        vectorStore,
        logger,
      };
      const result = await new EmbeddingPipeline(pipelineOptions).run(documentPaths);
      return result.status === "done" ? 0 : 1;
    } finally {
      await releaseLock();
    }
  } catch (error) {
    logger.fatal(`FATAL ERROR during indexing: ${errorMessage(error)}`);
    return 1;
  }
}

process.exitCode = await main(process.argv.slice(2));
