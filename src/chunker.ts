import type { Logger } from "pino";
import type { Chunk, Document } from "./chunk.js";
import { type ChunkingOptions, DEFAULT_CHUNKING_OPTIONS, validateChunkingOptions } from "./chunkOptions.js";

/**
 * Splits `text` into fixed-size character windows that overlap by `overlap` characters.
 *
 * Window `i` starts at `i * (size - overlap)` and spans up to `size` characters. The
 * sequence ends with the first window that reaches the end of the text, so the last
 * chunk may be shorter than `size`. Windows that are empty or whitespace-only are
 * dropped and do not consume a chunk index.
 *
 * The returned iterable is lazy and restartable: each iteration walks the text again.
 *
 * @throws {InvalidConfigError} eagerly, before iteration, for unusable window parameters.
 */
export function chunkText(text: string, options: ChunkingOptions, sourceId: string = ""): Iterable<Chunk> {
  const { size, overlap } = validateChunkingOptions(options);
  const step = size - overlap;

  return {
    *[Symbol.iterator](): Iterator<Chunk> {
      let chunkIndex = 0;
      for (let start = 0; start < text.length; start += step) {
        const end = Math.min(start + size, text.length);
        const window = text.slice(start, end);
        if (window.trim().length > 0) {
          yield { text: window, startOffset: start, sourceId, chunkIndex: chunkIndex++ };
        }
        if (end === text.length) {
          return;
        }
      }
    },
  };
}

/**
 * Chunks cleaned documents with one fixed window configuration.
 */
export class Chunker {
    private readonly options: ChunkingOptions;

    /**
     * @param options Window parameters; validated here so a bad configuration fails before any document is read.
     * @param logger Receives one record per chunked document.
     */
    constructor(options: Partial<ChunkingOptions> = {}, private readonly logger?: Logger) {
        this.options = validateChunkingOptions({ ...DEFAULT_CHUNKING_OPTIONS, ...options });
    }

    get size(): number {
        return this.options.size;
    }

    get overlap(): number {
        return this.options.overlap;
    }

    /** Lazily chunks one document's cleaned text. */
    chunk(text: string, sourceId: string): Iterable<Chunk> {
        return chunkText(text, this.options, sourceId);
    }

    /** Chunks one document and materializes the result. */
    chunkDocument(document: Document): Chunk[] {
        const chunks = Array.from(this.chunk(document.text, document.sourceId));
        this.logger?.info(
            { sourceId: document.sourceId, chunks: chunks.length, size: this.options.size, overlap: this.options.overlap },
            `Chunked ${document.sourceId} into ${chunks.length} chunks`
        );
        return chunks;
    }
}
