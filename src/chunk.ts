/**
 * A contiguous window of a document's cleaned text, the unit of embedding.
 */
export interface Chunk {
  /** The text content of the chunk. Never empty after trimming. */
  text: string;
  /** Character offset into the cleaned document text where the chunk begins. */
  startOffset: number;
  /** Identifier of the originating document. */
  sourceId: string;
  /** Position among the chunks of the same document, starting at 0. */
  chunkIndex: number;
}

/**
 * One document's text plus its source identifier. Lives for a single run.
 */
export interface Document {
  sourceId: string;
  text: string;
  pageCount: number;
}
