/**
 * Shared test doubles. Nothing here reaches the network or the real PDF parser.
 */

import { mkdtemp, rm } from "fs/promises";
import * as os from "os";
import * as path from "path";
import type { Document } from "../chunk.js";
import type { EmbeddingProvider } from "../embeddingProvider.js";
import { DocumentUnreadableError } from "../errors.js";
import type { DocumentExtractor } from "../pdfExtractor.js";

/** Deterministic vector for a text: its length, its first character code, then ones. */
export const vectorFor = (text: string, dimensions: number): number[] =>
  Array.from({ length: dimensions }, (_, i) => (i === 0 ? text.length : i === 1 ? text.charCodeAt(0) : 1));

/**
 * In-process embedding provider. Records every batch it receives and throws the queued
 * failures, one per call, before answering normally.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly modelId = "fake-embedding-model";
  readonly calls: string[][] = [];
  readonly failures: Error[] = [];

  constructor(
    private readonly dimensions: number,
    private readonly respond: (texts: string[], dimensions: number) => number[][] = (texts, dims) =>
      texts.map(text => vectorFor(text, dims))
  ) {}

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
    return this.respond(texts, this.dimensions);
  }
}

/** Serves fixed texts by path; any other path is unreadable. */
export class FakeExtractor implements DocumentExtractor {
  constructor(private readonly texts: Record<string, string>) {}

  async extract(filePath: string): Promise<Document> {
    if (!(filePath in this.texts)) {
      throw new DocumentUnreadableError(filePath, new Error("not a PDF file"));
    }
    return { sourceId: filePath, text: this.texts[filePath], pageCount: 1 };
  }
}

/**
 * Builds a one-page PDF that shows `text` in Helvetica, with a correct cross-reference table.
 * `text` must not contain parentheses or backslashes.
 */
export function minimalPdf(text: string): Buffer {
  const content = `BT /F1 18 Tf 36 72 Td (${text}) Tj ET`;
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 300 144] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>",
    `<< /Length ${Buffer.byteLength(content, "latin1")} >>\nstream\n${content}\nendstream`,
    "<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>",
  ];

  let pdf = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(Buffer.byteLength(pdf, "latin1"));
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xrefOffset = Buffer.byteLength(pdf, "latin1");
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  pdf += offsets.map(offset => `${String(offset).padStart(10, "0")} 00000 n \n`).join("");
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(pdf, "latin1");
}

/** Creates a fresh temporary directory and returns it with its cleanup. */
export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "pdf-indexer-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
