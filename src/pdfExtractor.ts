import { readFile } from "fs/promises";
import type { Document } from "./chunk.js";
import { DocumentUnreadableError } from "./errors.js";

/**
 * Source of raw document text for the pipeline.
 */
export interface DocumentExtractor {
  /**
   * @throws {DocumentUnreadableError} for missing, corrupt or non-PDF files.
   */
  extract(filePath: string): Promise<Document>;
}

/**
 * Extracts text from PDF files with Mozilla's pdfjs-dist.
 * The library is loaded on first use; the legacy build is the one that runs on Node.js.
 */
export class PdfExtractor implements DocumentExtractor {
  async extract(filePath: string): Promise<Document> {
    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(await readFile(filePath));
    } catch (error) {
      throw new DocumentUnreadableError(filePath, error);
    }

    try {
      const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
      const pdfDocument = await pdfjs.getDocument({ data: bytes, isEvalSupported: false, verbosity: 0 }).promise;

      try {
        const pageTexts: string[] = [];
        for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
          const page = await pdfDocument.getPage(pageNum);
          const textContent = await page.getTextContent();
          // Marked-content entries carry no text
          const pageText = textContent.items
            .map(item => ("str" in item ? item.str + (item.hasEOL ? "\n" : " ") : ""))
            .join("");
          pageTexts.push(pageText);
          page.cleanup();
        }

        return { sourceId: filePath, text: pageTexts.join("\n"), pageCount: pdfDocument.numPages };
      } finally {
        await pdfDocument.destroy();
      }
    } catch (error) {
      throw new DocumentUnreadableError(filePath, error);
    }
  }
}
