import { describe, it, expect } from "vitest";
import { Chunker, chunkText } from "../chunker.js";
import { InvalidConfigError } from "../errors.js";

const ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789!";

describe("chunkText", () => {
  it("splits ABCDEFGHIJ into overlapping windows", () => {
    const chunks = Array.from(chunkText("ABCDEFGHIJ", { size: 4, overlap: 1 }, "letters.pdf"));

    expect(chunks).toEqual([
      { text: "ABCD", startOffset: 0, sourceId: "letters.pdf", chunkIndex: 0 },
      { text: "DEFG", startOffset: 3, sourceId: "letters.pdf", chunkIndex: 1 },
      { text: "GHIJ", startOffset: 6, sourceId: "letters.pdf", chunkIndex: 2 },
    ]);
  });

  it.each([
    [5, 0],
    [5, 2],
    [8, 7],
    [10, 3],
    [37, 5],
    [50, 10],
  ])("covers the whole text without gaps for size %i and overlap %i", (size, overlap) => {
    const chunks = Array.from(chunkText(ALPHABET, { size, overlap }));

    expect(chunks[0].startOffset).toBe(0);
    const last = chunks[chunks.length - 1];
    expect(last.startOffset + last.text.length).toBe(ALPHABET.length);

    for (let i = 0; i < chunks.length; i++) {
      const chunk = chunks[i];
      expect(chunk.chunkIndex).toBe(i);
      expect(chunk.text).toBe(ALPHABET.slice(chunk.startOffset, chunk.startOffset + chunk.text.length));
      if (i < chunks.length - 1) {
        const next = chunks[i + 1];
        expect(chunk.text.length).toBe(size);
        expect(next.startOffset).toBe(chunk.startOffset + size - overlap);
        expect(chunk.startOffset + chunk.text.length - next.startOffset).toBe(overlap);
      }
    }
  });

  it("emits one short chunk when the text fits in a single window", () => {
    expect(Array.from(chunkText("short", { size: 10, overlap: 2 }))).toEqual([
      { text: "short", startOffset: 0, sourceId: "", chunkIndex: 0 },
    ]);
  });

  it("yields nothing for empty or whitespace-only text", () => {
    expect(Array.from(chunkText("", { size: 4, overlap: 1 }))).toEqual([]);
    expect(Array.from(chunkText("   \n  \n ", { size: 4, overlap: 1 }))).toEqual([]);
  });

  it("drops whitespace-only windows without spending a chunk index", () => {
    const chunks = Array.from(chunkText("ab    cd", { size: 2, overlap: 0 }));

    expect(chunks.map(chunk => [chunk.text, chunk.startOffset, chunk.chunkIndex])).toEqual([
      ["ab", 0, 0],
      ["cd", 6, 1],
    ]);
  });

  it("drops a whitespace-only final window", () => {
    const chunks = Array.from(chunkText("abcd    ", { size: 4, overlap: 0 }));

    expect(chunks.map(chunk => chunk.text)).toEqual(["abcd"]);
  });

  it("rejects parameters that would not advance, before iteration", () => {
    expect(() => chunkText("text", { size: 0, overlap: 0 })).toThrow(InvalidConfigError);
    expect(() => chunkText("text", { size: 4, overlap: -1 })).toThrow(InvalidConfigError);
    expect(() => chunkText("text", { size: 4, overlap: 4 })).toThrow("Chunk overlap (4) must be smaller than chunk size (4)");
    expect(() => chunkText("text", { size: 2.5, overlap: 0 })).toThrow(InvalidConfigError);
  });

  it("is lazy and restartable", () => {
    const sequence = chunkText(ALPHABET, { size: 10, overlap: 2 });

    const iterator = sequence[Symbol.iterator]();
    expect(iterator.next().value).toEqual({ text: "abcdefghij", startOffset: 0, sourceId: "", chunkIndex: 0 });

    expect(Array.from(sequence)).toEqual(Array.from(sequence));
    expect(Array.from(sequence)).toHaveLength(5);
  });
});

describe("Chunker", () => {
  it("chunks a document with its source id", () => {
    const chunker = new Chunker({ size: 4, overlap: 1 });

    const chunks = chunker.chunkDocument({ sourceId: "os/intro.pdf", text: "ABCDEFGHIJ", pageCount: 1 });

    expect(chunks.map(chunk => [chunk.sourceId, chunk.chunkIndex, chunk.text])).toEqual([
      ["os/intro.pdf", 0, "ABCD"],
      ["os/intro.pdf", 1, "DEFG"],
      ["os/intro.pdf", 2, "GHIJ"],
    ]);
  });

  it("falls back to the default window of 500 with 50 overlap", () => {
    const chunker = new Chunker();

    expect([chunker.size, chunker.overlap]).toEqual([500, 50]);
  });

  it("validates its configuration on construction", () => {
    expect(() => new Chunker({ size: 100, overlap: 100 })).toThrow(InvalidConfigError);
  });
});
