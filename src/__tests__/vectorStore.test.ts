import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { copyFile, readdir, readFile, rm, writeFile } from "fs/promises";
import * as path from "path";
import { DimensionMismatchError, InvalidArgumentError, StoreCorruptedError } from "../errors.js";
import { INDEX_FILE, METADATA_FILE, VectorStore, type ChunkMetadata } from "../vectorStore.js";
import { createTempDir } from "../test-utils/index.js";

const syncedDirs = vi.hoisted((): string[] => []);

vi.mock("../utilities.js", async importOriginal => {
  const actual = await importOriginal<typeof import("../utilities.js")>();
  return {
    ...actual,
    syncDirectory: async (dirPath: string) => {
      syncedDirs.push(dirPath);
      await actual.syncDirectory(dirPath);
    },
  };
});

const metadataFor = (count: number, sourceId = "lecture.pdf"): ChunkMetadata[] =>
  Array.from({ length: count }, (_, i) => ({
    sourceId,
    chunkIndex: i,
    text: `chunk ${i}`,
    startOffset: i * 40,
  }));

const vectorsFor = (count: number): number[][] =>
  Array.from({ length: count }, (_, i) => [i, i + 0.5]);

describe("VectorStore", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDir());
    syncedDirs.length = 0;
  });

  afterEach(async () => {
    await cleanup();
  });

  it("assigns ids continuing from the current size", async () => {
    const store = VectorStore.createEmpty(dir, 2);

    expect(await store.append(vectorsFor(3), metadataFor(3))).toEqual([0, 1, 2]);
    expect(await store.append(vectorsFor(2), metadataFor(2, "slides.pdf"))).toEqual([3, 4]);
    expect(store.size).toBe(5);
    expect(store.getEntry(3)).toEqual({
      id: 3,
      vector: [0, 0.5],
      metadata: { sourceId: "slides.pdf", chunkIndex: 0, text: "chunk 0", startOffset: 0 },
    });
  });

  it("loads exactly what it persisted", async () => {
    const store = VectorStore.createEmpty(dir, 2);
    await store.append(vectorsFor(3), [
      ...metadataFor(2),
      { sourceId: "notes.pdf", chunkIndex: 0, text: "Ωμέγα", startOffset: 0, course: "physics" },
    ]);

    const loaded = await VectorStore.load(dir);

    expect(loaded.dimensions).toBe(2);
    expect(loaded.entries()).toEqual(store.entries());
  });

  it("returns appended vectors bit-for-bit after persist and load", async () => {
    const vectors = [[0.1, 0.2, -0.0123456789]];
    const store = VectorStore.createEmpty(dir, 3);
    await store.append(vectors, metadataFor(1));
    await store.persist();

    const loaded = await VectorStore.load(dir);

    expect(loaded.getEntry(0)?.vector).toEqual(vectors[0]);
    expect(loaded.getEntry(0)?.metadata).toEqual(metadataFor(1)[0]);
  });

  it("persists an empty store as a loadable pair of files", async () => {
    await VectorStore.createEmpty(dir, 4).persist();

    const loaded = await VectorStore.load(dir);

    expect((await readdir(dir)).sort()).toEqual([INDEX_FILE, METADATA_FILE]);
    expect(loaded.size).toBe(0);
    expect(loaded.dimensions).toBe(4);
  });

  it("persists a populated store again without changing it", async () => {
    const store = VectorStore.createEmpty(dir, 2);
    await store.append(vectorsFor(3), metadataFor(3));

    await store.persist();
    const loaded = await VectorStore.load(dir);

    expect((await readdir(dir)).sort()).toEqual([INDEX_FILE, METADATA_FILE]);
    expect(loaded.entries()).toEqual(store.entries());
  });

  it("syncs the store directory after moving the artifacts into place", async () => {
    const store = VectorStore.createEmpty(dir, 2);

    await store.append(vectorsFor(1), metadataFor(1));

    expect(syncedDirs).toEqual([dir]);
    expect((await readdir(dir)).sort()).toEqual([INDEX_FILE, METADATA_FILE]);
  });

  it("writes nothing for an empty append", async () => {
    const store = VectorStore.createEmpty(dir, 2);

    expect(await store.append([], [])).toEqual([]);
    expect(await readdir(dir)).toEqual([]);
  });

  it("rejects sequences of different lengths before writing", async () => {
    const store = VectorStore.createEmpty(dir, 2);

    await expect(store.append(vectorsFor(2), metadataFor(1))).rejects.toBeInstanceOf(InvalidArgumentError);
    expect(await readdir(dir)).toEqual([]);
    expect(store.size).toBe(0);
  });

  it("rejects a vector of the wrong width before writing", async () => {
    const store = VectorStore.createEmpty(dir, 2);

    await expect(store.append([[1, 2], [1, 2, 3]], metadataFor(2))).rejects.toBeInstanceOf(DimensionMismatchError);
    expect(await readdir(dir)).toEqual([]);
    expect(store.size).toBe(0);
  });

  it("keeps its previous state when persisting fails", async () => {
    const blocker = path.join(dir, "not-a-directory");
    await writeFile(blocker, "");
    const store = VectorStore.createEmpty(path.join(blocker, "store"), 2);

    await expect(store.append(vectorsFor(1), metadataFor(1))).rejects.toThrow();
    expect(store.size).toBe(0);
    expect(store.entries()).toEqual([]);
  });

  describe("load", () => {
    it("reports a directory without artifacts", async () => {
      await expect(VectorStore.load(dir)).rejects.toThrow(new StoreCorruptedError(`No vector store found in ${dir}`));
    });

    it("reports a missing metadata table", async () => {
      const store = VectorStore.createEmpty(dir, 2);
      await store.append(vectorsFor(1), metadataFor(1));
      await rm(path.join(dir, METADATA_FILE));

      await expect(VectorStore.load(dir)).rejects.toThrow(
        new StoreCorruptedError(`Vector store in ${dir} is incomplete: ${METADATA_FILE} is missing`)
      );
    });

    it("reports metadata that is not JSON", async () => {
      const store = VectorStore.createEmpty(dir, 2);
      await store.append(vectorsFor(1), metadataFor(1));
      await writeFile(path.join(dir, METADATA_FILE), "{ not json");

      await expect(VectorStore.load(dir)).rejects.toBeInstanceOf(StoreCorruptedError);
    });

    it("reports more metadata rows than vectors", async () => {
      const store = VectorStore.createEmpty(dir, 2);
      await store.append(vectorsFor(2), metadataFor(2));
      const larger = await createTempDir();
      try {
        await VectorStore.createEmpty(larger.dir, 2).append(vectorsFor(3), metadataFor(3));
        await copyFile(path.join(larger.dir, METADATA_FILE), path.join(dir, METADATA_FILE));
      } finally {
        await larger.cleanup();
      }

      await expect(VectorStore.load(dir)).rejects.toThrow(
        new StoreCorruptedError(`Index holds 2 vectors but metadata table has 3 rows in ${dir}`)
      );
    });

    it("reports a row whose id is not its position", async () => {
      const store = VectorStore.createEmpty(dir, 2);
      await store.append(vectorsFor(2), metadataFor(2));
      const metadataPath = path.join(dir, METADATA_FILE);
      const table = await readFile(metadataPath, "utf8");
      await writeFile(metadataPath, table.replace('"id": 1', '"id": 5'));

      await expect(VectorStore.load(dir)).rejects.toThrow(new StoreCorruptedError("Metadata row 1 carries id 5"));
    });

    it("ignores temporary files left by an interrupted write", async () => {
      const store = VectorStore.createEmpty(dir, 2);
      await store.append(vectorsFor(2), metadataFor(2));
      await writeFile(path.join(dir, `${METADATA_FILE}.tmp`), "{ partial");
      await writeFile(path.join(dir, `${INDEX_FILE}.tmp`), "VIDX");

      const loaded = await VectorStore.load(dir);

      expect(loaded.entries()).toEqual(store.entries());
    });
  });

  describe("open", () => {
    it("starts an empty store when nothing is persisted", async () => {
      const store = await VectorStore.open(dir, 4);

      expect(store.size).toBe(0);
      expect(store.dimensions).toBe(4);
    });

    it("resumes a persisted store", async () => {
      await VectorStore.createEmpty(dir, 2).append(vectorsFor(3), metadataFor(3));

      const store = await VectorStore.open(dir, 2);

      expect(await store.append(vectorsFor(1), metadataFor(1))).toEqual([3]);
    });

    it("refuses a persisted store of another width", async () => {
      await VectorStore.createEmpty(dir, 2).append(vectorsFor(1), metadataFor(1));

      await expect(VectorStore.open(dir, 3)).rejects.toThrow(
        new DimensionMismatchError(3, 2, `existing store in ${dir}`)
      );
    });
  });
});
