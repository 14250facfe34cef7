import { mkdir, open, readFile, rename } from "fs/promises";
import * as path from "path";
import type { Logger } from "pino";
import { z } from "zod";
import { DimensionMismatchError, InvalidArgumentError, StoreCorruptedError, errorMessage } from "./errors.js";
import { FlatIndex } from "./flatIndex.js";
import { fsExists, syncDirectory } from "./utilities.js";

export const INDEX_FILE = "index.bin";
export const METADATA_FILE = "metadata.json";
const TEMP_SUFFIX = ".tmp";

/**
 * Metadata kept for every indexed vector, in the table beside the index.
 */
export interface ChunkMetadata {
  sourceId: string;
  chunkIndex: number;
  text: string;
  startOffset: number;
  /** Course the source document belongs to. */
  course?: string;
}

/** A persisted vector together with its id and metadata row. */
export interface IndexEntry {
  id: number;
  vector: number[];
  metadata: ChunkMetadata;
}

const MetadataRowSchema = z.object({
  id: z.number().int().nonnegative(),
  sourceId: z.string(),
  chunkIndex: z.number().int().nonnegative(),
  text: z.string(),
  startOffset: z.number().int().nonnegative(),
  course: z.string().optional(),
});

const MetadataTableSchema = z.object({
  version: z.literal(1),
  dimensions: z.number().int().positive(),
  rows: z.array(MetadataRowSchema),
});

type MetadataRow = z.infer<typeof MetadataRowSchema>;

/**
 * Writes `data` to `target + ".tmp"` and flushes it to disk. The caller renames it into place.
 */
async function writeTempFile(target: string, data: string | Buffer): Promise<string> {
  const tempPath = `${target}${TEMP_SUFFIX}`;
  const handle = await open(tempPath, "w");
  try {
    await handle.writeFile(data);
    await handle.sync();
  } finally {
    await handle.close();
  }
  return tempPath;
}

/**
 * Append-only vector store: a {@link FlatIndex} plus a metadata table keyed by the same ids,
 * persisted as two files in one directory.
 *
 * After every successful {@link append} both files hold the same number of entries and
 * metadata row `i` has id `i`. Writes go to temporary files first; the metadata file is
 * renamed into place before the index file, which is always the last artifact to change,
 * and the directory is synced after the renames.
 * A crash before the renames leaves the previous pair untouched. A crash between the two
 * renames leaves more metadata rows than vectors, which {@link load} reports as
 * {@link StoreCorruptedError} instead of truncating.
 */
export class VectorStore {
  private constructor(
    readonly dir: string,
    private index: FlatIndex,
    private rows: MetadataRow[],
    private readonly logger?: Logger
  ) {}

  /** New empty store for vectors of width `dimensions`. Nothing is written until the first append. */
  static createEmpty(dir: string, dimensions: number, logger?: Logger): VectorStore {
    return new VectorStore(dir, new FlatIndex(dimensions), [], logger);
  }

  /**
   * Reconstructs a store from its two artifacts.
   * @throws {StoreCorruptedError} when an artifact is missing or malformed, or the two disagree.
   */
  static async load(dir: string, logger?: Logger): Promise<VectorStore> {
    const indexPath = path.join(dir, INDEX_FILE);
    const metadataPath = path.join(dir, METADATA_FILE);
    const [hasIndex, hasMetadata] = await Promise.all([fsExists(indexPath), fsExists(metadataPath)]);

    if (!hasIndex && !hasMetadata) {
      throw new StoreCorruptedError(`No vector store found in ${dir}`);
    }
    if (!hasIndex || !hasMetadata) {
      const missing = hasIndex ? METADATA_FILE : INDEX_FILE;
      throw new StoreCorruptedError(`Vector store in ${dir} is incomplete: ${missing} is missing`);
    }

    const index = FlatIndex.deserialize(await readFile(indexPath), indexPath);

    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(metadataPath, "utf8"));
    } catch (error) {
      throw new StoreCorruptedError(`${metadataPath} is not valid JSON: ${errorMessage(error)}`);
    }
    const table = MetadataTableSchema.safeParse(parsed);
    if (!table.success) {
      const issue = table.error.issues[0];
      const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown issue";
      throw new StoreCorruptedError(`${metadataPath} has an invalid structure (${where})`);
    }

    const { dimensions, rows } = table.data;
    if (dimensions !== index.dimensions) {
      throw new StoreCorruptedError(
        `Index holds ${index.dimensions}-dimensional vectors but metadata declares ${dimensions} dimensions`
      );
    }
    if (rows.length !== index.size) {
      throw new StoreCorruptedError(
        `Index holds ${index.size} vectors but metadata table has ${rows.length} rows in ${dir}`
      );
    }
    const misplaced = rows.findIndex((row, position) => row.id !== position);
    if (misplaced !== -1) {
      throw new StoreCorruptedError(`Metadata row ${misplaced} carries id ${rows[misplaced].id}`);
    }

    logger?.info(`Loaded vector store from ${dir}: ${index.size} vectors of ${index.dimensions} dimensions`);
    return new VectorStore(dir, index, rows, logger);
  }

  /**
   * Loads the store in `dir` if either artifact exists, otherwise creates an empty one.
   * @throws {DimensionMismatchError} when the existing store holds vectors of another width.
   */
  static async open(dir: string, dimensions: number, logger?: Logger): Promise<VectorStore> {
    const exists = (await fsExists(path.join(dir, INDEX_FILE))) || (await fsExists(path.join(dir, METADATA_FILE)));
    if (!exists) {
      logger?.info(`No vector store in ${dir}; starting an empty one with ${dimensions} dimensions`);
      return VectorStore.createEmpty(dir, dimensions, logger);
    }
    const store = await VectorStore.load(dir, logger);
    if (store.dimensions !== dimensions) {
      throw new DimensionMismatchError(dimensions, store.dimensions, `existing store in ${dir}`);
    }
    return store;
  }

  get size(): number {
    return this.index.size;
  }

  get dimensions(): number {
    return this.index.dimensions;
  }

  getEntry(id: number): IndexEntry | undefined {
    const row = this.rows[id];
    const vector = this.index.get(id);
    if (!row || !vector) {
      return undefined;
    }
    const { id: _id, ...metadata } = row;
    return { id, vector, metadata };
  }

  entries(): IndexEntry[] {
    return this.rows.flatMap(row => this.getEntry(row.id) ?? []);
  }

  /**
   * Appends vectors and their metadata as one operation and persists the result.
   * Ids continue from the current size in input order. The in-memory store changes
   * only after both artifacts were written.
   * @returns The ids assigned to the appended entries.
   * @throws {InvalidArgumentError} when the two sequences differ in length.
   * @throws {DimensionMismatchError} when a vector does not have the store's width.
   */
  async append(vectors: readonly number[][], metadata: readonly ChunkMetadata[]): Promise<number[]> {
    if (vectors.length !== metadata.length) {
      throw new InvalidArgumentError(
        `Cannot append ${vectors.length} vectors with ${metadata.length} metadata records`
      );
    }
    if (vectors.length === 0) {
      return [];
    }

    const firstId = this.index.size;
    const nextIndex = this.index.withAppended(vectors);
    const appendedRows: MetadataRow[] = metadata.map((record, offset) => ({ ...record, id: firstId + offset }));
    const nextRows = [...this.rows, ...appendedRows];

    await this.writeArtifacts(nextIndex, nextRows);

    this.index = nextIndex;
    this.rows = nextRows;
    const ids = appendedRows.map(row => row.id);
    this.logger?.info(`Appended ${ids.length} entries (ids ${firstId}..${firstId + ids.length - 1}); store now holds ${this.size}`);
    return ids;
  }

  /** Writes the current state to disk. */
  async persist(): Promise<void> {
    await this.writeArtifacts(this.index, this.rows);
  }

  private async writeArtifacts(index: FlatIndex, rows: MetadataRow[]): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    const indexPath = path.join(this.dir, INDEX_FILE);
    const metadataPath = path.join(this.dir, METADATA_FILE);

    const table = JSON.stringify({ version: 1, dimensions: index.dimensions, rows }, null, 2);
    const metadataTemp = await writeTempFile(metadataPath, table);
    const indexTemp = await writeTempFile(indexPath, index.serialize());

    await rename(metadataTemp, metadataPath);
    await rename(indexTemp, indexPath);
    await syncDirectory(this.dir);
    this.logger?.debug(`Persisted ${index.size} vectors and ${rows.length} metadata rows to ${this.dir}`);
  }
}
