import { DimensionMismatchError, InvalidArgumentError, StoreCorruptedError } from "./errors.js";

const MAGIC = "VIDX";
const FORMAT_VERSION = 2;
const COMPONENT_BYTES = 8;
const HEADER_BYTES = 16;

/**
 * Flat vector index: vectors kept in insertion order, ids are their insertion positions.
 * Components are held as 64-bit floats, so a persisted vector reads back exactly as appended.
 */
export class FlatIndex {
  private readonly vectors: Float64Array[];

  constructor(readonly dimensions: number, vectors: Float64Array[] = []) {
    if (!Number.isInteger(dimensions) || dimensions <= 0) {
      throw new InvalidArgumentError(`Index dimensions must be a positive integer, got ${dimensions}`);
    }
    this.vectors = vectors;
  }

  get size(): number {
    return this.vectors.length;
  }

  /** Copy of the vector stored under `id`. */
  get(id: number): number[] | undefined {
    const vector = this.vectors[id];
    return vector ? Array.from(vector) : undefined;
  }

  /**
   * Returns a new index holding this index's vectors followed by `vectors`.
   * This index is left untouched.
   */
  withAppended(vectors: readonly number[][]): FlatIndex {
    const converted = vectors.map((vector, position) => {
      if (vector.length !== this.dimensions) {
        throw new DimensionMismatchError(this.dimensions, vector.length, `vector ${position} of append batch`);
      }
      return Float64Array.from(vector);
    });
    return new FlatIndex(this.dimensions, [...this.vectors, ...converted]);
  }

  /** `VIDX` | u32 version | u32 dimensions | u32 count | count × dimensions f64, little endian. */
  serialize(): Buffer {
    const buffer = Buffer.alloc(HEADER_BYTES + this.size * this.dimensions * COMPONENT_BYTES);
    buffer.write(MAGIC, 0, "ascii");
    buffer.writeUInt32LE(FORMAT_VERSION, 4);
    buffer.writeUInt32LE(this.dimensions, 8);
    buffer.writeUInt32LE(this.size, 12);

    let offset = HEADER_BYTES;
    for (const vector of this.vectors) {
      for (const component of vector) {
        buffer.writeDoubleLE(component, offset);
        offset += COMPONENT_BYTES;
      }
    }
    return buffer;
  }

  static deserialize(buffer: Buffer, source: string): FlatIndex {
    if (buffer.length < HEADER_BYTES || buffer.toString("ascii", 0, 4) !== MAGIC) {
      throw new StoreCorruptedError(`${source} is not a vector index file`);
    }
    const version = buffer.readUInt32LE(4);
    if (version !== FORMAT_VERSION) {
      throw new StoreCorruptedError(`${source} has unsupported index format version ${version}`);
    }
    const dimensions = buffer.readUInt32LE(8);
    const count = buffer.readUInt32LE(12);
    const expectedBytes = HEADER_BYTES + count * dimensions * COMPONENT_BYTES;
    if (dimensions === 0 || buffer.length !== expectedBytes) {
      throw new StoreCorruptedError(
        `${source} is truncated or padded: header declares ${count} vectors of ${dimensions} dimensions (${expectedBytes} bytes), file has ${buffer.length} bytes`
      );
    }

    const vectors: Float64Array[] = [];
    let offset = HEADER_BYTES;
    for (let i = 0; i < count; i++) {
      const vector = new Float64Array(dimensions);
      for (let j = 0; j < dimensions; j++) {
        vector[j] = buffer.readDoubleLE(offset);
        offset += COMPONENT_BYTES;
      }
      vectors.push(vector);
    }
    return new FlatIndex(dimensions, vectors);
  }
}
