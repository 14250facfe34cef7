import { describe, it, expect } from "vitest";
import { DimensionMismatchError, InvalidArgumentError, StoreCorruptedError } from "../errors.js";
import { FlatIndex } from "../flatIndex.js";

describe("FlatIndex", () => {
  it("assigns ids by insertion position and leaves the original untouched", () => {
    const empty = new FlatIndex(2);
    const index = empty.withAppended([
      [1, 2],
      [3, 4],
    ]);

    expect(empty.size).toBe(0);
    expect(index.size).toBe(2);
    expect(index.get(1)).toEqual([3, 4]);
    expect(index.get(2)).toBeUndefined();
  });

  it("holds components at full double precision", () => {
    const index = new FlatIndex(3).withAppended([[0.1, 0.2, -0.0123456789]]);

    expect(index.get(0)).toEqual([0.1, 0.2, -0.0123456789]);
  });

  it("rejects vectors of another width", () => {
    const index = new FlatIndex(3);

    expect(() => index.withAppended([[1, 2, 3], [1, 2]])).toThrow(
      new DimensionMismatchError(3, 2, "vector 1 of append batch")
    );
  });

  it.each([0, -1, 1.5])("rejects %s dimensions", dimensions => {
    expect(() => new FlatIndex(dimensions)).toThrow(InvalidArgumentError);
  });

  it("serializes to a header followed by little-endian floats", () => {
    const buffer = new FlatIndex(2).withAppended([[1.5, -2]]).serialize();

    expect(buffer.length).toBe(16 + 16);
    expect(buffer.toString("ascii", 0, 4)).toBe("VIDX");
    expect(buffer.readUInt32LE(4)).toBe(2);
    expect(buffer.readUInt32LE(8)).toBe(2);
    expect(buffer.readUInt32LE(12)).toBe(1);
    expect(buffer.readDoubleLE(16)).toBe(1.5);
    expect(buffer.readDoubleLE(24)).toBe(-2);
  });

  it("restores the exact vectors it serialized", () => {
    const index = new FlatIndex(3).withAppended([
      [0.25, -1, 3.75],
      [0.1, 0.2, -0.0123456789],
    ]);

    const restored = FlatIndex.deserialize(index.serialize(), "index.bin");

    expect(restored.dimensions).toBe(3);
    expect(restored.size).toBe(2);
    expect(restored.get(0)).toEqual([0.25, -1, 3.75]);
    expect(restored.get(1)).toEqual([0.1, 0.2, -0.0123456789]);
  });

  it("rejects a file without the magic bytes", () => {
    const buffer = new FlatIndex(2).serialize();
    buffer.write("NOPE", 0, "ascii");

    expect(() => FlatIndex.deserialize(buffer, "index.bin")).toThrow(
      new StoreCorruptedError("index.bin is not a vector index file")
    );
  });

  it("rejects an unknown format version", () => {
    const buffer = new FlatIndex(2).serialize();
    buffer.writeUInt32LE(1, 4);

    expect(() => FlatIndex.deserialize(buffer, "index.bin")).toThrow(
      new StoreCorruptedError("index.bin has unsupported index format version 1")
    );
  });

  it("rejects a truncated file", () => {
    const buffer = new FlatIndex(2).withAppended([[1, 2]]).serialize();

    expect(() => FlatIndex.deserialize(buffer.subarray(0, buffer.length - 8), "index.bin")).toThrow(
      StoreCorruptedError
    );
  });
});
