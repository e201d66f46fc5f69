import { describe, expect, it } from "vitest";

import { ReadableTap, WritableTap } from "../tap.ts";
import { ReadBufferError, WriteBufferError } from "../tap_errors.ts";

describe("ReadableTap", () => {
  it("reads big and little endian integers", () => {
    const tap = new ReadableTap(new Uint8Array([0x01, 0x02, 0x01, 0x02]));
    expect(tap.readUint(2, false)).toBe(0x0102);
    expect(tap.readUint(2, true)).toBe(0x0201);
    expect(tap.remaining()).toBe(0);
  });

  it("reads signed integers", () => {
    const tap = new ReadableTap(new Uint8Array([0xff, 0xff, 0xfe]));
    expect(tap.readInt(1, false)).toBe(-1);
    expect(tap.readInt(2, false)).toBe(-2);
  });

  it("reads eight-byte integers as bigint", () => {
    const bytes = new Uint8Array(8).fill(0xff);
    expect(new ReadableTap(bytes).readUint(8, false)).toBe(
      0xffffffffffffffffn,
    );
    expect(new ReadableTap(bytes).readInt(8, false)).toBe(-1n);
  });

  it("reads floats and booleans", () => {
    const tap = new ReadableTap(new Uint8Array([0x3f, 0x80, 0x00, 0x00, 0x02]));
    expect(tap.readFloat(4, false)).toBe(1);
    expect(tap.readBoolean()).toBe(true);
  });

  it("respects the view offset of subarrays", () => {
    const bytes = new Uint8Array([0xaa, 0x00, 0x07]).subarray(1);
    expect(new ReadableTap(bytes).readUint(2, false)).toBe(7);
  });

  it("copies fixed blocks", () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const tap = new ReadableTap(bytes, 1);
    const block = tap.readFixed(2);
    bytes[1] = 9;
    expect(Array.from(block)).toEqual([2, 3]);
    expect(tap.getPos()).toBe(3);
  });

  it("throws ReadBufferError past the end", () => {
    const tap = new ReadableTap(new Uint8Array([1]));
    expect(() => tap.readUint(2, false)).toThrow(ReadBufferError);
    try {
      tap.skip(4);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ReadBufferError);
      if (err instanceof ReadBufferError) {
        expect(err.offset).toBe(0);
        expect(err.size).toBe(4);
        expect(err.bufferLength).toBe(1);
      }
    }
  });
});

describe("WritableTap", () => {
  it("writes integers in both byte orders", () => {
    const tap = new WritableTap(6);
    tap.writeUint(2, 0x0102n, false);
    tap.writeUint(2, 0x0102n, true);
    tap.writeInt(2, -2n, false);
    expect(Array.from(tap.getValue())).toEqual([1, 2, 2, 1, 0xff, 0xfe]);
  });

  it("writes eight-byte integers", () => {
    const tap = new WritableTap(8);
    tap.writeInt(8, -1n, true);
    expect(Array.from(tap.getValue())).toEqual(new Array(8).fill(0xff));
  });

  it("zero-fills and truncates fixed blocks", () => {
    const tap = new WritableTap(5);
    tap.writeFixed(new Uint8Array([1]), 3);
    tap.writeFixed(new Uint8Array([2, 3, 4]), 2);
    expect(Array.from(tap.getValue())).toEqual([1, 0, 0, 2, 3]);
  });

  it("writes padding as zeros", () => {
    const tap = new WritableTap(3);
    tap.writeBoolean(true);
    tap.writePadding(2);
    expect(Array.from(tap.getValue())).toEqual([1, 0, 0]);
    expect(tap.getPos()).toBe(3);
  });

  it("throws WriteBufferError past the end", () => {
    const tap = new WritableTap(1);
    expect(() => tap.writeFloat(4, 1, false)).toThrow(WriteBufferError);
  });
});
