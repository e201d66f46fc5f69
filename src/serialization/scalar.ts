import type { ReadableTap, WritableTap } from "./tap.ts";
import { throwInvalidError } from "../schemas/error.ts";
import { integerAsBigInt } from "./conversion.ts";
import { encode } from "./text_encoding.ts";

/**
 * Decoded scalar value. Integers wider than four bytes decode as bigint,
 * byte blocks as Uint8Array.
 */
export type Scalar = number | bigint | boolean | Uint8Array;

export type ScalarKind = "uint" | "int" | "float" | "bool" | "bytes";

/**
 * One fixed-width scalar slot of a compiled layout.
 */
export interface ScalarItem {
  readonly kind: ScalarKind;
  readonly width: number;
  readonly littleEndian: boolean;
}

/**
 * Bytes that are skipped on decode and zeroed on encode.
 */
export interface PadItem {
  readonly kind: "pad";
  readonly width: number;
}

export type LayoutItem = ScalarItem | PadItem;

const INTEGER_WIDTHS = new Set([1, 2, 4, 8]);
const FLOAT_WIDTHS = new Set([4, 8]);

/**
 * Throws a RangeError when `item` has a width its kind cannot encode.
 */
export function checkScalarItem(item: ScalarItem): void {
  const ok = item.kind === "uint" || item.kind === "int"
    ? INTEGER_WIDTHS.has(item.width)
    : item.kind === "float"
    ? FLOAT_WIDTHS.has(item.width)
    : item.kind === "bool"
    ? item.width === 1
    : Number.isInteger(item.width) && item.width > 0;
  if (!ok) {
    throw new RangeError(
      `Unsupported width ${item.width} for ${item.kind} scalar`,
    );
  }
}

/**
 * Readable name of a scalar slot, e.g. `uint16`, `int32_le` or `bytes[4]`.
 */
export function describeScalar(item: ScalarItem): string {
  if (item.kind === "bytes") {
    return `bytes[${item.width}]`;
  }
  if (item.kind === "bool") {
    return "bool";
  }
  const base = item.kind === "float"
    ? `float${item.width * 8}`
    : `${item.kind}${item.width * 8}`;
  return item.littleEndian && item.width > 1 ? `${base}_le` : base;
}

export function readScalar(tap: ReadableTap, item: ScalarItem): Scalar {
  switch (item.kind) {
    case "uint":
      return tap.readUint(item.width, item.littleEndian);
    case "int":
      return tap.readInt(item.width, item.littleEndian);
    case "float":
      return tap.readFloat(item.width, item.littleEndian);
    case "bool":
      return tap.readBoolean();
    case "bytes":
      return tap.readFixed(item.width);
  }
}

/**
 * The value a freshly created field of this kind holds.
 */
export function zeroScalar(item: ScalarItem): Scalar {
  switch (item.kind) {
    case "uint":
    case "int":
      return item.width === 8 ? 0n : 0;
    case "float":
      return 0;
    case "bool":
      return false;
    case "bytes":
      return new Uint8Array(0);
  }
}

/**
 * Encodes one value, throwing a ValidationError when it does not fit.
 */
export function writeScalar(
  tap: WritableTap,
  item: ScalarItem,
  value: unknown,
  path: string[],
): void {
  switch (item.kind) {
    case "uint":
    case "int": {
      const big = integerAsBigInt(value);
      const bits = BigInt(item.width * 8);
      const min = item.kind === "uint" ? 0n : -(1n << (bits - 1n));
      const max = item.kind === "uint" ? (1n << bits) - 1n : (1n << (bits - 1n)) - 1n;
      if (big === undefined || big < min || big > max) {
        throwInvalidError(path, value, describeScalar(item));
      }
      if (item.kind === "uint") {
        tap.writeUint(item.width, big, item.littleEndian);
      } else {
        tap.writeInt(item.width, big, item.littleEndian);
      }
      return;
    }
    case "float":
      if (typeof value === "number") {
        tap.writeFloat(item.width, value, item.littleEndian);
      } else if (typeof value === "bigint") {
        tap.writeFloat(item.width, Number(value), item.littleEndian);
      } else {
        throwInvalidError(path, value, describeScalar(item));
      }
      return;
    case "bool":
      if (typeof value === "boolean") {
        tap.writeBoolean(value);
      } else if (typeof value === "number") {
        tap.writeBoolean(value !== 0);
      } else {
        throwInvalidError(path, value, describeScalar(item));
      }
      return;
    case "bytes":
      if (value instanceof Uint8Array) {
        tap.writeFixed(value, item.width);
      } else if (typeof value === "string") {
        tap.writeFixed(encode(value), item.width);
      } else {
        throwInvalidError(path, value, describeScalar(item));
      }
      return;
  }
}
