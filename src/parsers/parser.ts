import type { Value } from "../value/value.ts";
import type { StructValue } from "../value/struct_value.ts";

/**
 * A decoded value and the number of bytes it used, padding included.
 */
export interface ParseResult<T> {
  value: T;
  size: number;
}

/**
 * Runtime codec compiled from a type definition.
 *
 * `parse` is for streaming input: it returns undefined while the buffer is
 * still too short. `create` uses the whole buffer and throws on bad data.
 */
export interface Parser<T extends Value = Value> {
  /**
   * Decodes a value from the front of `buffer`.
   * @param inlineParent Root value an embedded struct stores its fields in.
   * @returns undefined when more data is needed.
   */
  parse(buffer: Uint8Array, inlineParent?: StructValue): ParseResult<T> | undefined;

  /**
   * Decodes a value from all of `buffer`.
   */
  create(buffer: Uint8Array, inlineParent?: StructValue): T;

  /**
   * Returns a default value.
   */
  newValue(inlineParent?: StructValue): T;

  /**
   * Size without trailing alignment. For structs, only this layer counts.
   */
  sizeOf(value: T): number;

  /**
   * Encoded size including alignment.
   */
  paddingSize(value: T): number;

  toBytes(value: T, skipPrepack?: boolean): Uint8Array;
}

/**
 * Decides whether a base value should be extended into a subtype.
 */
export type Criteria = (value: StructValue) => boolean;

/**
 * Values a classifier may return to select a subtype.
 */
export type ClassifyValue = string | number | bigint | boolean;

/**
 * Computes the key used to look up a subtype in O(1).
 */
export type Classifier = (value: StructValue) => ClassifyValue | undefined;

/**
 * Normalizes a classify value so integers match whether they were decoded
 * as number or bigint.
 */
export function classifyKey(key: ClassifyValue): ClassifyValue {
  if (typeof key === "bigint") {
    const asNumber = Number(key);
    if (Number.isSafeInteger(asNumber) && BigInt(asNumber) === key) {
      return asNumber;
    }
  }
  return key;
}

/**
 * Computes the real size of a struct from its decoded fixed prefix.
 */
export type SizeFunction = (value: StructValue) => number;

/**
 * Initializer or prepack hook run on a struct value.
 */
export type StructHook = (value: StructValue) => void;

export const never: Criteria = () => false;

/**
 * Rounds `size` up to a multiple of `padding`.
 */
export function padTo(size: number, padding: number): number {
  return Math.ceil(size / padding) * padding;
}
