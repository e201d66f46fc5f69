import type { SizeFunction, StructHook } from "../../parsers/parser.ts";
import type { StructValue } from "../../value/struct_value.ts";
import type { Value } from "../../value/value.ts";
import { integerAsBigInt } from "../../serialization/conversion.ts";
import { BadFormatError, BadLenError } from "../error.ts";

/**
 * Size function reading the struct size from a property path, e.g.
 * `sizeFromLen(1024, "header", "length")`.
 * @param limit Largest accepted size. Larger values raise
 *   {@link BadLenError} so corrupted lengths cannot force huge reads.
 */
export function sizeFromLen(
  limit: number,
  ...path: [string, ...string[]]
): SizeFunction {
  return (value) => {
    const raw = value.target.getPath(...path);
    const size = integerAsBigInt(raw);
    if (size === undefined) {
      throw new BadFormatError(
        `Struct length at ${path.join(".")} is not an integer`,
      );
    }
    if (size > BigInt(limit)) {
      throw new BadLenError(
        `Struct length exceeds limit ${limit}`,
        limit,
        Number(size),
      );
    }
    return Number(size);
  };
}

/**
 * Prepack hook storing the padded size of the value at a property path.
 */
export function packSize(...path: [string, ...string[]]): StructHook {
  return packExpr((value) => value.paddedSize(), ...path);
}

/**
 * Prepack hook storing the size without trailing alignment.
 */
export function packRealSize(...path: [string, ...string[]]): StructHook {
  return packExpr((value) => value.realSize(), ...path);
}

/**
 * Hook storing a constant, usually an `init` hook.
 */
export function packValue(
  constant: Value,
  ...path: [string, ...string[]]
): StructHook {
  return packExpr(() => constant, ...path);
}

/**
 * Hook storing the result of `compute`, e.g.
 * `packExpr((v) => v.getArray("items").length, "count")`.
 */
export function packExpr(
  compute: (value: StructValue) => Value,
  ...path: [string, ...string[]]
): StructHook {
  return (value) => {
    value.target.setPath(compute(value), ...path);
  };
}
