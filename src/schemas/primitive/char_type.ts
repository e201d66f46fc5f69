import { PrimType } from "./prim_type.ts";
import { raw } from "./raw_type.ts";
import type { Type } from "../type.ts";

/**
 * A single byte decoded as a one-byte block. Arrays of chars are byte
 * blocks rather than lists: `char.array(12)` holds 12 bytes and
 * `char.array(0)` is {@link raw}.
 */
export class CharType extends PrimType {
  constructor() {
    super({ kind: "bytes", width: 1, name: "char" });
  }

  public override array(size: number): Type {
    if (size === 0) {
      return raw;
    }
    return new PrimType({ kind: "bytes", width: size, name: `char[${size}]` });
  }
}
