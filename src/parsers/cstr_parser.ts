import type { Parser, ParseResult } from "./parser.ts";
import type { Value } from "../value/value.ts";
import { asBytes } from "./raw_parser.ts";
import { BadFormatError } from "../schemas/error.ts";
import { concatBytes } from "../manipulate_bytes.ts";

const TERMINATOR = new Uint8Array([0]);

/**
 * Parser for zero-terminated byte strings. Values never include the
 * terminator; it is added back on encode.
 */
export class CstrParser implements Parser<Uint8Array> {
  public parse(buffer: Uint8Array): ParseResult<Uint8Array> | undefined {
    const end = buffer.indexOf(0);
    if (end < 0) {
      return undefined;
    }
    return { value: buffer.slice(0, end), size: end + 1 };
  }

  public newValue(): Uint8Array {
    return new Uint8Array(0);
  }

  public create(buffer: Uint8Array): Uint8Array {
    if (buffer.length === 0 || buffer[buffer.length - 1] !== 0) {
      throw new BadFormatError("Cstr is not zero-terminated");
    }
    const end = buffer.indexOf(0);
    if (end !== buffer.length - 1) {
      throw new BadFormatError("Cstr has zero inside the string");
    }
    return buffer.slice(0, end);
  }

  public sizeOf(value: Value): number {
    return asBytes(value, "cstr").length + 1;
  }

  public paddingSize(value: Value): number {
    return this.sizeOf(value);
  }

  public toBytes(value: Value): Uint8Array {
    return concatBytes([asBytes(value, "cstr"), TERMINATOR]);
  }
}
