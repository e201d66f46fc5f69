import type { Parser, ParseResult } from "./parser.ts";
import type { Value } from "../value/value.ts";
import { throwInvalidError } from "../schemas/error.ts";
import { emptyBytes, stripTrailingZeros } from "../manipulate_bytes.ts";
import { encode } from "../serialization/text_encoding.ts";

/**
 * Converts a byte field value, accepting strings as UTF-8.
 */
export function asBytes(value: Value, typeName: string): Uint8Array {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (typeof value === "string") {
    return encode(value);
  }
  return throwInvalidError([], value, typeName);
}

/**
 * Parser for bytes that take whatever data is left. `parse` never consumes
 * anything, so a raw field only receives data through `create`.
 */
export class RawParser implements Parser<Uint8Array> {
  /** Strip trailing zero bytes on create. */
  readonly stripZeros: boolean;

  constructor(stripZeros = false) {
    this.stripZeros = stripZeros;
  }

  public parse(): ParseResult<Uint8Array> {
    return { value: emptyBytes(), size: 0 };
  }

  public newValue(): Uint8Array {
    return new Uint8Array(0);
  }

  public create(buffer: Uint8Array): Uint8Array {
    return this.stripZeros ? stripTrailingZeros(buffer) : buffer.slice();
  }

  public sizeOf(value: Value): number {
    return asBytes(value, this.#typeName()).length;
  }

  public paddingSize(value: Value): number {
    return this.sizeOf(value);
  }

  public toBytes(value: Value): Uint8Array {
    return asBytes(value, this.#typeName());
  }

  #typeName(): string {
    return this.stripZeros ? "varchr" : "raw";
  }
}
