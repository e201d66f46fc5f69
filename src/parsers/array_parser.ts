import type { Parser, ParseResult } from "./parser.ts";
import type { Value } from "../value/value.ts";
import { BadLenError, throwInvalidError } from "../schemas/error.ts";
import { concatBytes } from "../manipulate_bytes.ts";

/**
 * Parser for arrays. A fixed array has exactly `size` elements, missing
 * ones encode as defaults; size zero takes elements until the data runs out.
 */
export class ArrayParser implements Parser<Value[]> {
  readonly inner: Parser;
  readonly size: number;

  constructor(inner: Parser, size: number) {
    this.inner = inner;
    this.size = size;
  }

  public parse(buffer: Uint8Array): ParseResult<Value[]> | undefined {
    const items: Value[] = [];
    let offset = 0;
    for (let i = 0; i < this.size; i++) {
      const result = this.inner.parse(buffer.subarray(offset));
      if (!result) {
        return undefined;
      }
      items.push(result.value);
      offset += result.size;
    }
    return { value: items, size: offset };
  }

  public newValue(): Value[] {
    const items: Value[] = [];
    for (let i = 0; i < this.size; i++) {
      items.push(this.inner.newValue());
    }
    return items;
  }

  public create(buffer: Uint8Array): Value[] {
    if (this.size > 0) {
      const result = this.parse(buffer);
      if (!result) {
        throw new BadLenError(
          `data is not enough to create an array of size ${this.size}`,
        );
      }
      return result.value;
    }
    const items: Value[] = [];
    let offset = 0;
    while (offset < buffer.length) {
      const result = this.inner.parse(buffer.subarray(offset));
      if (!result || result.size === 0) {
        break;
      }
      items.push(result.value);
      offset += result.size;
    }
    return items;
  }

  #elements(value: Value): Value[] {
    if (!Array.isArray(value)) {
      throwInvalidError([], value, "array");
    }
    const count = this.size === 0 ? value.length : this.size;
    const elements: Value[] = [];
    for (let i = 0; i < count; i++) {
      elements.push(i < value.length ? value[i] : this.inner.newValue());
    }
    return elements;
  }

  public sizeOf(value: Value): number {
    let size = 0;
    for (const element of this.#elements(value)) {
      size += this.inner.paddingSize(element);
    }
    return size;
  }

  public paddingSize(value: Value): number {
    return this.sizeOf(value);
  }

  public toBytes(value: Value): Uint8Array {
    return concatBytes(
      this.#elements(value).map((element) => this.inner.toBytes(element)),
    );
  }
}
