import { StructParser } from "./struct_parser.ts";
import type { Parser, ParseResult, StructHook } from "./parser.ts";
import { createStruct, type StructValue } from "../value/struct_value.ts";
import type { StructLikeType } from "../schemas/complex/struct_like_type.ts";
import type { Value } from "../value/value.ts";
import { BadLenError, throwInvalidError } from "../schemas/error.ts";
import { concatBytes } from "../manipulate_bytes.ts";

/**
 * Computes the element count of a dynamic array from the enclosing fields.
 */
export type LengthFunction = (value: StructValue) => number;

export interface DynamicArrayParserOptions {
  typedef: StructLikeType;
  inner: Parser;
  name: string;
  length: LengthFunction;
  padding?: number;
  prepack?: StructHook;
}

/**
 * Embedded parser for an array whose element count is stored elsewhere in
 * the struct.
 */
export class DynamicArrayParser extends StructParser {
  readonly inner: Parser;
  readonly name: string;
  readonly length: LengthFunction;

  constructor(options: DynamicArrayParserOptions) {
    super({
      typedef: options.typedef,
      padding: options.padding ?? 1,
      prepack: options.prepack,
    });
    this.inner = options.inner;
    this.name = options.name;
    this.length = options.length;
  }

  #parseInner(data: Uint8Array, value: StructValue): number | undefined {
    const count = this.length(value);
    const items: Value[] = [];
    let start = 0;
    for (let i = 0; i < count; i++) {
      const result = this.inner.parse(data.subarray(start));
      if (!result) {
        return undefined;
      }
      items.push(result.value);
      start += result.size;
    }
    value.target.set(this.name, items);
    return start;
  }

  public override parseRaw(
    buffer: Uint8Array,
    inlineParent?: StructValue,
  ): ParseResult<StructValue> | undefined {
    const value = createStruct(this, inlineParent);
    const size = this.#parseInner(buffer, value);
    return size === undefined ? undefined : { value, size };
  }

  protected override newRaw(inlineParent?: StructValue): StructValue {
    const value = createStruct(this, inlineParent);
    value.target.set(this.name, []);
    return value;
  }

  public override unpack(data: Uint8Array, value: StructValue): Uint8Array {
    const size = this.#parseInner(data, value);
    if (size === undefined) {
      throw new BadLenError(`Not enough data for dynamic array ${this.name}`);
    }
    return data.subarray(size);
  }

  #items(value: StructValue): Value[] {
    const items = value.target.get(this.name);
    if (!Array.isArray(items)) {
      throwInvalidError([this.name], items, String(this.typedef));
    }
    return items;
  }

  public override pack(value: StructValue): Uint8Array {
    return concatBytes(
      this.#items(value).map((item) => this.inner.toBytes(item)),
    );
  }

  public override sizeOf(value: StructValue): number {
    let size = 0;
    for (const item of this.#items(value)) {
      size += this.inner.paddingSize(item);
    }
    return size;
  }
}
