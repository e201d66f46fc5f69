import { StructParser } from "./struct_parser.ts";
import type { Criteria, Parser, ParseResult, StructHook } from "./parser.ts";
import { createStruct, type StructValue } from "../value/struct_value.ts";
import type { StructLikeType } from "../schemas/complex/struct_like_type.ts";
import { BadLenError } from "../schemas/error.ts";
import { emptyBytes } from "../manipulate_bytes.ts";

export interface OptionalParserOptions {
  typedef: StructLikeType;
  inner: Parser;
  name: string;
  /** Decides from the enclosing fields whether the field is present. */
  present: Criteria;
  prepack?: StructHook;
}

/**
 * Embedded parser for a field that is only decoded when a condition on the
 * preceding fields holds, and only encoded when the field is set.
 */
export class OptionalParser extends StructParser {
  readonly inner: Parser;
  readonly name: string;
  readonly present: Criteria;

  constructor(options: OptionalParserOptions) {
    super({ typedef: options.typedef, padding: 1, prepack: options.prepack });
    this.inner = options.inner;
    this.name = options.name;
    this.present = options.present;
  }

  #parseInner(
    data: Uint8Array,
    value: StructValue,
    create: boolean,
  ): number | undefined {
    if (!this.present(value)) {
      return 0;
    }
    if (create) {
      value.target.set(this.name, this.inner.create(data));
      return data.length;
    }
    const result = this.inner.parse(data);
    if (!result) {
      return undefined;
    }
    value.target.set(this.name, result.value);
    return result.size;
  }

  public override parseRaw(
    buffer: Uint8Array,
    inlineParent?: StructValue,
  ): ParseResult<StructValue> | undefined {
    const value = createStruct(this, inlineParent);
    const size = this.#parseInner(buffer, value, false);
    return size === undefined ? undefined : { value, size };
  }

  protected override newRaw(inlineParent?: StructValue): StructValue {
    return createStruct(this, inlineParent);
  }

  public override unpack(data: Uint8Array, value: StructValue): Uint8Array {
    const size = this.#parseInner(data, value, true);
    if (size === undefined) {
      throw new BadLenError(`Not enough data for optional field ${this.name}`);
    }
    return data.subarray(size);
  }

  public override pack(value: StructValue): Uint8Array {
    const field = value.target.get(this.name);
    return field === undefined ? emptyBytes() : this.inner.toBytes(field);
  }

  public override sizeOf(value: StructValue): number {
    const field = value.target.get(this.name);
    return field === undefined ? 0 : this.inner.paddingSize(field);
  }
}
