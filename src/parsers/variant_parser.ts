import { StructParser } from "./struct_parser.ts";
import type { Classifier, ParseResult, StructHook } from "./parser.ts";
import { createStruct, type StructValue } from "../value/struct_value.ts";
import type { StructLikeType } from "../schemas/complex/struct_like_type.ts";
import { isStructValue } from "../value/field_container.ts";
import { BadLenError } from "../schemas/error.ts";
import { emptyBytes } from "../manipulate_bytes.ts";

export interface VariantParserOptions {
  typedef: StructLikeType;
  header?: StructParser;
  classifier?: Classifier;
  prepack?: StructHook;
  padding?: number;
}

/**
 * Base parser whose size is decided by the subtype it dispatches to. The
 * optional header is embedded and decoded before dispatch.
 */
export class VariantParser extends StructParser {
  readonly header?: StructParser;

  constructor(options: VariantParserOptions) {
    super({
      typedef: options.typedef,
      classifier: options.classifier,
      prepack: options.prepack,
      padding: options.padding ?? 1,
    });
    this.header = options.header;
  }

  #parseInner(
    data: Uint8Array,
    value: StructValue,
    create: boolean,
  ): number | undefined {
    value.seqs = [];
    let start = 0;
    if (this.header) {
      const result = this.header.parse(data, value.target);
      if (!result) {
        return undefined;
      }
      value.seqs.push(result.value);
      start = result.size;
    }
    const subtype = this.selectSubclass(value);
    if (!subtype) {
      return start;
    }
    if (create) {
      value.extend(subtype.createRaw(data.subarray(start), value.target));
      return data.length;
    }
    const result = subtype.parseRaw(data.subarray(start), value.target);
    if (!result) {
      return undefined;
    }
    value.extend(result.value);
    return start + result.size;
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
    const value = createStruct(this, inlineParent);
    value.seqs = [];
    if (this.header) {
      value.seqs.push(this.header.newValue(value.target));
    }
    return value;
  }

  public override unpack(data: Uint8Array, value: StructValue): Uint8Array {
    const size = this.#parseInner(data, value, true);
    if (size === undefined) {
      throw new BadLenError(`Not enough data for variant ${this.typedef}`);
    }
    return data.subarray(size);
  }

  #header(value: StructValue): StructValue | undefined {
    const header = value.seqs[0];
    return isStructValue(header) ? header : undefined;
  }

  public override pack(value: StructValue): Uint8Array {
    const header = this.#header(value);
    return this.header && header ? this.header.toBytes(header) : emptyBytes();
  }

  public override sizeOf(value: StructValue): number {
    const header = this.#header(value);
    return this.header && header ? this.header.paddingSize(header) : 0;
  }
}
