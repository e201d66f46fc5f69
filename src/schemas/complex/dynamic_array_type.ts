import { StructLikeType } from "./struct_like_type.ts";
import type { Type } from "../type.ts";
import { StructDefinitionError } from "../error.ts";
import type { StructHook } from "../../parsers/parser.ts";
import {
  DynamicArrayParser,
  type LengthFunction,
} from "../../parsers/dynamic_array_parser.ts";
import type { StructParser } from "../../parsers/struct_parser.ts";
import type { StructValue } from "../../value/struct_value.ts";
import type { DumpRecord } from "../../dump/dump.ts";
import { mergeTo } from "../../dump/merge.ts";

export interface DynamicArrayTypeOptions {
  /** Aligns the byte size of the whole array. */
  padding?: number;
  prepack?: StructHook;
}

/**
 * An array whose element count is computed from fields decoded before it.
 * Used as an anonymous struct field. When the byte size of the struct is
 * stored instead, prefer a `size` function with a variable array last.
 */
export class DynamicArrayType extends StructLikeType {
  readonly inner: Type;
  readonly fieldName: string;
  readonly length: LengthFunction;
  readonly #options: DynamicArrayTypeOptions;

  constructor(
    inner: Type,
    fieldName: string,
    length: LengthFunction,
    options: DynamicArrayTypeOptions = {},
  ) {
    super();
    if (fieldName === "") {
      throw new StructDefinitionError("A dynamic array field must be named");
    }
    this.inner = inner;
    this.fieldName = fieldName;
    this.length = length;
    this.#options = options;
    if (inner.formatter) {
      this.formatters.setElement([fieldName], inner.formatter);
    }
  }

  protected override compile(): StructParser {
    return this.cacheParser(
      new DynamicArrayParser({
        typedef: this,
        inner: this.inner.parser(),
        name: this.fieldName,
        length: this.length,
        padding: this.#options.padding,
        prepack: this.#options.prepack,
      }),
    );
  }

  public override array(_size: number): never {
    throw new TypeError("dynamic array type cannot form array");
  }

  public override reorderProperties(
    unordered: DumpRecord,
    ordered: DumpRecord,
    _value: StructValue,
  ): void {
    mergeTo([this.fieldName], unordered, ordered);
  }

  public override toString(): string {
    return `${this.inner}[]`;
  }
}
