import { StructLikeType } from "./struct_like_type.ts";
import { ArrayType, type Type } from "../type.ts";
import { StructDefinitionError } from "../error.ts";
import type { Criteria, StructHook } from "../../parsers/parser.ts";
import { OptionalParser } from "../../parsers/optional_parser.ts";
import type { StructParser } from "../../parsers/struct_parser.ts";
import type { StructValue } from "../../value/struct_value.ts";
import type { DumpRecord } from "../../dump/dump.ts";
import { mergeTo } from "../../dump/merge.ts";

export interface OptionalTypeOptions {
  prepack?: StructHook;
}

/**
 * A field decoded only when `present` holds for the fields before it, and
 * encoded only when it is set. Used as an anonymous struct field; values
 * created with `new` leave it unset.
 *
 * ```ts
 * const message = new StructType([
 *   [uint16, "data"],
 *   [uint8, "hasExtra"],
 *   [new OptionalType(uint32, "extra", (v) => v.getNumber("hasExtra") !== 0)],
 * ], { name: "message", padding: 1 });
 * ```
 */
export class OptionalType extends StructLikeType {
  readonly base: Type;
  readonly fieldName: string;
  readonly present: Criteria;
  readonly #prepack?: StructHook;

  constructor(
    base: Type,
    fieldName: string,
    present: Criteria,
    options: OptionalTypeOptions = {},
  ) {
    super();
    if (fieldName === "") {
      throw new StructDefinitionError("An optional field must be named");
    }
    this.base = base;
    this.fieldName = fieldName;
    this.present = present;
    this.#prepack = options.prepack;
    if (base instanceof ArrayType && base.inner.formatter) {
      this.formatters.setElement([fieldName], base.inner.formatter);
    }
    if (base.formatter) {
      this.formatters.setValue([fieldName], base.formatter);
    }
  }

  protected override compile(): StructParser {
    return this.cacheParser(
      new OptionalParser({
        typedef: this,
        inner: this.base.parser(),
        name: this.fieldName,
        present: this.present,
        prepack: this.#prepack,
      }),
    );
  }

  public override array(_size: number): never {
    throw new TypeError("optional type cannot form array");
  }

  public override isExtra(): boolean {
    return this.base.isExtra();
  }

  public override reorderProperties(
    unordered: DumpRecord,
    ordered: DumpRecord,
    _value: StructValue,
  ): void {
    mergeTo([this.fieldName], unordered, ordered);
  }

  public override toString(): string {
    return `${this.base}?`;
  }
}
