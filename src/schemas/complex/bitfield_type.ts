import { StructLikeType } from "./struct_like_type.ts";
import { ArrayType, type Type } from "../type.ts";
import type { PrimType } from "../primitive/prim_type.ts";
import { StructDefinitionError } from "../error.ts";
import {
  type BitfieldField,
  BitfieldParser,
} from "../../parsers/bitfield_parser.ts";
import type { StructHook } from "../../parsers/parser.ts";
import type { StructParser } from "../../parsers/struct_parser.ts";
import type { StructValue } from "../../value/struct_value.ts";
import type { DumpRecord } from "../../dump/dump.ts";
import type { StructFormatter } from "../../dump/formatter_table.ts";
import { mergeTo } from "../../dump/merge.ts";
import { warnDefinition } from "../../config.ts";

/**
 * `[bits, name]` for a field, `[bits, name, count]` for an array of
 * `count` fields of `bits` each, `[bits]` for unused bits.
 */
export type BitfieldDecl = readonly [number, string?, number?];

export interface BitfieldTypeOptions {
  name?: string;
  init?: StructHook;
  prepack?: StructHook;
  formatter?: StructFormatter;
  /** Types used to format fields in dumps, by field name. */
  extend?: Readonly<Record<string, Type>>;
}

const KNOWN_OPTIONS: ReadonlySet<string> = new Set([
  "name",
  "init",
  "prepack",
  "formatter",
  "extend",
]);

/**
 * Splits an integer primitive into bit fields. Fields are laid out from the
 * most significant bit down, whatever the byte order of the base type, and
 * may cross byte boundaries.
 *
 * ```ts
 * const flags = new BitfieldType(uint16, [[4, "version"], [3], [9, "length"]], {
 *   name: "flags",
 * });
 * ```
 */
export class BitfieldType extends StructLikeType {
  readonly base: PrimType;
  readonly fields: readonly BitfieldField[];
  readonly #options: BitfieldTypeOptions;

  constructor(
    base: PrimType,
    fields: readonly BitfieldDecl[],
    options: BitfieldTypeOptions = {},
  ) {
    super(options.name, options.formatter);
    for (const key of Object.keys(options)) {
      if (!KNOWN_OPTIONS.has(key)) {
        warnDefinition(`Option ${key} is not recognized`, { type: String(this) });
      }
    }
    if (!base.isInteger()) {
      throw new StructDefinitionError(
        `Bit field base must be an integer type, got ${base}`,
      );
    }
    this.base = base;
    this.#options = options;
    const parsed: BitfieldField[] = [];
    let start = 0;
    for (const [bits, name, count] of fields) {
      if (!Number.isInteger(bits) || bits < 1) {
        throw new StructDefinitionError(`Invalid bit field width ${bits}`);
      }
      if (name === undefined) {
        if (count !== undefined) {
          throw new StructDefinitionError("Unused bits cannot form an array");
        }
        start += bits;
        continue;
      }
      if (count === undefined) {
        parsed.push({ name, start, end: start + bits });
        start += bits;
        continue;
      }
      if (!Number.isInteger(count) || count < 1) {
        throw new StructDefinitionError(
          `Invalid bit field array length ${count} for ${name}`,
        );
      }
      parsed.push({ name, start, end: start + bits * count, width: bits });
      start += bits * count;
    }
    const available = base.item.width * 8;
    if (start > available) {
      throw new StructDefinitionError(
        `Bit fields need ${Math.ceil(start / 8)} bytes, base type ${base} has only ${base.item.width} bytes`,
      );
    }
    this.fields = parsed;

    for (const [key, type] of Object.entries(options.extend ?? {})) {
      if (key.includes(".")) {
        throw new StructDefinitionError(
          `Cannot extend bit field ${this} with property path ${key}`,
        );
      }
      if (type.formatter) {
        this.formatters.setValue([key], type.formatter);
      }
      if (type instanceof ArrayType && type.inner.formatter) {
        this.formatters.setElement([key], type.inner.formatter);
      }
    }
  }

  protected override compile(): StructParser {
    return this.cacheParser(
      new BitfieldParser({
        typedef: this,
        baseParser: this.base.parser(),
        fields: this.fields,
        init: this.#options.init,
        prepack: this.#options.prepack,
      }),
    );
  }

  public override isExtra(): boolean {
    return this.base.isExtra();
  }

  public override reorderProperties(
    unordered: DumpRecord,
    ordered: DumpRecord,
    _value: StructValue,
  ): void {
    for (const field of this.fields) {
      mergeTo([field.name], unordered, ordered);
    }
  }
}
