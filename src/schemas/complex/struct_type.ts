import { StructLikeType } from "./struct_like_type.ts";
import { FixedStructType } from "./fixed_struct_type.ts";
import type { VariantType } from "./variant_type.ts";
import { ArrayType, type InlineLayout, Type } from "../type.ts";
import { stdPrimByName } from "../primitive/std_prims.ts";
import { StructDefinitionError } from "../error.ts";
import type {
  ClassifyValue,
  Classifier,
  Criteria,
  SizeFunction,
  StructHook,
} from "../../parsers/parser.ts";
import type { PropertySpec } from "../../parsers/fixed_parser.ts";
import {
  type SequenceEntry,
  SequencedParser,
} from "../../parsers/sequenced_parser.ts";
import type { StructParser } from "../../parsers/struct_parser.ts";
import type { LayoutItem } from "../../serialization/scalar.ts";
import type { StructValue } from "../../value/struct_value.ts";
import { isStructValue } from "../../value/field_container.ts";
import type { DumpRecord } from "../../dump/dump.ts";
import type { StructFormatter } from "../../dump/formatter_table.ts";
import { mergeTo } from "../../dump/merge.ts";
import { type Endian, getConfig, warnDefinition } from "../../config.ts";

/**
 * A field's type: a type object, a primitive name such as `"uint16"` or
 * `"4s"`, or the fields of an anonymous nested struct.
 */
export type FieldType = Type | string | readonly FieldDecl[];

/**
 * `[type, name]` for a named field, `[type]` for an embedded struct or
 * padding.
 */
export type FieldDecl = readonly [FieldType, string?];

/**
 * Types a struct can derive from.
 */
export type BaseStructType = StructType | VariantType;

export interface StructTypeOptions {
  /** Readable name. A warning is logged when it is missing. */
  name?: string;
  /** Real size of the value, computed from the decoded fixed prefix. */
  size?: SizeFunction;
  /** Runs before packing, e.g. to store the size. */
  prepack?: StructHook;
  /** Makes this a subtype; base values holding the right data extend into it. */
  base?: BaseStructType;
  /** Selects this subtype when the base has no classifier match. */
  criteria?: Criteria;
  /** Computes the key that selects subtypes by their `classifyBy` values. */
  classifier?: Classifier;
  classifyBy?: readonly ClassifyValue[];
  /** Alignment in bytes; 1 disables it. Defaults to the configured padding. */
  padding?: number;
  /** Byte order of flattened primitives. Defaults to the configured order. */
  endian?: Endian;
  /**
   * Whether the last field takes all remaining bytes. Decided from the last
   * field's type when not set.
   */
  lastExtra?: boolean;
  /** Force or forbid merging this struct into enclosing structs. */
  inline?: boolean;
  /** Runs on values created with `new`. */
  init?: StructHook;
  /** Formats the whole dumped record. */
  formatter?: StructFormatter;
  /**
   * Types used to format fields in dumps, by dotted property path, e.g.
   * `{ "header.kind": kindEnum }`.
   */
  extend?: Readonly<Record<string, Type>>;
}

const KNOWN_OPTIONS: ReadonlySet<string> = new Set([
  "name",
  "size",
  "prepack",
  "base",
  "criteria",
  "classifier",
  "classifyBy",
  "padding",
  "endian",
  "lastExtra",
  "inline",
  "init",
  "formatter",
  "extend",
]);

interface Entry {
  readonly type: Type;
  readonly name?: string;
  readonly count?: number;
}

function resolveFieldType(type: FieldType, endian: Endian): Type {
  if (type instanceof Type) {
    return type;
  }
  if (typeof type === "string") {
    return stdPrimByName(type);
  }
  return new StructType(type, { padding: 1, endian, name: undefined });
}

function withEndian(items: readonly LayoutItem[], endian: Endian): LayoutItem[] {
  return items.map((item) =>
    item.kind === "pad"
      ? item
      : { ...item, littleEndian: endian === "little" }
  );
}

/**
 * A struct declared as an ordered list of fields.
 *
 * Fields whose types have a fixed layout are merged into one fixed-width
 * segment; the others get their own parser. A struct whose fields all merge
 * compiles to a single fixed layout and may itself be merged into
 * enclosing structs.
 *
 * ```ts
 * const header = new StructType(
 *   [[uint8, "kind"], [uint16, "length"], [raw, "data"]],
 *   { name: "header", padding: 1, size: sizeFromLen(1024, "length") },
 * );
 * ```
 */
export class StructType extends StructLikeType {
  readonly base?: BaseStructType;
  readonly classifier?: Classifier;
  readonly padding: number;
  readonly endian: Endian;
  readonly lastExtra: boolean;
  readonly #options: StructTypeOptions;
  readonly #entries: readonly Entry[];
  readonly #fixed?: FixedStructType;
  readonly #inline?: InlineLayout;

  constructor(fields: readonly FieldDecl[], options: StructTypeOptions = {}) {
    super(options.name, options.formatter);
    const config = getConfig();
    this.#options = options;
    this.base = options.base;
    this.classifier = options.classifier;
    this.padding = options.padding ?? config.defaultPadding;
    this.endian = options.endian ?? config.defaultEndian;
    if (!Number.isInteger(this.padding) || this.padding < 1) {
      throw new StructDefinitionError(
        `padding must be a positive integer, got ${this.padding}`,
      );
    }
    for (const key of Object.keys(options)) {
      if (!KNOWN_OPTIONS.has(key)) {
        warnDefinition(`Option ${key} is not recognized`, { type: String(this) });
      }
    }
    if (!("name" in options)) {
      warnDefinition("A struct is not named", { fields: fields.length });
    }
    const base = options.base;
    if (base) {
      this.formatters.merge(base.formatters);
      if (options.inline) {
        throw new StructDefinitionError("Cannot inline a struct with a base type");
      }
      if (options.classifyBy !== undefined && base.classifier === undefined) {
        throw new StructDefinitionError(
          `${this} has classifyBy values but base ${base} has no classifier`,
        );
      }
      if (options.classifyBy === undefined && base.classifier !== undefined) {
        warnDefinition(
          `Base ${base} has a classifier but subtype ${this} has no classifyBy`,
        );
      }
    } else {
      if (options.classifyBy !== undefined) {
        throw new StructDefinitionError(
          `${this} has classifyBy values without a base type`,
        );
      }
      if (options.criteria !== undefined) {
        throw new StructDefinitionError(`${this} has criteria without a base type`);
      }
      if (!("padding" in options)) {
        warnDefinition(
          `padding is not set on ${this}; using ${this.padding}`,
        );
      }
    }

    const entries: Entry[] = [];
    let items: LayoutItem[] = [];
    let properties: PropertySpec[] = [];
    const flush = (): void => {
      if (items.length > 0) {
        entries.push({
          type: new FixedStructType({ items, properties, padding: 1 }),
        });
        items = [];
        properties = [];
      }
    };

    fields.forEach((field, index) => {
      let type = resolveFieldType(field[0], this.endian);
      const name = field[1];
      let count: number | undefined;
      if (type instanceof ArrayType) {
        if (name !== undefined && type.formatter) {
          this.formatters.setValue([name], type.formatter);
        }
        count = type.size;
        type = type.inner;
      }
      const formatter = type.formatter;
      if (name !== undefined && formatter) {
        if (count === undefined) {
          this.formatters.setValue([name], formatter);
        } else {
          this.formatters.setElement([name], formatter);
        }
      }
      const isLast = index === fields.length - 1;
      let inline = isLast && options.lastExtra ? undefined : type.inline();
      if (
        inline && count !== undefined &&
        (count === 0 || inline.kind === "struct")
      ) {
        inline = undefined;
      }
      if (!inline) {
        flush();
        if (name !== undefined) {
          entries.push({ type, name, count });
          return;
        }
        if (count !== undefined) {
          throw new StructDefinitionError(
            `Anonymous array field of ${type} in ${this}`,
          );
        }
        if (type instanceof StructLikeType && type.name !== undefined) {
          this.inlineNames.set(
            type.name,
            entries.filter((entry) => entry.name === undefined).length,
          );
        }
        entries.push({ type });
        return;
      }
      if (inline.kind === "primitive") {
        const merged = withEndian(inline.items, this.endian);
        const width = merged.reduce((sum, item) => sum + item.width, 0);
        const repeat = count ?? 1;
        if (name === undefined) {
          items.push({ kind: "pad", width: width * repeat });
          return;
        }
        for (let i = 0; i < repeat; i++) {
          items.push(...merged);
        }
        properties.push(
          count === undefined ? { path: [name] } : { path: [name], count },
        );
        return;
      }
      items.push(...inline.items);
      for (const property of inline.properties) {
        properties.push(
          name === undefined
            ? property
            : { path: [name, ...property.path], count: property.count },
        );
      }
      if (type instanceof StructLikeType) {
        const prefix = name === undefined ? [] : [name];
        this.formatters.merge(type.formatters, prefix);
        if (type.dumpFormatter) {
          this.formatters.addRecord(prefix, type.dumpFormatter);
        }
      }
    });

    let lastExtra: boolean;
    if (entries.length === 0) {
      this.#fixed = new FixedStructType({
        items,
        properties,
        size: options.size,
        prepack: options.prepack,
        base: options.base,
        criteria: options.criteria,
        padding: this.padding,
        name: options.name,
        inline: options.inline,
        init: options.init,
        owner: this,
        classifier: options.classifier,
        classifyBy: options.classifyBy,
      });
      this.#inline = this.#fixed.inline();
      lastExtra = false;
    } else if (items.length > 0) {
      flush();
      lastExtra = false;
    } else if (options.lastExtra !== undefined) {
      lastExtra = options.lastExtra;
    } else {
      const last = entries[entries.length - 1];
      lastExtra = last.count === 0 ||
        (last.count === undefined && last.type.isExtra());
    }
    this.lastExtra = lastExtra;
    this.#entries = entries;

    if (options.extend) {
      for (const [key, type] of Object.entries(options.extend)) {
        const path = key.split(".");
        if (type.formatter) {
          this.formatters.setValue(path, type.formatter);
        }
        if (type instanceof ArrayType && type.inner.formatter) {
          this.formatters.setElement(path, type.inner.formatter);
        }
      }
    }
    base?.derive(this);
  }

  protected override compile(): StructParser {
    this.base?.parser();
    if (!this.#fixed) {
      for (const entry of this.#entries) {
        entry.type.parser();
      }
    }
    const cached = this.cachedParser();
    if (cached) {
      return cached;
    }
    const options = this.#options;
    const parser = this.#fixed
      ? this.#fixed.parser()
      : new SequencedParser({
        typedef: this,
        entries: this.#entries.map((entry): SequenceEntry => ({
          parser: entry.type.parser(),
          name: entry.name,
          count: entry.count,
        })),
        size: options.size,
        prepack: options.prepack,
        lastExtra: this.lastExtra,
        base: this.base?.parser(),
        criteria: options.criteria,
        padding: this.padding,
        init: options.init,
        classifier: options.classifier,
        classifyBy: options.classifyBy,
      });
    this.cacheParser(parser);
    for (const subclass of this.subclasses) {
      subclass.parser();
    }
    return parser;
  }

  public override inline(): InlineLayout | undefined {
    return this.#inline;
  }

  /**
   * A struct takes all remaining bytes when it has neither a base nor a
   * size function and its last field does.
   */
  public override isExtra(): boolean {
    return this.#options.size === undefined && this.base === undefined &&
      this.lastExtra;
  }

  public override reorderProperties(
    unordered: DumpRecord,
    ordered: DumpRecord,
    value: StructValue,
  ): void {
    let layer = value;
    while (layer.getBaseType() !== this) {
      layer.getBaseType().reorderProperties(unordered, ordered, layer);
      if (!layer.sub) {
        return;
      }
      layer = layer.sub;
    }
    if (this.#fixed) {
      this.#fixed.reorderProperties(unordered, ordered, layer);
      return;
    }
    let seqIndex = 0;
    for (const entry of this.#entries) {
      if (entry.name !== undefined) {
        mergeTo([entry.name], unordered, ordered);
        continue;
      }
      const embedded = layer.seqs[seqIndex++];
      if (isStructValue(embedded)) {
        embedded.getType().reorderProperties(unordered, ordered, embedded);
      }
    }
  }
}
