import { Type } from "../type.ts";
import type { StructParser } from "../../parsers/struct_parser.ts";
import type { StructValue } from "../../value/struct_value.ts";
import type { FieldValues } from "../../value/value.ts";
import type { DumpRecord } from "../../dump/dump.ts";
import {
  FormatterTable,
  type StructFormatter,
} from "../../dump/formatter_table.ts";
import { applyFormatterTable, formatEmbedded } from "../../dump/format.ts";
import { mergeDict } from "../../dump/merge.ts";

/**
 * Replaces an embedded struct, named by its type or type name, with a
 * fresh value of another type.
 */
export type EmbeddedReplacement = readonly [
  string | StructLikeType,
  StructLikeType,
];

/**
 * Base class of types whose values are {@link StructValue}s.
 */
export abstract class StructLikeType extends Type<StructValue> {
  /** Dump formatters by property path. */
  readonly formatters: FormatterTable = new FormatterTable();
  /** Embedded struct slots by the embedded type's name. */
  readonly inlineNames = new Map<string, number>();
  /** Applied to the whole dumped record after the field formatters. */
  readonly dumpFormatter?: StructFormatter;
  /** Types declared with this type as their base. */
  readonly subclasses: StructLikeType[] = [];
  #parser?: StructParser;

  protected constructor(name?: string, dumpFormatter?: StructFormatter) {
    super(name);
    this.dumpFormatter = dumpFormatter;
  }

  /**
   * Builds the parser and stores it with {@link cacheParser} before
   * compiling anything that may refer back to this type.
   */
  protected abstract override compile(): StructParser;

  public override parser(): StructParser {
    return this.#parser ?? this.compile();
  }

  protected cachedParser(): StructParser | undefined {
    return this.#parser;
  }

  protected cacheParser(parser: StructParser): StructParser {
    this.#parser = parser;
    return parser;
  }

  /**
   * Registers a subtype. A subtype declared after this type compiled is
   * compiled right away so the base parser dispatches to it.
   */
  public derive(child: StructLikeType): void {
    this.subclasses.push(child);
    if (this.#parser) {
      child.parser();
    }
  }

  /**
   * Creates a value with default fields, then replaces embedded structs and
   * assigns `fields`.
   */
  public override new(
    fields: FieldValues = {},
    ...replacements: readonly EmbeddedReplacement[]
  ): StructValue {
    const value = this.parser().newValue();
    for (const [name, type] of replacements) {
      value.replaceEmbeddedType(name, type);
    }
    for (const [key, field] of Object.entries(fields)) {
      value.set(key, field);
    }
    return value;
  }

  /**
   * Applies this type's formatters and those of every embedded struct.
   */
  public formatDump(record: DumpRecord, value: StructValue): DumpRecord {
    return formatEmbedded(applyFormatterTable(record, this.formatters), value);
  }

  /**
   * Moves the entries this type declares from `unordered` into `ordered`,
   * in declaration order.
   */
  public reorderProperties(
    _unordered: DumpRecord,
    _ordered: DumpRecord,
    _value: StructValue,
  ): void {}

  /**
   * Returns `record` with declared fields first, in declaration order.
   */
  public reorderDump(record: DumpRecord, value: StructValue): DumpRecord {
    const ordered: DumpRecord = {};
    this.reorderProperties(record, ordered, value);
    mergeDict(record, ordered);
    return ordered;
  }
}
