import { StructLikeType } from "./struct_like_type.ts";
import type { Classifier, StructHook } from "../../parsers/parser.ts";
import type { StructParser } from "../../parsers/struct_parser.ts";
import { VariantParser } from "../../parsers/variant_parser.ts";
import type { StructValue } from "../../value/struct_value.ts";
import { isStructValue } from "../../value/field_container.ts";
import type { DumpRecord } from "../../dump/dump.ts";
import { warnDefinition } from "../../config.ts";

export interface VariantTypeOptions {
  name?: string;
  /** Embedded struct decoded before the subtype is selected. */
  header?: StructLikeType;
  classifier?: Classifier;
  prepack?: StructHook;
  /** Alignment of the whole value. Defaults to 1. */
  padding?: number;
}

/**
 * A base type without a size of its own: the subtype selected after the
 * header decides how many bytes the value takes. Data of an unknown
 * subtype cannot be skipped, so use this only for formats that need it.
 */
export class VariantType extends StructLikeType {
  readonly header?: StructLikeType;
  readonly classifier?: Classifier;
  readonly #options: VariantTypeOptions;

  constructor(options: VariantTypeOptions = {}) {
    super(options.name);
    if (options.name === undefined) {
      warnDefinition("A variant type is not named");
    }
    this.header = options.header;
    this.classifier = options.classifier;
    this.#options = options;
    const headerName = options.header?.name;
    if (headerName !== undefined) {
      this.inlineNames.set(headerName, 0);
    }
  }

  protected override compile(): StructParser {
    const header = this.header?.parser();
    const parser = this.cacheParser(
      new VariantParser({
        typedef: this,
        header,
        classifier: this.classifier,
        prepack: this.#options.prepack,
        padding: this.#options.padding,
      }),
    );
    for (const subclass of this.subclasses) {
      subclass.parser();
    }
    return parser;
  }

  public override reorderProperties(
    unordered: DumpRecord,
    ordered: DumpRecord,
    value: StructValue,
  ): void {
    const header = value.seqs[0];
    if (isStructValue(header)) {
      header.getType().reorderProperties(unordered, ordered, header);
    }
  }

  public override toString(): string {
    return this.name ?? "<variant>";
  }
}
