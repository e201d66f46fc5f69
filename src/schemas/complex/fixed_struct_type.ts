import { StructLikeType } from "./struct_like_type.ts";
import type { InlineLayout } from "../type.ts";
import {
  FixedParser,
  type PropertySpec,
} from "../../parsers/fixed_parser.ts";
import {
  type ClassifyValue,
  type Classifier,
  type Criteria,
  padTo,
  type SizeFunction,
  type StructHook,
} from "../../parsers/parser.ts";
import type { StructParser } from "../../parsers/struct_parser.ts";
import { Layout } from "../../serialization/layout.ts";
import {
  describeScalar,
  type LayoutItem,
} from "../../serialization/scalar.ts";
import type { StructValue } from "../../value/struct_value.ts";
import type { DumpRecord } from "../../dump/dump.ts";
import { mergeTo } from "../../dump/merge.ts";

export interface FixedStructTypeOptions {
  items: readonly LayoutItem[];
  properties: readonly PropertySpec[];
  size?: SizeFunction;
  prepack?: StructHook;
  base?: StructLikeType;
  criteria?: Criteria;
  padding: number;
  name?: string;
  /** Force or forbid merging into enclosing structs. */
  inline?: boolean;
  init?: StructHook;
  /** The struct type this layout was compiled for; parsed values report it. */
  owner?: StructLikeType;
  classifier?: Classifier;
  classifyBy?: readonly ClassifyValue[];
}

/**
 * A struct made only of fixed-width slots. Built by {@link StructType} for
 * runs of flattened fields and for structs that flatten completely.
 */
export class FixedStructType extends StructLikeType {
  readonly layout: Layout;
  readonly properties: readonly PropertySpec[];
  readonly #options: FixedStructTypeOptions;
  readonly #inline?: InlineLayout;

  constructor(options: FixedStructTypeOptions) {
    super(options.name);
    this.#options = options;
    this.layout = new Layout(options.items);
    this.properties = options.properties;
    const inlinable = options.inline ??
      (options.base === undefined && options.size === undefined &&
        options.prepack === undefined && options.init === undefined);
    if (inlinable) {
      const size = this.layout.size;
      const padded = padTo(size, options.padding);
      const items: LayoutItem[] = [...options.items];
      if (padded > size) {
        items.push({ kind: "pad", width: padded - size });
      }
      this.#inline = { kind: "struct", items, properties: this.properties };
    }
  }

  protected override compile(): StructParser {
    const options = this.#options;
    const base = options.base?.parser();
    const cached = this.cachedParser();
    if (cached) {
      return cached;
    }
    return this.cacheParser(
      new FixedParser({
        typedef: options.owner ?? this,
        layout: this.layout,
        properties: this.properties,
        size: options.size,
        prepack: options.prepack,
        base,
        criteria: options.criteria,
        padding: options.padding,
        init: options.init,
        classifier: options.classifier,
        classifyBy: options.classifyBy,
      }),
    );
  }

  public override inline(): InlineLayout | undefined {
    return this.#inline;
  }

  public override reorderProperties(
    unordered: DumpRecord,
    ordered: DumpRecord,
    _value: StructValue,
  ): void {
    for (const property of this.properties) {
      mergeTo(property.path, unordered, ordered);
    }
  }

  public override toString(): string {
    return this.name ??
      `fixed(${this.layout.slots.map(describeScalar).join(", ")})`;
  }
}
