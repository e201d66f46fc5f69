import {
  type ClassifyValue,
  type Classifier,
  classifyKey,
  type Criteria,
  never,
  padTo,
  type Parser,
  type ParseResult,
  type StructHook,
} from "./parser.ts";
import { createStruct, type StructValue } from "../value/struct_value.ts";
import type { StructLikeType } from "../schemas/complex/struct_like_type.ts";

/**
 * Options shared by every struct parser.
 */
export interface StructParserOptions {
  /** The type this parser was compiled from. */
  typedef: StructLikeType;
  /** Parser of the base type, when this is a subtype layer. */
  base?: StructParser;
  /** Selects this subtype from a base value. */
  criteria?: Criteria;
  /** Alignment of the whole value. Defaults to 8. */
  padding?: number;
  /** Runs on values created with `newValue`. */
  init?: StructHook;
  /** Computes the subtype key of base values. */
  classifier?: Classifier;
  /** Keys under which this subtype registers with its base classifier. */
  classifyBy?: readonly ClassifyValue[];
  /** Runs before packing. */
  prepack?: StructHook;
}

/**
 * Base class of all parsers that produce struct values. Handles subtype
 * registration and dispatch, alignment and the init and prepack hooks.
 */
export abstract class StructParser implements Parser<StructValue> {
  readonly typedef: StructLikeType;
  readonly base?: StructParser;
  readonly padding: number;
  readonly criteria: Criteria;
  readonly classifier?: Classifier;
  /** Subtypes in registration order. */
  readonly subclasses: StructParser[] = [];
  /** Subtypes by classify value. */
  readonly subIndices = new Map<ClassifyValue, StructParser>();
  readonly #init?: StructHook;
  readonly #prepack?: StructHook;

  protected constructor(options: StructParserOptions) {
    this.typedef = options.typedef;
    this.base = options.base;
    this.padding = options.padding ?? 8;
    this.criteria = options.criteria ?? never;
    this.classifier = options.classifier;
    this.#init = options.init;
    this.#prepack = options.prepack;
    if (this.base) {
      this.base.subclasses.push(this);
      for (const key of options.classifyBy ?? []) {
        this.base.subIndices.set(classifyKey(key), this);
      }
    }
  }

  /**
   * Decodes the base layer, then extends the value into matching subtypes.
   * Subtype parsers delegate to their base.
   */
  public parse(
    buffer: Uint8Array,
    inlineParent?: StructValue,
  ): ParseResult<StructValue> | undefined {
    if (this.base) {
      return this.base.parse(buffer, inlineParent);
    }
    const result = this.parseRaw(buffer, inlineParent);
    if (!result) {
      return undefined;
    }
    this.subclass(result.value);
    return { value: result.value, size: padTo(result.size, this.padding) };
  }

  /**
   * Walks to the terminal layer and extends it while a subtype matches.
   * Classifier lookup is tried before the criteria scan; both see the root
   * value. A terminal layer without residual bytes is not extended.
   */
  public subclass(value: StructValue): void {
    let parser: StructParser = this;
    let current = value;
    for (;;) {
      if (current.sub) {
        current = current.sub;
        parser = current.parser;
        continue;
      }
      if (!current.extra || current.extra.length === 0) {
        return;
      }
      const next = parser.selectSubclass(value);
      if (!next) {
        return;
      }
      current = current.subclassWith(next);
      parser = next;
    }
  }

  /**
   * Finds the direct subtype `value` belongs to, by classifier key first and
   * then by criteria in registration order.
   */
  public selectSubclass(value: StructValue): StructParser | undefined {
    if (this.classifier) {
      const key = this.classifier(value);
      const found = key === undefined
        ? undefined
        : this.subIndices.get(classifyKey(key));
      if (found) {
        return found;
      }
    }
    return this.subclasses.find((candidate) => candidate.criteria(value));
  }

  /**
   * Decodes only this layer from the front of `buffer`.
   * @returns the value and its real size, or undefined when more data is
   *   needed.
   * @internal
   */
  public abstract parseRaw(
    buffer: Uint8Array,
    inlineParent?: StructValue,
  ): ParseResult<StructValue> | undefined;

  public newValue(inlineParent?: StructValue): StructValue {
    let value: StructValue;
    if (this.base) {
      value = this.base.newValue(inlineParent);
      value.extend(this.newRaw(value.target));
    } else {
      value = this.newRaw(inlineParent);
    }
    this.#init?.(value);
    return value;
  }

  /**
   * Creates a default value of this layer only.
   */
  protected abstract newRaw(inlineParent?: StructValue): StructValue;

  /**
   * Unpacks this layer from all of `data` without subtype dispatch.
   * @internal
   */
  public createRaw(data: Uint8Array, inlineParent?: StructValue): StructValue {
    const value = createStruct(this, inlineParent);
    value.unpackChain(data);
    return value;
  }

  public create(data: Uint8Array, inlineParent?: StructValue): StructValue {
    if (this.base) {
      return this.base.create(data, inlineParent);
    }
    const value = this.createRaw(data, inlineParent);
    this.subclass(value);
    return value;
  }

  public paddingSize(value: StructValue): number {
    return padTo(value.realSize(), this.padding);
  }

  /**
   * Rounds a real size up to this parser's alignment.
   */
  public paddedLength(realSize: number): number {
    return padTo(realSize, this.padding);
  }

  public toBytes(value: StructValue, skipPrepack = false): Uint8Array {
    return value.toBytes(skipPrepack);
  }

  /**
   * Runs the prepack hook of this layer.
   */
  public prepack(value: StructValue): void {
    this.#prepack?.(value);
  }

  /**
   * Decodes this layer's fields from the front of `data`.
   * @returns the bytes this layer did not use.
   */
  public abstract unpack(data: Uint8Array, value: StructValue): Uint8Array;

  /**
   * Encodes this layer's fields only.
   */
  public abstract pack(value: StructValue): Uint8Array;

  public abstract sizeOf(value: StructValue): number;
}
