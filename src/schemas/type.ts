import type { Parser, ParseResult } from "../parsers/parser.ts";
import { ArrayParser } from "../parsers/array_parser.ts";
import type { PropertySpec } from "../parsers/fixed_parser.ts";
import type { LayoutItem } from "../serialization/scalar.ts";
import type { Value } from "../value/value.ts";
import type { DumpValue } from "../dump/dump.ts";

/**
 * Turns a dumped value into its human-readable form.
 */
export type Formatter = (value: DumpValue) => DumpValue;

/**
 * What a type contributes when it is merged into the fixed layout of an
 * enclosing struct. Primitive items take the byte order of that struct.
 */
export type InlineLayout =
  | { readonly kind: "primitive"; readonly items: readonly LayoutItem[] }
  | {
    readonly kind: "struct";
    readonly items: readonly LayoutItem[];
    readonly properties: readonly PropertySpec[];
  };

/**
 * Base class for all type definitions. A type compiles into its parser on
 * first use and keeps that parser for its lifetime.
 */
export abstract class Type<T extends Value = Value> {
  static #nextId = 0;

  /** Unique per type instance; keys formatter tables. */
  readonly id: number = Type.#nextId++;
  /** Readable name used in dumps and error messages. */
  readonly name?: string;
  #parser?: Parser<T>;
  #formatter?: Formatter;

  protected constructor(name?: string) {
    this.name = name;
  }

  /**
   * Builds the parser. Called at most once per type by {@link parser}.
   */
  protected abstract compile(): Parser<T>;

  /**
   * The compiled parser, created on first call.
   */
  public parser(): Parser<T> {
    return this.#parser ??= this.compile();
  }

  /**
   * Decodes one value from the front of a stream buffer.
   * @returns the value and the bytes it used, or undefined when the buffer
   *   does not hold a complete value yet.
   */
  public parse(buffer: Uint8Array): ParseResult<T> | undefined {
    return this.parser().parse(buffer);
  }

  /**
   * Decodes a value from all of `buffer`.
   * @throws {ParseError} when the bytes cannot form this type.
   */
  public create(buffer: Uint8Array): T {
    return this.parser().create(buffer);
  }

  /**
   * Returns a default value.
   */
  public new(): T {
    return this.parser().newValue();
  }

  public toBytes(value: T): Uint8Array {
    return this.parser().toBytes(value);
  }

  /**
   * Merged layout for an enclosing fixed struct, or undefined when this
   * type needs its own parser.
   */
  public inline(): InlineLayout | undefined {
    return undefined;
  }

  /**
   * Array of this type. Size zero makes a variable array that takes all
   * remaining bytes.
   */
  public array(size: number): Type {
    return new ArrayType(this, size);
  }

  public vararray(): Type {
    return this.array(0);
  }

  /**
   * True when the type grows to take whatever bytes are left.
   */
  public isExtra(): boolean {
    return false;
  }

  /**
   * Formatter applied to values of this type in human-readable dumps.
   */
  public get formatter(): Formatter | undefined {
    return this.#formatter ?? this.defaultFormatter();
  }

  /**
   * Sets the dump formatter. Structs capture formatters when they are
   * defined, so set it before using the type in a struct.
   */
  public setFormatter(formatter: Formatter): this {
    this.#formatter = formatter;
    return this;
  }

  protected defaultFormatter(): Formatter | undefined {
    return undefined;
  }

  public toString(): string {
    return this.name ?? `anonymous#${this.id}`;
  }
}

/**
 * Fixed or variable array of another type.
 */
export class ArrayType extends Type<Value[]> {
  readonly inner: Type;
  /** Element count; zero for a variable array. */
  readonly size: number;

  constructor(inner: Type, size = 0) {
    super();
    if (!Number.isInteger(size) || size < 0) {
      throw new RangeError(`Invalid array size: ${size}`);
    }
    this.inner = inner;
    this.size = size;
  }

  protected override compile(): Parser<Value[]> {
    return new ArrayParser(this.inner.parser(), this.size);
  }

  public override isExtra(): boolean {
    return this.size === 0;
  }

  public override array(size: number): ArrayType {
    if (this.size === 0) {
      throw new TypeError("variable length array cannot form array");
    }
    return new ArrayType(this, size);
  }

  public override toString(): string {
    return `${this.inner}[${this.size}]`;
  }
}
