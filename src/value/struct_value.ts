import { FieldContainer } from "./field_container.ts";
import type { Value } from "./value.ts";
import type { StructParser } from "../parsers/struct_parser.ts";
import type { StructLikeType } from "../schemas/complex/struct_like_type.ts";
import {
  concatBytes,
  emptyBytes,
  padWithZeros,
} from "../manipulate_bytes.ts";

/**
 * Where an embedded struct lives: the value owning the `seqs` slot and the
 * slot index.
 */
export interface EmbeddedSlot {
  readonly owner: StructValue;
  readonly index: number;
}

/**
 * A decoded or freshly created struct.
 *
 * Subtype layers and embedded sub-structs are {@link EmbeddedStruct}s whose
 * field reads and writes go to the root value, so every layer sees the same
 * fields.
 */
export class StructValue extends FieldContainer {
  /** The parser that packs and unpacks this layer. */
  readonly parser: StructParser;
  /** The value holding the field storage; `this` for a root value. */
  readonly target: StructValue;
  /** @internal Next layer of the subtype chain. */
  sub?: StructValue;
  /** @internal Residual bytes; only the terminal layer has them. */
  extra?: Uint8Array;
  /** @internal Embedded values of anonymous fields, in field order. */
  seqs: Value[] = [];
  /** @internal Embedded slots by type name; kept on the root value. */
  readonly embeddedIndices = new Map<string, EmbeddedSlot>();
  readonly #fields = new Map<string, Value>();

  constructor(parser: StructParser, inlineParent?: StructValue) {
    super();
    this.parser = parser;
    this.target = inlineParent ?? this;
  }

  protected override fieldMap(): Map<string, Value> {
    return this.target.#fields;
  }

  public override isStruct(): boolean {
    return true;
  }

  /**
   * True when this value forwards its fields to another value.
   */
  public isEmbedded(): boolean {
    return this.target !== this;
  }

  /**
   * Fields stored on this value itself; empty for embedded values.
   */
  public ownEntries(): [string, Value][] {
    return [...this.#fields.entries()];
  }

  /**
   * Unpacks every layer of the chain from `data`. Bytes left over after the
   * last layer become its residual bytes.
   * @internal
   */
  public unpackChain(data: Uint8Array): void {
    let current: StructValue | undefined = this;
    let last: StructValue = this;
    let rest = data;
    while (current) {
      const next: StructValue | undefined = current.sub;
      rest = current.parser.unpack(rest, current);
      if (next === undefined && current.sub !== undefined) {
        // A variant layer appended its subtype, which unpacked the rest.
        return;
      }
      last = current;
      current = next;
    }
    last.extra = rest;
  }

  /**
   * Packs every layer followed by the residual bytes, without padding.
   * @internal
   */
  public packChain(): Uint8Array {
    const parts: Uint8Array[] = [];
    let current: StructValue | undefined = this;
    let last: StructValue = this;
    while (current) {
      parts.push(current.parser.pack(current));
      last = current;
      current = current.sub;
    }
    parts.push(last.extra ?? emptyBytes());
    return concatBytes(parts);
  }

  /**
   * Runs the prepack hooks of every layer, base first.
   * @internal
   */
  public prepackChain(): void {
    let current: StructValue | undefined = this;
    while (current) {
      current.parser.prepack(current);
      current = current.sub;
    }
  }

  /**
   * Serializes the value, padded with zero bytes to the root alignment.
   * @param skipPrepack Skip the prepack hooks.
   */
  public toBytes(skipPrepack = false): Uint8Array {
    if (!skipPrepack) {
      this.prepackChain();
    }
    const data = this.packChain();
    return padWithZeros(data, this.parser.paddedLength(data.length));
  }

  /**
   * Size without trailing alignment.
   */
  public realSize(): number {
    let size = 0;
    let current: StructValue | undefined = this;
    let last: StructValue = this;
    while (current) {
      size += current.parser.sizeOf(current);
      last = current;
      current = current.sub;
    }
    return size + (last.extra?.length ?? 0);
  }

  /**
   * Size including trailing alignment.
   */
  public paddedSize(): number {
    return this.parser.paddingSize(this);
  }

  /**
   * Creates the next layer from this layer's residual bytes. Without
   * residual bytes the value is returned unchanged.
   * @internal
   */
  public subclassWith(parser: StructParser): StructValue {
    if (!this.extra || this.extra.length === 0) {
      return this;
    }
    const layer = parser.createRaw(this.extra, this.target);
    this.sub = layer;
    this.extra = undefined;
    return layer;
  }

  /**
   * Re-runs subtype dispatch, e.g. after fields that select the subtype
   * were changed on a base value.
   */
  public autoSubclass(): void {
    this.parser.subclass(this);
  }

  /**
   * Appends a layer at the end of the chain; the old terminal layer loses
   * its residual bytes.
   * @internal
   */
  public extend(layer: StructValue): void {
    let current: StructValue = this;
    while (current.sub) {
      current = current.sub;
    }
    current.sub = layer;
    current.extra = undefined;
  }

  /**
   * The most derived type of the chain.
   */
  public getType(): StructLikeType {
    let type = this.parser.typedef;
    let current: StructValue | undefined = this.sub;
    while (current) {
      type = current.parser.typedef;
      current = current.sub;
    }
    return type;
  }

  /**
   * The type of this layer itself.
   */
  public getBaseType(): StructLikeType {
    return this.parser.typedef;
  }

  #terminal(): StructValue {
    let current: StructValue = this;
    while (current.sub) {
      current = current.sub;
    }
    return current;
  }

  /**
   * Residual bytes after the last layer, if any.
   */
  public getExtra(): Uint8Array | undefined {
    return this.#terminal().extra;
  }

  public setExtra(data: Uint8Array): void {
    this.#terminal().extra = data;
  }

  /**
   * Deep copy made by serializing and re-creating the value.
   */
  public copy(): StructValue {
    return this.parser.create(this.toBytes());
  }

  #embeddedSlot(name: string | StructLikeType): EmbeddedSlot {
    const key = typeof name === "string" ? name : name.name;
    const slot = key === undefined
      ? undefined
      : this.target.embeddedIndices.get(key);
    if (!slot) {
      throw new RangeError(`No embedded struct named ${String(key)}`);
    }
    return slot;
  }

  /**
   * Replaces an embedded struct with a fresh value of `newType`. The old
   * embedded fields are not carried over.
   * @param name The type, or type name, used in the definition.
   */
  public replaceEmbeddedType(
    name: string | StructLikeType,
    newType: StructLikeType,
  ): void {
    const slot = this.#embeddedSlot(name);
    slot.owner.seqs[slot.index] = newType.parser().newValue(this.target);
  }

  /**
   * Returns an embedded struct, e.g. to size or serialize just that part.
   */
  public getEmbedded(name: string | StructLikeType): StructValue {
    const slot = this.#embeddedSlot(name);
    const embedded = slot.owner.seqs[slot.index];
    if (!(embedded instanceof StructValue)) {
      throw new TypeError(`Embedded slot ${String(name)} is not a struct`);
    }
    return embedded;
  }

  public override toString(): string {
    return `<${this.getType()}>`;
  }
}

/**
 * A struct value that forwards field access to the value it is embedded in.
 */
export class EmbeddedStruct extends StructValue {
  constructor(parser: StructParser, inlineParent: StructValue) {
    super(parser, inlineParent);
  }
}

/**
 * Creates an empty value for `parser` and registers the names of its
 * embedded structs on the root.
 * @internal
 */
export function createStruct(
  parser: StructParser,
  inlineParent?: StructValue,
): StructValue {
  const value = inlineParent
    ? new EmbeddedStruct(parser, inlineParent)
    : new StructValue(parser);
  for (const [name, index] of parser.typedef.inlineNames) {
    value.target.embeddedIndices.set(name, { owner: value, index });
  }
  return value;
}
