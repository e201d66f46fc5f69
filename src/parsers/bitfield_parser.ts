import { StructParser, type StructParserOptions } from "./struct_parser.ts";
import type { ParseResult } from "./parser.ts";
import type { PrimitiveParser } from "./primitive_parser.ts";
import { createStruct, type StructValue } from "../value/struct_value.ts";
import type { Value } from "../value/value.ts";
import type { Scalar } from "../serialization/scalar.ts";
import { fromBits, integerAsBigInt } from "../serialization/conversion.ts";
import { BadFormatError, throwInvalidError } from "../schemas/error.ts";

/**
 * A named run of bits, counted from the most significant bit of the base
 * integer. With `width` set the run is an array of `width`-bit elements.
 */
export interface BitfieldField {
  readonly name: string;
  readonly start: number;
  readonly end: number;
  readonly width?: number;
}

export interface BitfieldParserOptions
  extends Omit<StructParserOptions, "base" | "criteria" | "classifyBy"> {
  baseParser: PrimitiveParser;
  fields: readonly BitfieldField[];
}

/**
 * Splits one integer into bit fields, highest bits first.
 */
export class BitfieldParser extends StructParser {
  readonly baseParser: PrimitiveParser;
  readonly fields: readonly BitfieldField[];

  constructor(options: BitfieldParserOptions) {
    super({ ...options, padding: 1 });
    this.baseParser = options.baseParser;
    this.fields = options.fields;
  }

  #totalBits(): bigint {
    return BigInt(this.baseParser.item.width * 8);
  }

  #toUnsigned(inner: Scalar): bigint {
    const big = integerAsBigInt(inner);
    if (big === undefined) {
      throw new BadFormatError(`Bit field base decoded a non-integer`);
    }
    return BigInt.asUintN(Number(this.#totalBits()), big);
  }

  #split(inner: Scalar, value: StructValue): void {
    const data = this.#toUnsigned(inner);
    const totalBits = this.#totalBits();
    const target = value.target;
    for (const field of this.fields) {
      if (field.width !== undefined) {
        const width = BigInt(field.width);
        const mask = (1n << width) - 1n;
        const items: Value[] = [];
        for (let bit = field.start; bit < field.end; bit += field.width) {
          const shift = totalBits - BigInt(bit) - width;
          items.push(fromBits((data >> shift) & mask, field.width));
        }
        target.set(field.name, items);
      } else {
        const bits = field.end - field.start;
        const mask = (1n << BigInt(bits)) - 1n;
        const shift = totalBits - BigInt(field.end);
        target.set(field.name, fromBits((data >> shift) & mask, bits));
      }
    }
  }

  public override parseRaw(
    buffer: Uint8Array,
    inlineParent?: StructValue,
  ): ParseResult<StructValue> | undefined {
    const result = this.baseParser.parse(buffer);
    if (!result) {
      return undefined;
    }
    const value = createStruct(this, inlineParent);
    this.#split(result.value, value);
    return { value, size: result.size };
  }

  protected override newRaw(inlineParent?: StructValue): StructValue {
    const value = createStruct(this, inlineParent);
    value.unpackChain(
      this.baseParser.toBytes(this.baseParser.newValue()),
    );
    return value;
  }

  public override unpack(data: Uint8Array, value: StructValue): Uint8Array {
    this.#split(this.baseParser.create(data), value);
    return data.subarray(data.length);
  }

  #bits(name: string, value: Value | undefined): bigint {
    const big = integerAsBigInt(value);
    if (big === undefined) {
      throwInvalidError([name], value, `bit field of ${this.typedef}`);
    }
    return big;
  }

  public override pack(value: StructValue): Uint8Array {
    const totalBits = this.#totalBits();
    const target = value.target;
    let data = 0n;
    for (const field of this.fields) {
      if (field.width !== undefined) {
        const width = BigInt(field.width);
        const mask = (1n << width) - 1n;
        const items = target.get(field.name);
        if (!Array.isArray(items)) {
          throwInvalidError([field.name], items, `bit field array of ${this.typedef}`);
        }
        let index = 0;
        for (let bit = field.start; bit < field.end && index < items.length; bit += field.width) {
          const element = this.#bits(`${field.name}[${index}]`, items[index]);
          data |= (element & mask) << (totalBits - BigInt(bit) - width);
          index++;
        }
      } else {
        const mask = (1n << BigInt(field.end - field.start)) - 1n;
        const element = this.#bits(field.name, target.get(field.name));
        data |= (element & mask) << (totalBits - BigInt(field.end));
      }
    }
    const item = this.baseParser.item;
    const encoded = item.kind === "int"
      ? BigInt.asIntN(Number(totalBits), data)
      : data;
    return this.baseParser.toBytes(item.width === 8 ? encoded : Number(encoded));
  }

  public override sizeOf(): number {
    return this.baseParser.item.width;
  }
}
