import { StructParser, type StructParserOptions } from "./struct_parser.ts";
import type { ParseResult, SizeFunction } from "./parser.ts";
import type { Layout } from "../serialization/layout.ts";
import { type Scalar, zeroScalar } from "../serialization/scalar.ts";
import { createStruct, type StructValue } from "../value/struct_value.ts";
import { FieldContainer } from "../value/field_container.ts";
import { FieldRecord } from "../value/field_record.ts";
import type { Value } from "../value/value.ts";
import { BadFormatError, throwInvalidError } from "../schemas/error.ts";
import { emptyBytes, stripTrailingZeros } from "../manipulate_bytes.ts";

/**
 * Where the slots of a fixed layout land in the value: a property path, and
 * for fixed arrays the number of consecutive slots.
 */
export interface PropertySpec {
  readonly path: readonly string[];
  readonly count?: number;
}

export interface FixedParserOptions extends StructParserOptions {
  layout: Layout;
  properties: readonly PropertySpec[];
  /** Real size of the struct; bytes past the layout become residual. */
  size?: SizeFunction;
}

function stripBytes(value: Scalar): Scalar {
  return value instanceof Uint8Array ? stripTrailingZeros(value) : value;
}

/**
 * Parser for structs made only of fixed-width scalars, nested fixed structs
 * and fixed arrays of those. The whole layer is decoded in one pass.
 */
export class FixedParser extends StructParser {
  readonly layout: Layout;
  readonly properties: readonly PropertySpec[];
  readonly #size?: SizeFunction;
  readonly #emptyData: Uint8Array;
  readonly #slotNames: string[];

  constructor(options: FixedParserOptions) {
    super(options);
    this.layout = options.layout;
    this.properties = options.properties;
    this.#size = options.size;
    this.#emptyData = new Uint8Array(this.layout.size);
    this.#slotNames = [];
    for (const property of this.properties) {
      const name = property.path.join(".");
      if (property.count === undefined) {
        this.#slotNames.push(name);
      } else {
        for (let i = 0; i < property.count; i++) {
          this.#slotNames.push(`${name}[${i}]`);
        }
      }
    }
  }

  public override parseRaw(
    buffer: Uint8Array,
    inlineParent?: StructValue,
  ): ParseResult<StructValue> | undefined {
    const fixedSize = this.layout.size;
    if (buffer.length < fixedSize) {
      return undefined;
    }
    const value = createStruct(this, inlineParent);
    this.unpack(buffer.subarray(0, fixedSize), value);
    if (!this.#size) {
      value.extra = emptyBytes();
      return { value, size: fixedSize };
    }
    const size = this.#size(value);
    if (size < fixedSize) {
      throw new BadFormatError(
        `struct size should be greater than ${fixedSize} bytes, got ${size}`,
      );
    }
    if (buffer.length < size) {
      return undefined;
    }
    value.extra = buffer.slice(fixedSize, size);
    return { value, size };
  }

  protected override newRaw(inlineParent?: StructValue): StructValue {
    const value = createStruct(this, inlineParent);
    this.unpack(this.#emptyData, value);
    return value;
  }

  public override sizeOf(_value: StructValue): number {
    return this.layout.size;
  }

  public override unpack(data: Uint8Array, value: StructValue): Uint8Array {
    const scalars = this.layout.decode(data);
    let start = 0;
    for (const property of this.properties) {
      let decoded: Value;
      if (property.count === undefined) {
        decoded = stripBytes(scalars[start]);
        start++;
      } else {
        decoded = scalars.slice(start, start + property.count).map(stripBytes);
        start += property.count;
      }
      let container: FieldContainer = value.target;
      for (const segment of property.path.slice(0, -1)) {
        const existing = container.get(segment);
        if (existing instanceof FieldContainer) {
          container = existing;
        } else {
          const record = new FieldRecord();
          container.set(segment, record);
          container = record;
        }
      }
      container.set(property.path[property.path.length - 1], decoded);
    }
    return data.subarray(this.layout.size);
  }

  public override pack(value: StructValue): Uint8Array {
    const elements: unknown[] = [];
    let slot = 0;
    for (const property of this.properties) {
      const field = value.target.getPath(...property.path);
      if (property.count === undefined) {
        elements.push(field);
        slot++;
        continue;
      }
      if (!Array.isArray(field)) {
        throwInvalidError(
          [...property.path],
          field,
          `array of ${property.count}`,
        );
      }
      for (let i = 0; i < property.count; i++) {
        elements.push(
          i < field.length ? field[i] : zeroScalar(this.layout.slots[slot]),
        );
        slot++;
      }
    }
    return this.layout.encode(elements, this.#slotNames);
  }
}
