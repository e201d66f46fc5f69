import { StructParser, type StructParserOptions } from "./struct_parser.ts";
import type { Parser, ParseResult, SizeFunction } from "./parser.ts";
import { createStruct, type StructValue } from "../value/struct_value.ts";
import type { Value } from "../value/value.ts";
import { isStructValue } from "../value/field_container.ts";
import {
  BadFormatError,
  BadLenError,
  throwInvalidError,
} from "../schemas/error.ts";
import { concatBytes, emptyBytes } from "../manipulate_bytes.ts";

/**
 * One member of a sequenced struct. Entries without a name are embedded
 * structs whose fields live in the enclosing value. `count` marks an array;
 * zero means the array takes all remaining bytes.
 */
export interface SequenceEntry {
  readonly parser: Parser;
  readonly name?: string;
  readonly count?: number;
}

export interface SequencedParserOptions extends StructParserOptions {
  entries: readonly SequenceEntry[];
  size?: SizeFunction;
  /**
   * The last entry takes every byte left in the struct instead of leaving
   * it to subtypes or residual data.
   */
  lastExtra?: boolean;
}

/**
 * Parser for structs whose members need their own parsers: variable-size
 * fields, embedded structs, or arrays of non-fixed types.
 */
export class SequencedParser extends StructParser {
  readonly entries: readonly SequenceEntry[];
  readonly extraEntry?: SequenceEntry;
  readonly #size?: SizeFunction;

  constructor(options: SequencedParserOptions) {
    super(options);
    this.#size = options.size;
    if (options.lastExtra && options.entries.length > 0) {
      this.entries = options.entries.slice(0, -1);
      this.extraEntry = options.entries[options.entries.length - 1];
    } else {
      this.entries = options.entries;
    }
  }

  public override parseRaw(
    buffer: Uint8Array,
    inlineParent?: StructValue,
  ): ParseResult<StructValue> | undefined {
    const value = createStruct(this, inlineParent);
    const size = this.#parseInner(buffer, value, false);
    return size === undefined ? undefined : { value, size };
  }

  #parseInner(
    buffer: Uint8Array,
    value: StructValue,
    useAll: boolean,
  ): number | undefined {
    const target = value.target;
    value.seqs = [];
    let start = 0;
    for (const entry of this.entries) {
      const { parser, name, count } = entry;
      if (name !== undefined && count !== undefined) {
        const items: Value[] = [];
        for (let i = 0; i < count; i++) {
          const result = parser.parse(buffer.subarray(start));
          if (!result) {
            return undefined;
          }
          items.push(result.value);
          start += result.size;
        }
        target.set(name, items);
        continue;
      }
      const result = parser.parse(
        buffer.subarray(start),
        name === undefined ? target : undefined,
      );
      if (!result) {
        return undefined;
      }
      if (name === undefined) {
        value.seqs.push(result.value);
      } else {
        target.set(name, result.value);
      }
      start += result.size;
    }
    let size: number;
    if (useAll) {
      size = buffer.length;
    } else if (this.#size) {
      size = this.#size(value);
      if (size < start) {
        throw new BadFormatError(
          `struct size should be greater than ${start} bytes, got ${size}`,
        );
      }
      if (size > buffer.length) {
        return undefined;
      }
    } else {
      size = start;
    }
    const extraEntry = this.extraEntry;
    if (!extraEntry) {
      value.extra = buffer.slice(start, size);
      return size;
    }
    const { parser, name, count } = extraEntry;
    const rest = buffer.subarray(start, size);
    if (name !== undefined && count !== undefined) {
      const items: Value[] = [];
      let offset = 0;
      while (offset < rest.length) {
        const result = parser.parse(rest.subarray(offset));
        if (!result || result.size === 0) {
          break;
        }
        items.push(result.value);
        offset += result.size;
      }
      target.set(name, items);
    } else if (name === undefined) {
      value.seqs.push(parser.create(rest, target));
    } else {
      target.set(name, parser.create(rest));
    }
    return size;
  }

  public override unpack(data: Uint8Array, value: StructValue): Uint8Array {
    const size = this.#parseInner(data, value, true);
    if (size === undefined) {
      throw new BadLenError("Cannot parse struct: data is corrupted.");
    }
    const extra = value.extra ?? emptyBytes();
    value.extra = undefined;
    return extra;
  }

  #field(value: StructValue, name: string): Value {
    const field = value.target.get(name);
    if (field === undefined) {
      throwInvalidError([name], field, String(this.typedef));
    }
    return field;
  }

  #arrayField(value: StructValue, name: string): Value[] {
    const field = this.#field(value, name);
    if (!Array.isArray(field)) {
      throwInvalidError([name], field, "array");
    }
    return field;
  }

  #seq(value: StructValue, index: number): Value {
    const embedded = value.seqs[index];
    if (embedded === undefined) {
      throw new RangeError(`Missing embedded struct #${index} in ${this.typedef}`);
    }
    return embedded;
  }

  public override pack(value: StructValue): Uint8Array {
    const parts: Uint8Array[] = [];
    let seqIndex = 0;
    for (const { parser, name, count } of this.entries) {
      if (name !== undefined && count !== undefined) {
        const items = this.#arrayField(value, name);
        for (let i = 0; i < count; i++) {
          parts.push(
            parser.toBytes(i < items.length ? items[i] : parser.newValue()),
          );
        }
      } else if (name !== undefined) {
        parts.push(parser.toBytes(this.#field(value, name)));
      } else {
        parts.push(parser.toBytes(this.#seq(value, seqIndex++), true));
      }
    }
    if (this.extraEntry) {
      const { parser, name, count } = this.extraEntry;
      if (name !== undefined && count !== undefined) {
        for (const item of this.#arrayField(value, name)) {
          parts.push(parser.toBytes(item));
        }
      } else if (name !== undefined) {
        parts.push(parser.toBytes(this.#field(value, name)));
      } else {
        parts.push(parser.toBytes(this.#seq(value, seqIndex), true));
      }
    }
    return concatBytes(parts);
  }

  protected override newRaw(inlineParent?: StructValue): StructValue {
    const value = createStruct(this, inlineParent);
    const target = value.target;
    value.seqs = [];
    for (const { parser, name, count } of this.entries) {
      if (name !== undefined && count !== undefined) {
        const items: Value[] = [];
        for (let i = 0; i < count; i++) {
          items.push(parser.newValue());
        }
        target.set(name, items);
      } else if (name !== undefined) {
        target.set(name, parser.newValue());
      } else {
        value.seqs.push(parser.newValue(target));
      }
    }
    if (this.extraEntry) {
      const { parser, name, count } = this.extraEntry;
      if (name !== undefined && count !== undefined) {
        target.set(name, []);
      } else if (name !== undefined) {
        target.set(name, parser.newValue());
      } else {
        value.seqs.push(parser.newValue(target));
      }
    } else {
      value.extra = emptyBytes();
    }
    return value;
  }

  public override sizeOf(value: StructValue): number {
    let size = 0;
    let seqIndex = 0;
    for (const { parser, name, count } of this.entries) {
      if (name !== undefined && count !== undefined) {
        const items = this.#arrayField(value, name);
        for (let i = 0; i < count; i++) {
          size += parser.paddingSize(
            i < items.length ? items[i] : parser.newValue(),
          );
        }
      } else if (name !== undefined) {
        size += parser.paddingSize(this.#field(value, name));
      } else {
        size += parser.paddingSize(this.#seq(value, seqIndex++));
      }
    }
    if (this.extraEntry) {
      const { parser, name, count } = this.extraEntry;
      if (name !== undefined && count !== undefined) {
        for (const item of this.#arrayField(value, name)) {
          size += parser.paddingSize(item);
        }
      } else if (name !== undefined) {
        size += parser.paddingSize(this.#field(value, name));
      } else {
        size += parser.paddingSize(this.#seq(value, seqIndex));
      }
    }
    return size;
  }

  /**
   * Runs the prepack hooks of embedded structs, then this layer's own.
   */
  public override prepack(value: StructValue): void {
    for (const embedded of value.seqs) {
      if (isStructValue(embedded)) {
        embedded.prepackChain();
      }
    }
    super.prepack(value);
  }
}
