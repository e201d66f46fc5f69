import type { Parser, ParseResult } from "./parser.ts";
import {
  checkScalarItem,
  describeScalar,
  readScalar,
  type Scalar,
  type ScalarItem,
  writeScalar,
  zeroScalar,
} from "../serialization/scalar.ts";
import { ReadableTap, WritableTap } from "../serialization/tap.ts";
import type { Value } from "../value/value.ts";
import { BadFormatError } from "../schemas/error.ts";

/**
 * Parser for a single fixed-width scalar that could not be merged into a
 * fixed struct layout. Never padded or subclassed.
 */
export class PrimitiveParser implements Parser<Scalar> {
  readonly item: ScalarItem;

  constructor(item: ScalarItem) {
    checkScalarItem(item);
    this.item = item;
  }

  public parse(buffer: Uint8Array): ParseResult<Scalar> | undefined {
    if (buffer.length < this.item.width) {
      return undefined;
    }
    return {
      value: readScalar(new ReadableTap(buffer), this.item),
      size: this.item.width,
    };
  }

  public create(buffer: Uint8Array): Scalar {
    if (buffer.length !== this.item.width) {
      throw new BadFormatError(
        `${describeScalar(this.item)} requires ${this.item.width} bytes, got ${buffer.length}`,
      );
    }
    return readScalar(new ReadableTap(buffer), this.item);
  }

  public newValue(): Scalar {
    return zeroScalar(this.item);
  }

  public sizeOf(): number {
    return this.item.width;
  }

  public paddingSize(): number {
    return this.item.width;
  }

  public toBytes(value: Value): Uint8Array {
    const tap = new WritableTap(this.item.width);
    writeScalar(tap, this.item, value, []);
    return tap.getValue();
  }
}
