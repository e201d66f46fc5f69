import {
  type LayoutItem,
  readScalar,
  type Scalar,
  type ScalarItem,
  writeScalar,
} from "./scalar.ts";
import { ReadableTap, WritableTap } from "./tap.ts";
import { BadFormatError } from "../schemas/error.ts";

/**
 * A flat run of fixed-width scalars and padding, compiled once and used to
 * decode or encode a whole fixed struct in a single pass.
 */
export class Layout {
  readonly items: readonly LayoutItem[];
  /** Total encoded size in bytes. */
  readonly size: number;
  /** The non-padding items, in order. */
  readonly slots: readonly ScalarItem[];

  constructor(items: readonly LayoutItem[]) {
    this.items = items;
    let size = 0;
    const slots: ScalarItem[] = [];
    for (const item of items) {
      size += item.width;
      if (item.kind !== "pad") {
        slots.push(item);
      }
    }
    this.size = size;
    this.slots = slots;
  }

  /**
   * Decodes the first {@link size} bytes of `data` into one value per slot.
   */
  decode(data: Uint8Array): Scalar[] {
    if (data.length < this.size) {
      throw new BadFormatError(
        `Layout needs ${this.size} bytes, got ${data.length}`,
      );
    }
    const tap = new ReadableTap(data);
    const values: Scalar[] = [];
    for (const item of this.items) {
      if (item.kind === "pad") {
        tap.skip(item.width);
      } else {
        values.push(readScalar(tap, item));
      }
    }
    return values;
  }

  /**
   * Encodes one value per slot. `names` labels the slots in errors.
   */
  encode(values: readonly unknown[], names: readonly string[] = []): Uint8Array {
    const tap = new WritableTap(this.size);
    let index = 0;
    for (const item of this.items) {
      if (item.kind === "pad") {
        tap.writePadding(item.width);
        continue;
      }
      writeScalar(tap, item, values[index], [names[index] ?? String(index)]);
      index++;
    }
    return tap.getValue();
  }
}
