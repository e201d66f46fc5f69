import { PrimType } from "./prim_type.ts";
import { uint32 } from "./std_prims.ts";
import type { Formatter } from "../type.ts";
import type { DumpValue } from "../../dump/dump.ts";
import { integerAsBigInt } from "../../serialization/conversion.ts";

export type EnumValue = number | bigint;

export interface EnumTypeOptions<K extends string> {
  name?: string;
  /** Integer type the values are stored as. Defaults to uint32. */
  base?: PrimType;
  /** Values are OR-ed flags rather than single choices. */
  bitwise?: boolean;
  values: Readonly<Record<K, EnumValue>>;
}

/**
 * An integer primitive whose dumps show value names.
 *
 * Bitwise enums format as space-separated names: flags covering the most
 * bits are matched first, names are listed by ascending value and any
 * unmatched bits are appended in hex. Zero stays `0`.
 *
 * ```ts
 * const flags = new EnumType({
 *   name: "flags",
 *   base: uint16,
 *   bitwise: true,
 *   values: { A: 0x1, B: 0x2, C: 0x4, D: 0x8, E: 0x9 },
 * });
 * flags.toStr(0x0b); // "B E"
 * flags.toStr(0x1f); // "B C E 0x10"
 * ```
 */
export class EnumType<K extends string = string> extends PrimType {
  readonly bitwise: boolean;
  readonly values: Readonly<Record<K, EnumValue>>;
  readonly #entries: readonly [K, bigint][];

  constructor(options: EnumTypeOptions<K>) {
    const base = options.base ?? uint32;
    if (!base.isInteger()) {
      throw new TypeError(`Enum base must be an integer type, got ${base}`);
    }
    super({
      kind: base.item.kind,
      width: base.item.width,
      name: options.name,
      endian: base.endian,
      strict: base.strict,
    });
    this.bitwise = options.bitwise ?? false;
    this.values = { ...options.values };
    const entries: [K, bigint][] = [];
    for (const name of Object.keys(this.values)) {
      if (isKey(this.values, name)) {
        entries.push([name, BigInt(this.values[name])]);
      }
    }
    this.#entries = entries;
  }

  /**
   * The first name defined for `value`, or `defaultName`.
   */
  public getName(value: EnumValue): K | undefined;
  public getName<D>(value: EnumValue, defaultName: D): K | D;
  public getName<D>(value: EnumValue, defaultName?: D): K | D | undefined {
    const target = BigInt(value);
    for (const [name, entry] of this.#entries) {
      if (entry === target) {
        return name;
      }
    }
    return defaultName;
  }

  public getValue(name: string): EnumValue | undefined;
  public getValue<D>(name: string, defaultValue: D): EnumValue | D;
  public getValue<D>(name: string, defaultValue?: D): EnumValue | D | undefined {
    return isKey(this.values, name) ? this.values[name] : defaultValue;
  }

  /**
   * Copy of the name to value mapping.
   */
  public getDict(): Record<K, EnumValue> {
    return { ...this.values };
  }

  /**
   * True when some name is defined for `value`.
   */
  public has(value: EnumValue): boolean {
    const target = BigInt(value);
    return this.#entries.some(([, entry]) => entry === target);
  }

  /**
   * New enum with the same base and these values added.
   */
  public extend<E extends string>(
    values: Readonly<Record<E, EnumValue>>,
    name: string | undefined = this.name,
  ): EnumType<K | E> {
    return new EnumType<K | E>({
      name,
      base: this,
      bitwise: this.bitwise,
      values: { ...this.values, ...values },
    });
  }

  /**
   * New enum with this enum's base and the values of both.
   */
  public merge<E extends string>(other: EnumType<E>): EnumType<K | E> {
    return this.extend(other.getDict());
  }

  /**
   * The same names stored as another integer type.
   */
  public astype(base: PrimType, bitwise = this.bitwise): EnumType<K> {
    return new EnumType<K>({
      name: this.name,
      base,
      bitwise,
      values: this.values,
    });
  }

  /**
   * Human-readable form of a value.
   */
  public toStr(value: EnumValue): string {
    return String(this.format(value));
  }

  /**
   * Formats a value as its name, or its flag names for bitwise enums.
   * Values without a name are returned unchanged.
   */
  public format(value: DumpValue): DumpValue {
    const integer = integerAsBigInt(value);
    if (integer === undefined) {
      return value;
    }
    if (!this.bitwise) {
      return this.getName(integer) ?? value;
    }
    const names: string[] = [];
    let rest = integer;
    const bySize = [...this.#entries].sort(([, a], [, b]) =>
      a < b ? 1 : a > b ? -1 : 0
    );
    for (const [name, flag] of bySize) {
      if ((flag & rest) === flag) {
        names.push(name);
        rest ^= flag;
      }
    }
    names.reverse();
    if (rest !== 0n) {
      names.push(`0x${rest.toString(16)}`);
    }
    return names.length === 0 ? 0 : names.join(" ");
  }

  protected override defaultFormatter(): Formatter {
    return (value) => this.format(value);
  }
}

function isKey<K extends string>(
  record: Readonly<Record<K, EnumValue>>,
  key: string,
): key is K {
  return Object.hasOwn(record, key);
}
