import type { Value } from "./value.ts";
import type { StructValue } from "./struct_value.ts";
import { bigIntToSafeNumber } from "../serialization/conversion.ts";

/**
 * Named field storage shared by struct values and inline records, with
 * typed accessors that throw when a field holds something else.
 */
export abstract class FieldContainer {
  protected abstract fieldMap(): Map<string, Value>;

  /**
   * True for struct values, false for inline records.
   */
  public isStruct(): boolean {
    return false;
  }

  public get(name: string): Value | undefined {
    return this.fieldMap().get(name);
  }

  public set(name: string, value: Value): void {
    this.fieldMap().set(name, value);
  }

  public has(name: string): boolean {
    return this.fieldMap().has(name);
  }

  public delete(name: string): boolean {
    return this.fieldMap().delete(name);
  }

  public keys(): string[] {
    return [...this.fieldMap().keys()];
  }

  public entries(): [string, Value][] {
    return [...this.fieldMap().entries()];
  }

  /**
   * Reads an integer or float field as a number. Bigints outside the safe
   * integer range throw a RangeError.
   */
  public getNumber(name: string): number {
    const value = this.get(name);
    if (typeof value === "number") {
      return value;
    }
    if (typeof value === "bigint") {
      return bigIntToSafeNumber(value, `Field "${name}"`);
    }
    throw new TypeError(`Field "${name}" is not a number`);
  }

  public getBigInt(name: string): bigint {
    const value = this.get(name);
    if (typeof value === "bigint") {
      return value;
    }
    if (typeof value === "number" && Number.isInteger(value)) {
      return BigInt(value);
    }
    throw new TypeError(`Field "${name}" is not an integer`);
  }

  public getBoolean(name: string): boolean {
    const value = this.get(name);
    if (typeof value !== "boolean") {
      throw new TypeError(`Field "${name}" is not a boolean`);
    }
    return value;
  }

  public getBytes(name: string): Uint8Array {
    const value = this.get(name);
    if (!(value instanceof Uint8Array)) {
      throw new TypeError(`Field "${name}" is not a byte array`);
    }
    return value;
  }

  /**
   * Returns the stored array itself, so pushes and index writes are kept.
   */
  public getArray(name: string): Value[] {
    const value = this.get(name);
    if (!Array.isArray(value)) {
      throw new TypeError(`Field "${name}" is not an array`);
    }
    return value;
  }

  public getStruct(name: string): StructValue {
    const value = this.get(name);
    if (!isStructValue(value)) {
      throw new TypeError(`Field "${name}" is not a struct`);
    }
    return value;
  }

  public getStructArray(name: string): StructValue[] {
    const items = this.getArray(name);
    const structs: StructValue[] = [];
    for (const item of items) {
      if (!isStructValue(item)) {
        throw new TypeError(`Field "${name}" holds a non-struct element`);
      }
      structs.push(item);
    }
    return structs;
  }

  /**
   * Returns a nested struct or inline record.
   */
  public getRecord(name: string): FieldContainer {
    const value = this.get(name);
    if (!(value instanceof FieldContainer)) {
      throw new TypeError(`Field "${name}" is not a record`);
    }
    return value;
  }

  /**
   * Follows a property path through nested records.
   * @returns undefined when any step is missing.
   */
  public getPath(...path: string[]): Value | undefined {
    let current: Value | undefined = this;
    for (const segment of path) {
      if (!(current instanceof FieldContainer)) {
        return undefined;
      }
      current = current.get(segment);
    }
    return current;
  }

  /**
   * Stores `value` at the end of a property path whose parents must exist.
   */
  public setPath(value: Value, ...path: string[]): void {
    if (path.length === 0) {
      throw new RangeError("setPath requires at least one property name");
    }
    let container: FieldContainer = this;
    for (const segment of path.slice(0, -1)) {
      container = container.getRecord(segment);
    }
    container.set(path[path.length - 1], value);
  }
}

/**
 * Narrows a field value to a struct value.
 */
export function isStructValue(value: unknown): value is StructValue {
  return value instanceof FieldContainer && value.isStruct();
}
