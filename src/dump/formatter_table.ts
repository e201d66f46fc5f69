import type { Formatter } from "../schemas/type.ts";
import type { DumpRecord } from "./dump.ts";

/**
 * Formatter for a whole dumped struct.
 */
export type StructFormatter = (value: DumpRecord) => DumpRecord;

export interface PathFormatter {
  readonly path: readonly string[];
  readonly formatter: Formatter;
}

export interface RecordFormatter {
  readonly path: readonly string[];
  readonly formatter: StructFormatter;
}

/**
 * Formatters of a struct type keyed by property path: value formatters,
 * element formatters for arrays, and record formatters of flattened
 * sub-structs. Setting a value or element path again replaces its
 * formatter but keeps its position.
 */
export class FormatterTable {
  readonly #values = new Map<string, PathFormatter>();
  readonly #elements = new Map<string, PathFormatter>();
  readonly #records: RecordFormatter[] = [];

  static #key(path: readonly string[]): string {
    return path.join("\u0000");
  }

  public setValue(path: readonly string[], formatter: Formatter): void {
    this.#values.set(FormatterTable.#key(path), { path, formatter });
  }

  public setElement(path: readonly string[], formatter: Formatter): void {
    this.#elements.set(FormatterTable.#key(path), { path, formatter });
  }

  public addRecord(path: readonly string[], formatter: StructFormatter): void {
    this.#records.push({ path, formatter });
  }

  public values(): PathFormatter[] {
    return [...this.#values.values()];
  }

  public elements(): PathFormatter[] {
    return [...this.#elements.values()];
  }

  public records(): RecordFormatter[] {
    return [...this.#records];
  }

  /**
   * Copies every entry of `other` with `prefix` prepended to its paths.
   */
  public merge(other: FormatterTable, prefix: readonly string[] = []): void {
    for (const { path, formatter } of other.values()) {
      this.setValue([...prefix, ...path], formatter);
    }
    for (const { path, formatter } of other.elements()) {
      this.setElement([...prefix, ...path], formatter);
    }
    for (const { path, formatter } of other.records()) {
      this.addRecord([...prefix, ...path], formatter);
    }
  }
}
