import type { Value } from "../value/value.ts";
import type { StructValue } from "../value/struct_value.ts";
import { FieldContainer, isStructValue } from "../value/field_container.ts";
import { getConfig } from "../config.ts";
import { toHex } from "../manipulate_bytes.ts";
import { tryDecodeStrict } from "../serialization/text_encoding.ts";

/**
 * Plain data produced by {@link dump}.
 */
export type DumpValue =
  | number
  | bigint
  | boolean
  | string
  | Uint8Array
  | DumpValue[]
  | DumpRecord;

export interface DumpRecord {
  [key: string]: DumpValue;
}

/**
 * How struct types are recorded in a dump: a `_type` entry, a wrapping
 * `{"<type>": ...}` record, or not at all.
 */
export type TypeInfo = "flat" | "key" | "none";

export interface DumpOptions {
  /** Apply formatters, e.g. enum names. Defaults to true. */
  humanRead?: boolean;
  /** Include residual bytes as `_extra`. Defaults to false. */
  dumpExtra?: boolean;
  /** Defaults to `"flat"`. */
  typeInfo?: TypeInfo;
  /**
   * Restore declaration order of fields. Defaults to true. Records are
   * plain objects, so integer-like field names still come first.
   */
  ordered?: boolean;
  /**
   * Turn byte values into strings: UTF-8 when valid, hex otherwise.
   * Defaults to false.
   */
  toStr?: boolean;
}

type ResolvedOptions = Required<DumpOptions>;

function dumpStruct(value: StructValue, options: ResolvedOptions): DumpValue {
  const type = value.getType();
  let record: DumpRecord = {};
  for (const [key, field] of value.ownEntries()) {
    record[key] = dumpValue(field, options);
  }
  if (options.ordered) {
    record = type.reorderDump(record, value);
  }
  if (options.humanRead) {
    record = type.formatDump(record, value);
    if (type.dumpFormatter) {
      try {
        record = type.dumpFormatter(record);
      } catch (error) {
        getConfig().logger.debug("A formatter threw an exception", {
          type: String(type),
          error,
        });
      }
    }
  }
  if (options.dumpExtra) {
    const extra = value.getExtra();
    if (extra && extra.length > 0) {
      record._extra = extra;
    }
  }
  switch (options.typeInfo) {
    case "flat":
      record._type = `<${type}>`;
      return record;
    case "key":
      return { [`<${type}>`]: record };
    case "none":
      return record;
  }
}

function dumpValue(value: Value, options: ResolvedOptions): DumpValue {
  if (isStructValue(value)) {
    return dumpStruct(value, options);
  }
  if (value instanceof FieldContainer) {
    const record: DumpRecord = {};
    for (const [key, field] of value.entries()) {
      record[key] = dumpValue(field, options);
    }
    return record;
  }
  if (Array.isArray(value)) {
    return value.map((item) => dumpValue(item, options));
  }
  return value;
}

function bytesToStr(value: DumpValue): DumpValue {
  if (value instanceof Uint8Array) {
    return tryDecodeStrict(value) ?? toHex(value);
  }
  if (Array.isArray(value)) {
    return value.map(bytesToStr);
  }
  if (typeof value === "object") {
    const record: DumpRecord = {};
    for (const [key, field] of Object.entries(value)) {
      record[key] = bytesToStr(field);
    }
    return record;
  }
  return value;
}

/**
 * Converts a decoded value into plain records, arrays and scalars, e.g. for
 * printing or JSON encoding. Struct fields appear in declaration order and,
 * in human-readable mode, through their type's formatters.
 */
export function dump(value: Value, options: DumpOptions = {}): DumpValue {
  const resolved: ResolvedOptions = {
    humanRead: options.humanRead ?? true,
    dumpExtra: options.dumpExtra ?? false,
    typeInfo: options.typeInfo ?? "flat",
    ordered: options.ordered ?? true,
    toStr: options.toStr ?? false,
  };
  const dumped = dumpValue(value, resolved);
  return resolved.toStr ? bytesToStr(dumped) : dumped;
}
