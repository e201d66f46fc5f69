import type { DumpRecord, DumpValue } from "./dump.ts";
import type { FormatterTable } from "./formatter_table.ts";
import { isDumpRecord } from "./merge.ts";
import { getConfig } from "../config.ts";
import type { StructValue } from "../value/struct_value.ts";
import { isStructValue } from "../value/field_container.ts";

function logFailure(path: readonly string[], error: unknown): void {
  getConfig().logger.debug("A formatter threw an exception", {
    path: path.join("."),
    error,
  });
}

function lookup(
  record: DumpRecord,
  path: readonly string[],
): DumpValue | undefined {
  let current: DumpValue = record;
  for (const segment of path) {
    if (!isDumpRecord(current) || !Object.hasOwn(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Runs the formatters of `table` over a dumped struct: array elements
 * first, then values, then flattened sub-struct records. A formatter that
 * throws leaves its value unformatted.
 */
export function applyFormatterTable(
  record: DumpRecord,
  table: FormatterTable,
): DumpRecord {
  for (const { path, formatter } of table.elements()) {
    const items = lookup(record, path);
    if (!Array.isArray(items)) {
      continue;
    }
    for (let i = 0; i < items.length; i++) {
      try {
        items[i] = formatter(items[i]);
      } catch (error) {
        logFailure(path, error);
      }
    }
  }
  for (const { path, formatter } of table.values()) {
    const parent = lookup(record, path.slice(0, -1));
    const key = path[path.length - 1];
    if (!isDumpRecord(parent) || !Object.hasOwn(parent, key)) {
      continue;
    }
    try {
      parent[key] = formatter(parent[key]);
    } catch (error) {
      logFailure(path, error);
    }
  }
  let result = record;
  for (const { path, formatter } of table.records()) {
    try {
      if (path.length === 0) {
        result = formatter(result);
        continue;
      }
      const parent = lookup(result, path.slice(0, -1));
      const key = path[path.length - 1];
      const current = isDumpRecord(parent) && Object.hasOwn(parent, key)
        ? parent[key]
        : undefined;
      if (isDumpRecord(parent) && isDumpRecord(current)) {
        parent[key] = formatter(current);
      }
    } catch (error) {
      logFailure(path, error);
    }
  }
  return result;
}

/**
 * Lets every embedded struct of every layer format the fields it owns.
 */
export function formatEmbedded(
  record: DumpRecord,
  value: StructValue,
): DumpRecord {
  let result = record;
  let layer: StructValue | undefined = value;
  while (layer) {
    for (const embedded of layer.seqs) {
      if (isStructValue(embedded)) {
        result = embedded.getType().formatDump(result, embedded);
      }
    }
    layer = layer.sub;
  }
  return result;
}
