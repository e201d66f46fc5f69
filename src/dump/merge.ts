import type { DumpRecord, DumpValue } from "./dump.ts";

export function isDumpRecord(value: DumpValue | undefined): value is DumpRecord {
  return typeof value === "object" && !Array.isArray(value) &&
    !(value instanceof Uint8Array);
}

/**
 * Moves the entry at `path` from `from` into the same place in `to`,
 * creating intermediate records. Missing paths are skipped.
 */
export function mergeTo(
  path: readonly string[],
  from: DumpRecord,
  to: DumpRecord,
): void {
  if (path.length === 0) {
    return;
  }
  const parents = path.slice(0, -1);
  const last = path[path.length - 1];
  let source: DumpRecord = from;
  for (const segment of parents) {
    const next = Object.hasOwn(source, segment) ? source[segment] : undefined;
    if (!isDumpRecord(next)) {
      return;
    }
    source = next;
  }
  if (!Object.hasOwn(source, last)) {
    return;
  }
  const value = source[last];
  delete source[last];
  let target: DumpRecord = to;
  for (const segment of parents) {
    const existing = Object.hasOwn(target, segment) ? target[segment] : undefined;
    if (isDumpRecord(existing)) {
      target = existing;
    } else {
      const created: DumpRecord = {};
      target[segment] = created;
      target = created;
    }
  }
  target[last] = value;
}

/**
 * Copies everything left in `from` into `to`, after the entries `to`
 * already has. Nested records are merged key by key.
 */
export function mergeDict(from: DumpRecord, to: DumpRecord): void {
  for (const [key, value] of Object.entries(from)) {
    if (isDumpRecord(value)) {
      const existing = Object.hasOwn(to, key) ? to[key] : undefined;
      if (isDumpRecord(existing)) {
        mergeDict(value, existing);
      } else {
        const created: DumpRecord = {};
        to[key] = created;
        mergeDict(value, created);
      }
    } else {
      to[key] = value;
    }
  }
}
