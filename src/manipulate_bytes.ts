const EMPTY = new Uint8Array(0);

/**
 * Returns a shared zero-length byte array. Callers must not write to it.
 */
export function emptyBytes(): Uint8Array {
  return EMPTY;
}

/**
 * Concatenates byte arrays into a new Uint8Array.
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  if (parts.length === 1) {
    return parts[0];
  }
  let total = 0;
  for (const part of parts) {
    total += part.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Appends zero bytes to `data` until it is `length` bytes long.
 * Returns `data` itself when it is already long enough.
 */
export function padWithZeros(data: Uint8Array, length: number): Uint8Array {
  if (data.length >= length) {
    return data;
  }
  const out = new Uint8Array(length);
  out.set(data);
  return out;
}

/**
 * Returns a copy of `data` without its trailing zero bytes.
 */
export function stripTrailingZeros(data: Uint8Array): Uint8Array {
  let end = data.length;
  while (end > 0 && data[end - 1] === 0) {
    end--;
  }
  return data.slice(0, end);
}

/**
 * Renders bytes as lowercase hex with a `0x` prefix.
 */
export function toHex(data: Uint8Array): string {
  let out = "0x";
  for (const byte of data) {
    out += byte.toString(16).padStart(2, "0");
  }
  return out;
}

/**
 * Parses a whitespace-tolerant hex string such as `"1d d8 95 7a"`.
 */
export function fromHex(text: string): Uint8Array {
  const clean = text.replace(/^0x/i, "").replace(/\s+/g, "");
  if (clean.length % 2 !== 0 || /[^0-9a-f]/i.test(clean)) {
    throw new TypeError(`Invalid hex string: ${text}`);
  }
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
