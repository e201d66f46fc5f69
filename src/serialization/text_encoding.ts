/**
 * Text encoding helpers for byte-string fields.
 */
const encoder = new TextEncoder();
const decoder = new TextDecoder();
const strictDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Encodes a string into a Uint8Array using UTF-8 encoding.
 * @param input The string to encode.
 * @returns A Uint8Array representing the encoded string.
 */
export const encode = (input: string): Uint8Array => encoder.encode(input);

/**
 * Decodes a Uint8Array into a string using UTF-8 encoding. Invalid sequences
 * become U+FFFD.
 * @param bytes The Uint8Array to decode.
 * @returns The decoded string.
 */
export const decode = (bytes: Uint8Array): string => decoder.decode(bytes);

/**
 * Decodes UTF-8, returning undefined when the bytes are not valid UTF-8.
 */
export function tryDecodeStrict(bytes: Uint8Array): string | undefined {
  try {
    return strictDecoder.decode(bytes);
  } catch (err) {
    if (err instanceof TypeError) {
      return undefined;
    }
    throw err;
  }
}
