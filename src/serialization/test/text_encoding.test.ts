import { describe, expect, it } from "vitest";

import { decode, encode, tryDecodeStrict } from "../text_encoding.ts";

describe("text encoding helpers", () => {
  it("encode converts string to Uint8Array", () => {
    const bytes = encode("abc");
    expect(Array.from(bytes)).toEqual([97, 98, 99]);
  });

  it("decode converts Uint8Array to string", () => {
    const str = decode(new Uint8Array([0x68, 0x69]));
    expect(str).toBe("hi");
  });

  it("decode replaces invalid sequences", () => {
    expect(decode(new Uint8Array([0x61, 0xff]))).toBe("a\ufffd");
  });

  describe("tryDecodeStrict", () => {
    it("decodes valid UTF-8", () => {
      expect(tryDecodeStrict(new Uint8Array([0xc3, 0xa9]))).toBe("\u00e9");
    });

    it("returns undefined for invalid UTF-8", () => {
      expect(tryDecodeStrict(new Uint8Array([0xff]))).toBeUndefined();
    });
  });
});
