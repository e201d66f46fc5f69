import { describe, expect, it } from "vitest";

import { isStructValue } from "../field_container.ts";
import { FieldRecord } from "../field_record.ts";
import { StructType } from "../../schemas/complex/struct_type.ts";
import { bool, uint16, uint64, uint8 } from "../../schemas/primitive/std_prims.ts";
import { fromHex, toHex } from "../../manipulate_bytes.ts";

const word = new StructType([[uint8, "a"], [bool, "on"]], {
  name: "word",
  padding: 4,
});

const nested = new StructType(
  [[word.array(2), "words"], [uint64, "big"], [uint16, "small"]],
  { name: "nested", padding: 1 },
);

describe("StructValue", () => {
  describe("sizes and padding", () => {
    it("pads serialized values to the struct alignment", () => {
      const value = word.new({ a: 1, on: true });
      const bytes = value.toBytes();
      expect(toHex(bytes)).toBe("0x01010000");
      expect(bytes.length % word.padding).toBe(0);
      expect(value.realSize()).toBe(2);
      expect(value.paddedSize()).toBe(4);
    });

    it("appends residual bytes before padding", () => {
      const value = word.new({ a: 1 });
      value.setExtra(fromHex("aa bb"));
      expect(value.getExtra()).toEqual(fromHex("aa bb"));
      expect(value.realSize()).toBe(4);
      expect(toHex(value.toBytes())).toBe("0x0100aabb");
      value.setExtra(fromHex("cc"));
      expect(toHex(value.toBytes())).toBe("0x0100cc00");
    });

    it("keeps trailing bytes from create as residual data", () => {
      const value = word.create(fromHex("05 00 ee"));
      expect(value.getNumber("a")).toBe(5);
      expect(value.getExtra()).toEqual(fromHex("ee"));
    });
  });

  describe("copies", () => {
    it("copies deeply", () => {
      const value = word.new({ a: 3 });
      const copy = value.copy();
      copy.set("a", 4);
      expect(value.getNumber("a")).toBe(3);
      expect(copy.getNumber("a")).toBe(4);
      expect(copy.getType()).toBe(word);
    });
  });

  describe("field access", () => {
    const value = nested.create(
      fromHex("07 01 00 00 08 00 00 00 00 00 00 00 00 00 00 01 00 02"),
    );

    it("reads typed fields", () => {
      expect(value.getBigInt("big")).toBe(1n);
      expect(value.getNumber("big")).toBe(1);
      expect(value.getBigInt("small")).toBe(2n);
      const words = value.getStructArray("words");
      expect(words.length).toBe(2);
      expect(words[0].getNumber("a")).toBe(7);
      expect(words[0].getBoolean("on")).toBe(true);
      expect(words[1].getBoolean("on")).toBe(false);
    });

    it("throws TypeError for fields of another kind", () => {
      expect(() => value.getBytes("small")).toThrow(TypeError);
      expect(() => value.getStruct("small")).toThrow(TypeError);
      expect(() => value.getArray("big")).toThrow(TypeError);
      expect(() => value.getNumber("missing")).toThrow(TypeError);
    });

    it("throws RangeError for bigints beyond the safe range", () => {
      const copy = value.copy();
      copy.set("big", 1n << 60n);
      expect(() => copy.getNumber("big")).toThrow(RangeError);
    });

    it("follows paths", () => {
      expect(value.getPath("words")).toBe(value.get("words"));
      expect(value.getPath("small", "x")).toBeUndefined();
      expect(() => value.setPath(1)).toThrow(RangeError);
    });
  });

  it("tells struct values from inline records", () => {
    const value = word.new();
    expect(isStructValue(value)).toBe(true);
    expect(isStructValue(new FieldRecord())).toBe(false);
    expect(isStructValue(1)).toBe(false);
    expect(value.isEmbedded()).toBe(false);
    expect(String(value)).toBe("<word>");
  });
});
