import { describe, expect, it } from "vitest";

import { VariantType } from "../variant_type.ts";
import { StructType } from "../struct_type.ts";
import { packRealSize, packValue, sizeFromLen } from "../struct_helpers.ts";
import { cstr } from "../../primitive/cstr_type.ts";
import { raw } from "../../primitive/raw_type.ts";
import { uint16, uint32, uint8 } from "../../primitive/std_prims.ts";
import { BadLenError } from "../../error.ts";
import { dump } from "../../../dump/dump.ts";
import { fromHex, toHex } from "../../../manipulate_bytes.ts";

const header = new StructType([[uint8, "kind"]], {
  name: "record_header",
  padding: 1,
});

const record = new VariantType({
  name: "record",
  header,
  classifier: (v) => v.getNumber("kind"),
});

const counter = new StructType([[uint32, "value"]], {
  name: "counter",
  base: record,
  classifyBy: [1],
  init: packValue(1, "kind"),
});

const label = new StructType([[cstr, "text"]], {
  name: "label",
  base: record,
  classifyBy: [2],
  init: packValue(2, "kind"),
});

describe("VariantType", () => {
  it("lets the selected subtype decide the size", () => {
    const parsed = record.parse(fromHex("01 00 00 00 01 ff"));
    expect(parsed?.size).toBe(5);
    expect(String(parsed?.value.getType())).toBe("counter");
    expect(parsed?.value.getNumber("value")).toBe(1);
  });

  it("parses variable-size subtypes", () => {
    const parsed = record.parse(fromHex("02 68 69 00 01"));
    expect(parsed?.size).toBe(4);
    expect(String(parsed?.value.getType())).toBe("label");
    expect(parsed?.value.getBytes("text")).toEqual(fromHex("68 69"));
  });

  it("creates values from the whole buffer", () => {
    const value = record.create(fromHex("01 00 00 00 2a"));
    expect(value.getType()).toBe(counter);
    expect(value.getNumber("value")).toBe(42);
    expect(value.realSize()).toBe(5);
  });

  it("stops at the header for unknown subtypes", () => {
    const parsed = record.parse(fromHex("07 00 00"));
    expect(parsed?.size).toBe(1);
    expect(parsed?.value.getType()).toBe(record);
  });

  it("returns undefined when the subtype is incomplete", () => {
    expect(record.parse(fromHex("01 00 00"))).toBeUndefined();
  });

  it("throws BadLenError on create without a complete header", () => {
    expect(() => record.create(new Uint8Array(0))).toThrow(BadLenError);
  });

  it("encodes the header followed by the subtype", () => {
    const value = counter.new({ value: 1 });
    expect(toHex(value.toBytes())).toBe("0x0100000001");
    expect(toHex(label.new({ text: "hi" }).toBytes())).toBe("0x02686900");
  });

  it("exposes the header as an embedded struct", () => {
    const value = counter.new();
    const embedded = value.getEmbedded("record_header");
    embedded.set("kind", 9);
    expect(value.getNumber("kind")).toBe(9);
    expect(embedded.realSize()).toBe(1);
  });

  it("dumps header fields before subtype fields", () => {
    const value = record.create(fromHex("01 00 00 00 01"));
    value.delete("kind");
    value.set("kind", 1);
    const dumped = dump(value, { humanRead: false });
    expect(Object.keys(dumped)).toEqual(["kind", "value", "_type"]);
    expect(dumped).toEqual({ kind: 1, value: 1, _type: "<counter>" });
  });

  describe("with three tagged subtypes", () => {
    const tagged = new VariantType({
      name: "tagged",
      header: new StructType([[uint8, "tag"]], {
        name: "tagged_header",
        padding: 1,
      }),
      classifier: (v) => v.getNumber("tag"),
    });
    const wideTag = new StructType([[uint32, "value"]], {
      name: "wide_tag",
      base: tagged,
      classifyBy: [1],
      init: packValue(1, "tag"),
    });
    const shortTag = new StructType([[uint16, "value"]], {
      name: "short_tag",
      base: tagged,
      classifyBy: [2],
      init: packValue(2, "tag"),
    });
    const chunk = new StructType([[uint8, "length"], [raw, "data"]], {
      name: "chunk",
      padding: 1,
      size: sizeFromLen(64, "length"),
      prepack: packRealSize("length"),
    });
    const chunkTag = new StructType([[chunk, "body"]], {
      name: "chunk_tag",
      base: tagged,
      classifyBy: [3],
      init: packValue(3, "tag"),
    });

    it("decodes a 4-byte value for tag 1", () => {
      const parsed = tagged.parse(fromHex("01 00 00 00 01"));
      expect(parsed?.size).toBe(5);
      expect(parsed?.value.getType()).toBe(wideTag);
      expect(parsed?.value.getNumber("value")).toBe(1);
    });

    it("decodes a 2-byte value for tag 2", () => {
      const parsed = tagged.parse(fromHex("02 00 07 ff"));
      expect(parsed?.size).toBe(3);
      expect(parsed?.value.getType()).toBe(shortTag);
      expect(parsed?.value.getNumber("value")).toBe(7);
      expect(parsed?.value.realSize()).toBe(3);
    });

    it("decodes a length-prefixed record for tag 3", () => {
      const parsed = tagged.parse(fromHex("03 03 61 62 ff"));
      expect(parsed?.size).toBe(4);
      expect(parsed?.value.getType()).toBe(chunkTag);
      const body = parsed?.value.getStruct("body");
      expect(body?.getNumber("length")).toBe(3);
      expect(body?.getBytes("data")).toEqual(fromHex("61 62"));
    });

    it("encodes each subtype after its tag", () => {
      expect(toHex(wideTag.new({ value: 1 }).toBytes())).toBe("0x0100000001");
      expect(toHex(shortTag.new({ value: 7 }).toBytes())).toBe("0x020007");
      const value = chunkTag.new();
      value.getStruct("body").set("data", fromHex("61 62"));
      expect(toHex(value.toBytes())).toBe("0x03036162");
      expect(value.realSize()).toBe(4);
      expect(value.paddedSize()).toBe(4);
    });
  });
});
