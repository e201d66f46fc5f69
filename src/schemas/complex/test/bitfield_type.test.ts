import { describe, expect, it } from "vitest";

import { BitfieldType } from "../bitfield_type.ts";
import { StructType } from "../struct_type.ts";
import { packSize, packValue, sizeFromLen } from "../struct_helpers.ts";
import { EnumType } from "../../primitive/enum_type.ts";
import { float32, int8, uint32, uint64, uint8 } from "../../primitive/std_prims.ts";
import { StructDefinitionError, ValidationError } from "../../error.ts";
import { dump } from "../../../dump/dump.ts";
import { fromHex, toHex } from "../../../manipulate_bytes.ts";

const color = new BitfieldType(
  uint32,
  [[1, "a"], [9, "r"], [11, "g"], [11, "b"]],
  { name: "color", init: packValue(1, "a") },
);

const flags = new BitfieldType(
  uint64,
  [[3, "pre"], [1, "bits", 50], [4], [7, "post"]],
  { name: "flags" },
);

const preEnum = new EnumType({
  name: "pre",
  base: uint8,
  bitwise: true,
  values: { PRE_A: 0x1, PRE_B: 0x2, PRE_C: 0x4 },
});

const palette = new StructType(
  [[flags, "head"], [color.array(2), "colors"], [flags.array(0), "extras"]],
  {
    name: "palette",
    padding: 8,
    size: sizeFromLen(128, "head", "post"),
    prepack: packSize("head", "post"),
    extend: { "head.pre": preEnum },
  },
);

function alternatingBits(): number[] {
  return Array.from({ length: 50 }, (_, i) => i & 1);
}

describe("BitfieldType", () => {
  it("packs fields from the most significant bit down", () => {
    const value = color.new({ a: 0, r: 0x77, g: 0x312, b: 0x57a });
    expect(toHex(color.toBytes(value))).toBe("0x1dd8957a");
  });

  it("runs the init hook on new values", () => {
    expect(toHex(color.toBytes(color.new()))).toBe("0x80000000");
  });

  it("decodes the same fields it encoded", () => {
    const value = color.new({ a: 0, r: 0x77, g: 0x312, b: 0x57a });
    const bytes = color.toBytes(value);
    const parsed = color.parse(bytes);
    expect(parsed?.size).toBe(4);
    expect(dump(parsed?.value ?? [], { humanRead: false })).toEqual(
      dump(value, { humanRead: false }),
    );
    const created = color.create(bytes);
    expect(created.getNumber("r")).toBe(0x77);
    expect(created.getNumber("g")).toBe(0x312);
    expect(created.getNumber("b")).toBe(0x57a);
  });

  it("packs bit arrays and skips unnamed bits", () => {
    const value = flags.new({ pre: 2, bits: alternatingBits(), post: 0x3f });
    const bytes = value.toBytes();
    expect(toHex(bytes)).toBe("0x4aaaaaaaaaaaa83f");
    const created = flags.create(bytes);
    expect(created.getArray("bits")).toEqual(alternatingBits());
    expect(created.getNumber("post")).toBe(0x3f);
  });

  it("keeps the sign of signed base types", () => {
    const nibbles = new BitfieldType(int8, [[4, "hi"], [4, "lo"]], {
      name: "nibbles",
    });
    const value = nibbles.new({ hi: 0xf, lo: 1 });
    expect(toHex(value.toBytes())).toBe("0xf1");
    const created = nibbles.create(fromHex("f1"));
    expect(created.getNumber("hi")).toBe(15);
    expect(created.getNumber("lo")).toBe(1);
  });

  it("returns undefined when the buffer is short", () => {
    expect(color.parse(fromHex("1d d8"))).toBeUndefined();
  });

  it("rejects fields wider than the base type", () => {
    expect(() => new BitfieldType(uint8, [[4, "a"], [5, "b"]], { name: "wide" }))
      .toThrow(StructDefinitionError);
  });

  it("rejects non-integer base types", () => {
    expect(() => new BitfieldType(float32, [[1, "a"]], { name: "float" }))
      .toThrow(StructDefinitionError);
  });

  it("rejects property paths in extend", () => {
    expect(() =>
      new BitfieldType(uint8, [[8, "a"]], {
        name: "extended",
        extend: { "a.b": preEnum },
      })
    ).toThrow(StructDefinitionError);
  });

  it("throws a ValidationError for a missing field", () => {
    const value = color.new();
    value.delete("g");
    expect(() => value.toBytes()).toThrow(ValidationError);
  });
});

describe("bit fields inside structs", () => {
  function buildPalette() {
    const value = palette.new();
    const head = value.getStruct("head");
    head.set("pre", 2);
    head.getArray("bits")[17] = 1;
    head.getArray("bits")[29] = 1;
    const [first, second] = value.getStructArray("colors");
    first.set("r", 10);
    first.set("b", 12);
    second.set("a", 0);
    second.set("g", 9);
    value.getArray("extras").push(flags.new({ pre: 1, post: 0x1f }));
    value.getArray("extras").push(
      flags.new({ pre: 2, bits: Array<number>(50).fill(1), post: 0x17 }),
    );
    return value;
  }

  it("encodes nested bit fields, arrays and the stored size", () => {
    const bytes = buildPalette().toBytes();
    expect(toHex(bytes)).toBe(
      "0x40000800800000208280000c00004800" +
        "200000000000001f5ffffffffffff817",
    );
    expect(bytes.length).toBe(32);
  });

  it("decodes what it encodes", () => {
    const value = buildPalette();
    const bytes = value.toBytes();
    const parsed = palette.parse(bytes);
    expect(parsed?.size).toBe(32);
    expect(dump(parsed?.value ?? [], { humanRead: false })).toEqual(
      dump(value, { humanRead: false }),
    );
    expect(dump(palette.create(bytes), { humanRead: false })).toEqual(
      dump(value, { humanRead: false }),
    );
  });

  it("formats nested fields through extend", () => {
    const value = buildPalette();
    value.toBytes();
    const dumped = dump(value, { typeInfo: "none" });
    expect(dumped).toMatchObject({ head: { pre: "PRE_B", post: 32 } });
  });
});
