import { describe, expect, it } from "vitest";

import { DynamicArrayType } from "../dynamic_array_type.ts";
import { StructType } from "../struct_type.ts";
import { packExpr } from "../struct_helpers.ts";
import { raw } from "../../primitive/raw_type.ts";
import { uint16, uint8 } from "../../primitive/std_prims.ts";
import { BadLenError } from "../../error.ts";
import { dump } from "../../../dump/dump.ts";
import { fromHex, toHex } from "../../../manipulate_bytes.ts";
import { encode } from "../../../serialization/text_encoding.ts";

const pstring = new StructType([[uint8, "length"], [raw, "data"]], {
  name: "pstring",
  padding: 1,
  size: (v) => v.getNumber("length") + 1,
  prepack: packExpr((v) => v.getBytes("data").length, "length"),
});

const strings = new StructType(
  [
    [uint16, "size"],
    [new DynamicArrayType(pstring, "strings", (v) => v.getNumber("size"))],
  ],
  {
    name: "strings",
    padding: 1,
    prepack: packExpr((v) => v.getArray("strings").length, "size"),
  },
);

describe("DynamicArrayType", () => {
  it("encodes the count and every element", () => {
    const value = strings.new();
    value.getArray("strings").push(pstring.new({ data: encode("abc") }));
    value.getArray("strings").push(pstring.new({ data: encode("defghi") }));
    const bytes = strings.toBytes(value);
    expect(toHex(bytes)).toBe("0x00020361626306646566676869");
    expect(value.realSize()).toBe(13);
  });

  it("parses back the elements it encoded", () => {
    const value = strings.new();
    value.getArray("strings").push(pstring.new({ data: encode("abc") }));
    value.getArray("strings").push(pstring.new({ data: encode("defghi") }));
    const bytes = strings.toBytes(value);
    const parsed = strings.parse(bytes);
    expect(parsed?.size).toBe(bytes.length);
    expect(dump(parsed?.value ?? [], { humanRead: false })).toEqual(
      dump(value, { humanRead: false }),
    );
  });

  it("starts empty on new values", () => {
    const value = strings.new();
    expect(value.getArray("strings")).toEqual([]);
    expect(toHex(value.toBytes())).toBe("0x0000");
  });

  it("returns undefined while elements are incomplete", () => {
    expect(strings.parse(fromHex("00 02 03 61 62 63 06 64"))).toBeUndefined();
  });

  it("throws BadLenError on create with missing elements", () => {
    expect(() => strings.create(fromHex("00 02 03 61 62 63"))).toThrow(
      BadLenError,
    );
  });

  it("cannot form arrays", () => {
    const darray = new DynamicArrayType(uint8, "items", () => 0);
    expect(() => darray.array(2)).toThrow(TypeError);
    expect(String(darray)).toBe("uint8[]");
  });
});
