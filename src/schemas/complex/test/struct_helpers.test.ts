import { describe, expect, it } from "vitest";

import { StructType } from "../struct_type.ts";
import {
  packExpr,
  packRealSize,
  packSize,
  sizeFromLen,
} from "../struct_helpers.ts";
import { raw } from "../../primitive/raw_type.ts";
import { uint16, uint8 } from "../../primitive/std_prims.ts";
import { BadFormatError, BadLenError } from "../../error.ts";
import { toHex } from "../../../manipulate_bytes.ts";

describe("struct helpers", () => {
  it("packSize stores the padded size", () => {
    const sized = new StructType([[uint8, "len"], [raw, "data"]], {
      name: "sized",
      padding: 4,
      prepack: packSize("len"),
    });
    expect(toHex(sized.new({ data: "ab" }).toBytes())).toBe("0x04616200");
  });

  it("packRealSize stores the size without alignment", () => {
    const sized = new StructType([[uint8, "len"], [raw, "data"]], {
      name: "real_sized",
      padding: 4,
      prepack: packRealSize("len"),
    });
    expect(toHex(sized.new({ data: "ab" }).toBytes())).toBe("0x03616200");
  });

  it("packExpr stores computed values", () => {
    const list = new StructType(
      [[uint8, "count"], [uint16.array(0), "items"]],
      {
        name: "counted",
        padding: 1,
        prepack: packExpr((v) => v.getArray("items").length, "count"),
      },
    );
    const value = list.new({ items: [1, 2] });
    expect(toHex(value.toBytes())).toBe("0x0200010002");
  });

  it("sizeFromLen reads nested paths", () => {
    const header = new StructType([[uint8, "flags"], [uint16, "length"]], {
      name: "nested_header",
      padding: 1,
    });
    const packet = new StructType([[header, "header"], [raw, "body"]], {
      name: "packet",
      padding: 1,
      size: sizeFromLen(16, "header", "length"),
    });
    const size = sizeFromLen(16, "header", "length");
    const value = packet.new();
    value.setPath(6, "header", "length");
    expect(size(value)).toBe(6);
    value.setPath(17, "header", "length");
    expect(() => size(value)).toThrow(BadLenError);
  });

  it("sizeFromLen rejects non-integer lengths", () => {
    const header = new StructType([[uint8, "flags"]], {
      name: "flags_only",
      padding: 1,
    });
    expect(() => sizeFromLen(16, "length")(header.new())).toThrow(
      BadFormatError,
    );
  });
});
