import { describe, expect, it } from "vitest";

import { OptionalType } from "../optional_type.ts";
import { StructType } from "../struct_type.ts";
import { packExpr } from "../struct_helpers.ts";
import { uint16, uint32, uint8 } from "../../primitive/std_prims.ts";
import { fromHex, toHex } from "../../../manipulate_bytes.ts";

const message = new StructType(
  [
    [uint16, "data"],
    [uint8, "hasExtra"],
    [new OptionalType(uint32, "extra", (v) => v.getNumber("hasExtra") !== 0)],
  ],
  {
    name: "message",
    padding: 1,
    prepack: packExpr((v) => (v.has("extra") ? 1 : 0), "hasExtra"),
  },
);

describe("OptionalType", () => {
  it("encodes the field when it is set", () => {
    const value = message.new({ data: 7, extra: 12 });
    expect(toHex(value.toBytes())).toBe("0x0007010000000c");
  });

  it("leaves the field out when it is unset", () => {
    const value = message.new({ data: 7 });
    expect(value.has("extra")).toBe(false);
    expect(toHex(value.toBytes())).toBe("0x000700");
    expect(value.realSize()).toBe(3);
  });

  it("decodes the field only when the condition holds", () => {
    const present = message.parse(fromHex("00 07 01 00 00 00 0c"));
    expect(present?.size).toBe(7);
    expect(present?.value.getNumber("extra")).toBe(12);

    const absent = message.parse(fromHex("00 07 00 ff"));
    expect(absent?.size).toBe(3);
    expect(absent?.value.has("extra")).toBe(false);
  });

  it("returns undefined when a present field is incomplete", () => {
    expect(message.parse(fromHex("00 07 01 00 00"))).toBeUndefined();
  });

  it("cannot form arrays", () => {
    const optional = new OptionalType(uint8, "flag", () => true);
    expect(() => optional.array(2)).toThrow(TypeError);
    expect(String(optional)).toBe("uint8?");
  });
});
