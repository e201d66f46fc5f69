import { afterEach, describe, expect, it } from "vitest";

import { dump } from "../dump.ts";
import { StructType } from "../../schemas/complex/struct_type.ts";
import { packValue } from "../../schemas/complex/struct_helpers.ts";
import { EnumType } from "../../schemas/primitive/enum_type.ts";
import { cstr } from "../../schemas/primitive/cstr_type.ts";
import { char, int16, uint8 } from "../../schemas/primitive/std_prims.ts";
import { configure, resetConfig } from "../../config.ts";
import { NOOP_LOGGER } from "../../logger.ts";
import { fromHex } from "../../manipulate_bytes.ts";

const kind = new EnumType({
  name: "kind",
  base: uint8,
  values: { PING: 1, PONG: 2 },
});

const message = new StructType([[kind, "kind"], [kind.array(2), "history"]], {
  name: "message",
  padding: 1,
});

const version = new StructType([[uint8, "major"], [uint8, "minor"]], {
  name: "version",
  padding: 1,
  formatter: (record) => ({
    ...record,
    text: `${record.major}.${record.minor}`,
  }),
});

describe("dump", () => {
  afterEach(() => {
    resetConfig();
  });

  describe("type info", () => {
    it("adds a _type entry by default", () => {
      expect(dump(message.new({ kind: 1, history: [2, 7] }))).toEqual({
        kind: "PING",
        history: ["PONG", 7],
        _type: "<message>",
      });
    });

    it("wraps the record in a type key", () => {
      expect(dump(message.new(), { typeInfo: "key", humanRead: false }))
        .toEqual({ "<message>": { kind: 0, history: [0, 0] } });
    });

    it("dumps nested struct arrays", () => {
      const point = new StructType([[int16, "x"], [int16, "y"]], {
        name: "point",
        padding: 1,
      });
      const path = new StructType([[point.array(2), "points"]], {
        name: "path",
        padding: 1,
      });
      const value = path.create(fromHex("00 01 00 02 ff ff 00 03"));
      expect(dump(value)).toEqual({
        points: [
          { x: 1, y: 2, _type: "<point>" },
          { x: -1, y: 3, _type: "<point>" },
        ],
        _type: "<path>",
      });
    });
  });

  describe("ordering", () => {
    it("restores declaration order", () => {
      const value = message.new({ kind: 2 });
      const history = value.get("history");
      value.delete("history");
      value.delete("kind");
      if (history !== undefined) {
        value.set("history", history);
      }
      value.set("kind", 2);
      const ordered = dump(value, { typeInfo: "none" });
      const unordered = dump(value, { typeInfo: "none", ordered: false });
      expect(Object.keys(ordered)).toEqual(["kind", "history"]);
      expect(Object.keys(unordered)).toEqual(["history", "kind"]);
    });

    it("lists integer-like field names first", () => {
      const indexed = new StructType([[uint8, "b"], [uint8, "2"]], {
        name: "indexed",
        padding: 1,
      });
      const dumped = dump(indexed.create(fromHex("01 02")), { typeInfo: "none" });
      expect(Object.keys(dumped)).toEqual(["2", "b"]);
      expect(dumped).toEqual({ b: 1, "2": 2 });
    });
  });

  describe("formatters", () => {
    it("applies formatters of extended fields", () => {
      const extended = new StructType([[uint8, "code"]], {
        name: "extended",
        padding: 1,
        extend: { code: kind },
      });
      expect(dump(extended.new({ code: 2 }), { typeInfo: "none" })).toEqual({
        code: "PONG",
      });
    });

    it("formats named flattened structs at their path", () => {
      const release = new StructType([[version, "version"], [uint8, "flags"]], {
        name: "release",
        padding: 1,
      });
      const value = release.new();
      value.setPath(1, "version", "major");
      value.setPath(2, "version", "minor");
      expect(dump(value, { typeInfo: "none" })).toEqual({
        version: { major: 1, minor: 2, text: "1.2" },
        flags: 0,
      });
    });

    it("formats anonymous flattened structs on the whole record", () => {
      const release = new StructType([[version], [uint8, "flags"]], {
        name: "flat_release",
        padding: 1,
      });
      const value = release.create(fromHex("03 04 05"));
      expect(dump(value, { typeInfo: "none" })).toEqual({
        major: 3,
        minor: 4,
        flags: 5,
        text: "3.4",
      });
    });

    it("lets embedded structs format their own fields", () => {
      const header = new StructType([[kind, "kind"]], {
        name: "message_header",
        padding: 1,
        init: packValue(2, "kind"),
      });
      const framed = new StructType([[header], [cstr, "body"]], {
        name: "framed",
        padding: 1,
      });
      expect(dump(framed.new({ body: "hi" }), { typeInfo: "none" })).toEqual({
        kind: "PONG",
        body: "hi",
      });
    });

    it("runs the struct formatter last", () => {
      const pair = new StructType([[uint8, "a"], [uint8, "b"]], {
        name: "pair",
        padding: 1,
        formatter: (record) => ({ sum: Number(record.a) + Number(record.b) }),
      });
      const value = pair.new({ a: 1, b: 2 });
      expect(dump(value, { typeInfo: "none" })).toEqual({ sum: 3 });
      expect(dump(value, { typeInfo: "none", humanRead: false })).toEqual({
        a: 1,
        b: 2,
      });
    });

    it("logs formatter failures and keeps the value", () => {
      const messages: string[] = [];
      configure({
        logger: {
          ...NOOP_LOGGER,
          debug: (text) => messages.push(text),
        },
      });
      const broken = new StructType([[uint8, "a"]], {
        name: "broken",
        padding: 1,
        formatter: () => {
          throw new Error("formatter failed");
        },
      });
      expect(dump(broken.new({ a: 4 }), { typeInfo: "none" })).toEqual({
        a: 4,
      });
      expect(messages).toEqual(["A formatter threw an exception"]);
    });
  });

  describe("byte strings", () => {
    const tagged = new StructType([[char.array(4), "tag"]], {
      name: "tagged",
      padding: 1,
    });

    it("decodes UTF-8 bytes with toStr", () => {
      const value = tagged.create(fromHex("68 69 00 00"));
      expect(dump(value, { typeInfo: "none" })).toEqual({
        tag: fromHex("68 69"),
      });
      expect(dump(value, { typeInfo: "none", toStr: true })).toEqual({
        tag: "hi",
      });
    });

    it("falls back to hex for invalid UTF-8", () => {
      const value = tagged.create(fromHex("ff 00 00 00"));
      expect(dump(value, { typeInfo: "none", toStr: true })).toEqual({
        tag: "0xff",
      });
    });
  });
});
