import { afterEach, describe, expect, it } from "vitest";

import {
  configure,
  getConfig,
  resetConfig,
  warnDefinition,
} from "../config.ts";
import { NOOP_LOGGER } from "../logger.ts";
import { StructType } from "../schemas/complex/struct_type.ts";
import { uint8 } from "../schemas/primitive/std_prims.ts";
import { toHex } from "../manipulate_bytes.ts";

function captureWarnings(): string[] {
  const warnings: string[] = [];
  configure({
    logger: { ...NOOP_LOGGER, warn: (message) => warnings.push(message) },
  });
  return warnings;
}

describe("config", () => {
  afterEach(() => {
    resetConfig();
  });

  it("starts from the built-in defaults", () => {
    const config = getConfig();
    expect(config.defaultPadding).toBe(8);
    expect(config.defaultEndian).toBe("big");
    expect(config.warnOnDefinition).toBe(true);
  });

  it("rejects invalid default padding", () => {
    expect(() => configure({ defaultPadding: 0 })).toThrow(RangeError);
    expect(() => configure({ defaultPadding: 1.5 })).toThrow(RangeError);
    expect(getConfig().defaultPadding).toBe(8);
  });

  it("applies the default padding to new structs", () => {
    const warnings = captureWarnings();
    configure({ defaultPadding: 4 });
    const word = new StructType([[uint8, "a"]], { name: "word" });
    expect(word.padding).toBe(4);
    expect(toHex(word.new({ a: 1 }).toBytes())).toBe("0x01000000");
    expect(warnings).toEqual(["padding is not set on word; using 4"]);
  });

  it("applies the default byte order to new structs", () => {
    configure({ defaultEndian: "little" });
    const word = new StructType([["uint16", "a"]], { name: "le_word", padding: 1 });
    expect(toHex(word.new({ a: 1 }).toBytes())).toBe("0x0100");
  });

  it("can silence definition warnings", () => {
    const warnings = captureWarnings();
    configure({ warnOnDefinition: false });
    warnDefinition("ignored");
    expect(warnings).toEqual([]);
  });

  it("resets to the defaults", () => {
    configure({ defaultPadding: 2, defaultEndian: "little" });
    resetConfig();
    expect(getConfig().defaultPadding).toBe(8);
    expect(getConfig().defaultEndian).toBe("big");
  });
});
