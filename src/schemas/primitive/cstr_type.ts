import { Type } from "../type.ts";
import { CstrParser } from "../../parsers/cstr_parser.ts";

/**
 * Zero-terminated byte string. The terminator is not part of the value.
 */
export class CstrType extends Type<Uint8Array> {
  constructor() {
    super("cstr");
  }

  protected override compile(): CstrParser {
    return new CstrParser();
  }
}

export const cstr = new CstrType();
