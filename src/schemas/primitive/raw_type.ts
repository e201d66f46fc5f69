import { Type } from "../type.ts";
import { RawParser } from "../../parsers/raw_parser.ts";

/**
 * Variable-length bytes that take whatever data is left.
 */
export class RawType extends Type<Uint8Array> {
  readonly stripZeros: boolean;

  /**
   * @param stripZeros Strip trailing zero bytes when decoding.
   */
  constructor(name: string, stripZeros = false) {
    super(name);
    this.stripZeros = stripZeros;
  }

  protected override compile(): RawParser {
    return new RawParser(this.stripZeros);
  }

  public override array(_size: number): never {
    throw new TypeError(`${this} cannot form array`);
  }

  public override isExtra(): boolean {
    return true;
  }
}

/** Raw bytes. */
export const raw = new RawType("raw");

/** Raw bytes with trailing zero padding removed on decode. */
export const varchr = new RawType("varchr", true);
