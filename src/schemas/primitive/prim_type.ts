import { type InlineLayout, Type } from "../type.ts";
import { PrimitiveParser } from "../../parsers/primitive_parser.ts";
import {
  checkScalarItem,
  describeScalar,
  type Scalar,
  type ScalarItem,
  type ScalarKind,
} from "../../serialization/scalar.ts";
import type { Endian } from "../../config.ts";

export interface PrimTypeOptions {
  kind: ScalarKind;
  /** Size in bytes. */
  width: number;
  name?: string;
  /** Byte order when the type is not merged into a struct. Defaults to big. */
  endian?: Endian;
  /**
   * Never merge into an enclosing struct's layout, so the type keeps its
   * own byte order inside structs of the other order.
   */
  strict?: boolean;
}

/**
 * A fixed-width scalar: integer, float, boolean or byte block.
 */
export class PrimType extends Type<Scalar> {
  readonly item: ScalarItem;
  readonly endian: Endian;
  readonly strict: boolean;
  #parser?: PrimitiveParser;

  constructor(options: PrimTypeOptions) {
    super(options.name);
    this.endian = options.endian ?? "big";
    this.strict = options.strict ?? false;
    this.item = {
      kind: options.kind,
      width: options.width,
      littleEndian: this.endian === "little",
    };
    checkScalarItem(this.item);
  }

  protected override compile(): PrimitiveParser {
    return new PrimitiveParser(this.item);
  }

  public override parser(): PrimitiveParser {
    return this.#parser ??= this.compile();
  }

  public override inline(): InlineLayout | undefined {
    return this.strict ? undefined : { kind: "primitive", items: [this.item] };
  }

  /**
   * True for integer types, the only ones usable as bit field or enum
   * bases.
   */
  public isInteger(): boolean {
    return this.item.kind === "uint" || this.item.kind === "int";
  }

  public override toString(): string {
    return this.name ?? describeScalar(this.item);
  }
}
