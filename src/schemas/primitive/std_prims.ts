import { PrimType } from "./prim_type.ts";
import { CharType } from "./char_type.ts";

export const uint8 = new PrimType({ kind: "uint", width: 1, name: "uint8" });
export const uint16 = new PrimType({ kind: "uint", width: 2, name: "uint16" });
export const uint32 = new PrimType({ kind: "uint", width: 4, name: "uint32" });
export const uint64 = new PrimType({ kind: "uint", width: 8, name: "uint64" });
export const int8 = new PrimType({ kind: "int", width: 1, name: "int8" });
export const int16 = new PrimType({ kind: "int", width: 2, name: "int16" });
export const int32 = new PrimType({ kind: "int", width: 4, name: "int32" });
export const int64 = new PrimType({ kind: "int", width: 8, name: "int64" });
export const float32 = new PrimType({ kind: "float", width: 4, name: "float32" });
export const float64 = new PrimType({ kind: "float", width: 8, name: "float64" });
export const bool = new PrimType({ kind: "bool", width: 1, name: "bool" });
export const char = new CharType();

// Little-endian variants are strict so they keep their byte order inside
// big-endian structs.
function littleEndian(base: PrimType): PrimType {
  return new PrimType({
    kind: base.item.kind,
    width: base.item.width,
    name: `${base.name}_le`,
    endian: "little",
    strict: true,
  });
}

export const uint16_le = littleEndian(uint16);
export const uint32_le = littleEndian(uint32);
export const uint64_le = littleEndian(uint64);
export const int16_le = littleEndian(int16);
export const int32_le = littleEndian(int32);
export const int64_le = littleEndian(int64);
export const float32_le = littleEndian(float32);
export const float64_le = littleEndian(float64);

const BY_NAME: ReadonlyMap<string, PrimType> = new Map(
  [
    uint8,
    uint16,
    uint32,
    uint64,
    int8,
    int16,
    int32,
    int64,
    float32,
    float64,
    bool,
    char,
    uint16_le,
    uint32_le,
    uint64_le,
    int16_le,
    int32_le,
    int64_le,
    float32_le,
    float64_le,
  ].map((type) => [String(type), type]),
);

const BLOCK_CODE = /^(\d+)s$/;

/**
 * Looks up a standard primitive by name, e.g. `"uint16"` or `"int32_le"`.
 * `"<n>s"` names an n-byte block.
 * @throws {TypeError} for unknown names.
 */
export function stdPrimByName(name: string): PrimType {
  const found = BY_NAME.get(name);
  if (found) {
    return found;
  }
  const block = BLOCK_CODE.exec(name);
  const width = block ? Number(block[1]) : 0;
  if (width > 0) {
    return new PrimType({ kind: "bytes", width, name: `char[${width}]` });
  }
  throw new TypeError(`Unknown primitive type: ${name}`);
}
