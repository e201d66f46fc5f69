// Schema types
export { ArrayType, Type } from "./schemas/type.ts";
export type { Formatter, InlineLayout } from "./schemas/type.ts";
export { PrimType } from "./schemas/primitive/prim_type.ts";
export type { PrimTypeOptions } from "./schemas/primitive/prim_type.ts";
export { CharType } from "./schemas/primitive/char_type.ts";
export { RawType, raw, varchr } from "./schemas/primitive/raw_type.ts";
export { CstrType, cstr } from "./schemas/primitive/cstr_type.ts";
export { EnumType } from "./schemas/primitive/enum_type.ts";
export type {
  EnumTypeOptions,
  EnumValue,
} from "./schemas/primitive/enum_type.ts";

// Standard primitives
export {
  bool,
  char,
  float32,
  float32_le,
  float64,
  float64_le,
  int16,
  int16_le,
  int32,
  int32_le,
  int64,
  int64_le,
  int8,
  stdPrimByName,
  uint16,
  uint16_le,
  uint32,
  uint32_le,
  uint64,
  uint64_le,
  uint8,
} from "./schemas/primitive/std_prims.ts";

// Struct types
export { StructLikeType } from "./schemas/complex/struct_like_type.ts";
export type { EmbeddedReplacement } from "./schemas/complex/struct_like_type.ts";
export { StructType } from "./schemas/complex/struct_type.ts";
export type {
  BaseStructType,
  FieldDecl,
  FieldType,
  StructTypeOptions,
} from "./schemas/complex/struct_type.ts";
export { FixedStructType } from "./schemas/complex/fixed_struct_type.ts";
export { BitfieldType } from "./schemas/complex/bitfield_type.ts";
export type {
  BitfieldDecl,
  BitfieldTypeOptions,
} from "./schemas/complex/bitfield_type.ts";
export { OptionalType } from "./schemas/complex/optional_type.ts";
export type { OptionalTypeOptions } from "./schemas/complex/optional_type.ts";
export { DynamicArrayType } from "./schemas/complex/dynamic_array_type.ts";
export type { DynamicArrayTypeOptions } from "./schemas/complex/dynamic_array_type.ts";
export { VariantType } from "./schemas/complex/variant_type.ts";
export type { VariantTypeOptions } from "./schemas/complex/variant_type.ts";
export {
  packExpr,
  packRealSize,
  packSize,
  packValue,
  sizeFromLen,
} from "./schemas/complex/struct_helpers.ts";

// Parsers
export type {
  ClassifyValue,
  Classifier,
  Criteria,
  Parser,
  ParseResult,
  SizeFunction,
  StructHook,
} from "./parsers/parser.ts";
export { StructParser } from "./parsers/struct_parser.ts";
export type { LengthFunction } from "./parsers/dynamic_array_parser.ts";

// Values
export { FieldContainer, isStructValue } from "./value/field_container.ts";
export { FieldRecord } from "./value/field_record.ts";
export { EmbeddedStruct, StructValue } from "./value/struct_value.ts";
export type { FieldValues, Value } from "./value/value.ts";
export type { Scalar } from "./serialization/scalar.ts";

// Dump
export { dump } from "./dump/dump.ts";
export type {
  DumpOptions,
  DumpRecord,
  DumpValue,
  TypeInfo,
} from "./dump/dump.ts";
export type { StructFormatter } from "./dump/formatter_table.ts";

// Errors
export {
  BadFormatError,
  BadLenError,
  ParseError,
  StructDefinitionError,
  ValidationError,
} from "./schemas/error.ts";

// Configuration and logging
export { configure, getConfig, resetConfig } from "./config.ts";
export type { CodecConfig, Endian } from "./config.ts";
export { createConsoleLogger, NOOP_LOGGER } from "./logger.ts";
export type { CodecLogger, LogLevel } from "./logger.ts";

// Byte utilities
export { fromHex, toHex } from "./manipulate_bytes.ts";
