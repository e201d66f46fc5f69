import type { Scalar } from "../serialization/scalar.ts";
import type { FieldContainer } from "./field_container.ts";

/**
 * Anything a field can hold: a scalar, a string written into a byte field,
 * a nested struct or inline record, or an array of these.
 */
export type Value = Scalar | string | FieldContainer | Value[];

/**
 * Field assignments accepted by `new()`.
 */
export type FieldValues = Readonly<Record<string, Value>>;
