import { safeStringify } from "./json.ts";

/**
 * Base class for failures while decoding bytes into values.
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * The data length does not match what the type requires, or a size field
 * exceeds its allowed limit.
 */
export class BadLenError extends ParseError {
  /** The limit that was exceeded, when one applies. */
  public readonly limit?: number;
  /** The offending length, when known. */
  public readonly actual?: number;

  constructor(message: string, limit?: number, actual?: number) {
    super(message);
    this.name = "BadLenError";
    this.limit = limit;
    this.actual = actual;
  }
}

/**
 * The data is structurally malformed for the type.
 */
export class BadFormatError extends ParseError {
  constructor(message: string) {
    super(message);
    this.name = "BadFormatError";
  }
}

/**
 * A type definition is contradictory and cannot be compiled.
 */
export class StructDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructDefinitionError";
  }
}

/**
 * Raised when a value cannot be encoded by its type.
 */
export class ValidationError extends Error {
  /** The path to the invalid value within the struct. */
  public readonly path: string[];
  /** The value that failed validation. */
  public readonly value: unknown;
  /** Readable name of the type that rejected the value. */
  public readonly type: string;

  /**
   * Creates a new ValidationError.
   * @param path The path to the invalid value.
   * @param invalidValue The invalid value.
   * @param typeName The name of the rejecting type.
   */
  constructor(path: string[], invalidValue: unknown, typeName: string) {
    const serializedValue = safeStringify(invalidValue);
    let message = `Invalid value: '${serializedValue}' for type: ${typeName}`;
    if (path.length > 0) {
      message += ` at path: ${renderPathAsTree(path)}`;
    }
    super(message);
    this.name = "ValidationError";
    this.path = path;
    this.value = invalidValue;
    this.type = typeName;
  }
}

/**
 * Throws a ValidationError for invalid values.
 */
export function throwInvalidError(
  path: string[],
  invalidValue: unknown,
  typeName: string,
): never {
  throw new ValidationError(path, invalidValue, typeName);
}

/**
 * Renders a path array as a formatted tree string.
 */
export function renderPathAsTree(path: string[]): string {
  if (path.length === 0) return "";
  let result = path[0];
  for (let i = 1; i < path.length; i++) {
    result += "\n" + "  ".repeat(i) + path[i];
  }
  if (path.length > 1) {
    result = "\n" + result;
  }
  return result;
}
