import { type CodecLogger, createConsoleLogger } from "./logger.ts";

/**
 * Byte order of multi-byte scalars.
 */
export type Endian = "big" | "little";

/**
 * Process-wide defaults. Options given to a single type always win over
 * these.
 */
export interface CodecConfig {
  /** Receives definition warnings and swallowed formatter failures. */
  logger: CodecLogger;
  /** Alignment applied to structs that do not set `padding`. Defaults to 8. */
  defaultPadding: number;
  /** Byte order for shorthand field types and nested field lists. */
  defaultEndian: Endian;
  /** Set to false to silence definition warnings. */
  warnOnDefinition: boolean;
}

function defaults(): CodecConfig {
  return {
    logger: createConsoleLogger(),
    defaultPadding: 8,
    defaultEndian: "big",
    warnOnDefinition: true,
  };
}

let current: CodecConfig = defaults();

/**
 * Overrides some of the process-wide defaults.
 * @returns The resulting configuration.
 */
export function configure(options: Partial<CodecConfig>): CodecConfig {
  if (
    options.defaultPadding !== undefined &&
    (!Number.isInteger(options.defaultPadding) || options.defaultPadding < 1)
  ) {
    throw new RangeError(
      `Invalid default padding: ${options.defaultPadding}`,
    );
  }
  current = { ...current, ...options };
  return current;
}

export function getConfig(): Readonly<CodecConfig> {
  return current;
}

/**
 * Restores the built-in defaults.
 */
export function resetConfig(): void {
  current = defaults();
}

/**
 * Reports a suspicious but legal type definition.
 */
export function warnDefinition(
  message: string,
  meta?: Record<string, unknown>,
): void {
  if (current.warnOnDefinition) {
    current.logger.warn(message, meta);
  }
}
