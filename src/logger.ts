/**
 * Severity levels understood by {@link CodecLogger}, lowest first.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Minimal logging surface used by the codec. Any object with these four
 * methods can be installed through `configure({ logger })`.
 */
export interface CodecLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const noop = (): void => undefined;

export const NOOP_LOGGER: CodecLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Creates a logger writing to the console. Messages below `minLevel` are
 * dropped.
 */
export function createConsoleLogger(
  prefix = "bytestruct",
  minLevel: LogLevel = "warn",
): CodecLogger {
  const enabled = (level: LogLevel) =>
    LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
  return {
    debug: (message, meta) => {
      if (enabled("debug")) console.debug(`[${prefix}] ${message}`, meta ?? "");
    },
    info: (message, meta) => {
      if (enabled("info")) console.info(`[${prefix}] ${message}`, meta ?? "");
    },
    warn: (message, meta) => {
      if (enabled("warn")) console.warn(`[${prefix}] ${message}`, meta ?? "");
    },
    error: (message, meta) => {
      if (enabled("error")) console.error(`[${prefix}] ${message}`, meta ?? "");
    },
  };
}
