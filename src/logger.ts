/**
 * Leveled logging.
 *
 * Library code never writes to the console directly: it logs through a
 * `Logger`, which callers can replace (or silence) per recognizer.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface Logger {
  debug(module: string, message: string, ...args: unknown[]): void;
  info(module: string, message: string, ...args: unknown[]): void;
  warn(module: string, message: string, ...args: unknown[]): void;
  error(module: string, message: string, ...args: unknown[]): void;
}

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: INFO) */
  level?: LogLevel;
  prefix?: string;
  /** Output target (default: the global console) */
  sink?: Pick<Console, "log" | "warn" | "error">;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  warning: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Parse a level name ("debug", "INFO", ...). Unknown names give INFO.
 */
export function parseLogLevel(name: string): LogLevel {
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? LogLevel.INFO;
}

function formatMessage(
  prefix: string,
  level: LogLevel,
  module: string,
  message: string
): string {
  const modulePrefix = module ? ` [${module}]` : "";
  return `${prefix} ${LogLevel[level]}${modulePrefix} ${message}`;
}

/**
 * Create a logger that writes to the console (or a console-like sink).
 *
 * @example
 * ```ts
 * const logger = createConsoleLogger({ level: LogLevel.WARN });
 * logger.warn("loader", "File not found: data/x.json");
 * // [mwe] WARN [loader] File not found: data/x.json
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const { level: minLevel = LogLevel.INFO, prefix = "[mwe]", sink = console } =
    options;

  const log = (
    level: LogLevel,
    module: string,
    message: string,
    args: unknown[]
  ): void => {
    if (level < minLevel) {
      return;
    }

    const formatted = formatMessage(prefix, level, module, message);
    switch (level) {
      case LogLevel.DEBUG:
      case LogLevel.INFO:
        sink.log(formatted, ...args);
        break;
      case LogLevel.WARN:
        sink.warn(formatted, ...args);
        break;
      case LogLevel.ERROR:
        sink.error(formatted, ...args);
        break;
    }
  };

  return {
    debug: (module, message, ...args) => log(LogLevel.DEBUG, module, message, args),
    info: (module, message, ...args) => log(LogLevel.INFO, module, message, args),
    warn: (module, message, ...args) => log(LogLevel.WARN, module, message, args),
    error: (module, message, ...args) => log(LogLevel.ERROR, module, message, args),
  };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
