/**
 * Minimal leveled logger used by the client.
 *
 * Callers can pass any object implementing `Logger` (e.g. a pino or console wrapper).
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LoggerOptions {
  /** Minimum level written (default "warn") */
  level?: LogLevel;
  /** Prefix for every line (default "[web3-storage]") */
  prefix?: string;
  /** Sink for formatted lines (default: the matching console method) */
  write?: (level: Exclude<LogLevel, "silent">, line: string) => void;
}

function consoleWrite(level: Exclude<LogLevel, "silent">, line: string): void {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

function formatLine(prefix: string, level: string, message: string, meta?: LogMeta): string {
  const line = `${prefix} ${level.toUpperCase()} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return line;
  try {
    return `${line} ${JSON.stringify(meta)}`;
  } catch {
    return `${line} [unserializable meta]`;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? "warn";
  const prefix = options.prefix ?? "[web3-storage]";
  const write = options.write ?? consoleWrite;

  const log =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, meta?: LogMeta): void => {
      if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) return;
      write(level, formatLine(prefix, level, message, meta));
    };

  return {
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
