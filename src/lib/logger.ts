export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop = () => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  sink?: Pick<Console, "debug" | "info" | "warn" | "error">;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? console;
  const prefix = options.scope ? `[${options.scope}] ` : "";

  const emit = (level: Exclude<LogLevel, "silent">) => (message: string, meta?: LogMeta) => {
    if (LEVEL_RANK[level] < threshold) return;
    if (meta && Object.keys(meta).length > 0) {
      sink[level](`${prefix}${message}`, meta);
    } else {
      sink[level](`${prefix}${message}`);
    }
  };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}
