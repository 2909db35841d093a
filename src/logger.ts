export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogMeta = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/** A logger that writes to the console, dropping entries below `level`. */
export class ConsoleLogger implements ILogger {
  constructor(private readonly level: LogLevel = "info") {}

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled("debug")) console.debug(`[DEBUG] ${message}`, meta ?? "");
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled("info")) console.info(`[INFO] ${message}`, meta ?? "");
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled("warn")) console.warn(`[WARN] ${message}`, meta ?? "");
  }

  error(message: string, meta?: LogMeta): void {
    if (this.enabled("error")) console.error(`[ERROR] ${message}`, meta ?? "");
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

/** A logger that does nothing (no-op). */
export class NullLogger implements ILogger {
  debug(_message: string, _meta?: LogMeta): void {}
  info(_message: string, _meta?: LogMeta): void {}
  warn(_message: string, _meta?: LogMeta): void {}
  error(_message: string, _meta?: LogMeta): void {}
}
