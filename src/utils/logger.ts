export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, meta?: LogMeta) => void;
  info: (msg: string, meta?: LogMeta) => void;
  warn: (msg: string, meta?: LogMeta) => void;
  error: (msg: string, meta?: LogMeta) => void;
  child: (bindings: LogMeta) => Logger;
};

const levels: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in levels;
}

export function createLogger(level: LogLevel, bindings: LogMeta = {}): Logger {
  const threshold = levels[level] ?? 20;

  const log = (lvl: LogLevel, msg: string, meta?: LogMeta) => {
    if (levels[lvl] < threshold) return;
    // eslint-disable-next-line no-console
    console.log(
      JSON.stringify({
        level: lvl,
        msg,
        time: new Date().toISOString(),
        ...bindings,
        ...meta,
      })
    );
  };

  return {
    debug: (msg: string, meta?: LogMeta) => log("debug", msg, meta),
    info: (msg: string, meta?: LogMeta) => log("info", msg, meta),
    warn: (msg: string, meta?: LogMeta) => log("warn", msg, meta),
    error: (msg: string, meta?: LogMeta) => log("error", msg, meta),
    child: (extra: LogMeta) => createLogger(level, { ...bindings, ...extra }),
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
