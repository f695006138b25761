export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export type LogSink = (
  level: Exclude<LogLevel, "silent">,
  message: string,
  details: unknown[]
) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = "hourbook:";

const consoleSink: LogSink = (level, message, details) => {
  const line = `${PREFIX} ${message}`;
  switch (level) {
    case "debug":
      console.debug(line, ...details);
      break;
    case "info":
      console.log(line, ...details);
      break;
    case "warn":
      console.warn(line, ...details);
      break;
    case "error":
      console.error(line, ...details);
      break;
  }
};

export function createLogger(options?: { level?: LogLevel; sink?: LogSink }): Logger {
  const threshold = LEVEL_ORDER[options?.level ?? "info"];
  const sink = options?.sink ?? consoleSink;
  const emit =
    (level: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (LEVEL_ORDER[level] < threshold) {
        return;
      }
      sink(level, message, details);
    };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
