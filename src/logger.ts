import winston from "winston";

export type Logger = winston.Logger;
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LoggerOptions {
  level?: LogLevel;
  /** Destination for formatted lines. Defaults to stderr. */
  stream?: NodeJS.WritableStream;
  silent?: boolean;
  now?: () => Date;
}

const lineFormat = winston.format.printf(({ level, message, timestamp, ...context }) => {
  const contextText = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  return `[${String(timestamp)}] ${level.toUpperCase()} - ${String(message)}${contextText}`;
});

export function createLogger(options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  const transport = options.stream
    ? new winston.transports.Stream({ stream: options.stream })
    : new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] });

  return winston.createLogger({
    level: options.level ?? "info",
    levels: { error: 0, warn: 1, info: 2, debug: 3 },
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp({ format: () => now().toISOString() }),
      lineFormat,
    ),
    transports: [transport],
  });
}
