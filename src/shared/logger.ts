import pino from "pino";

/** Fields attached to a log line, as passed by the caller. */
export type LogMetadata = Record<string, unknown>;

export type Logger = {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string | Error, metadata?: LogMetadata): void;
};

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type LoggerConfig = {
  level?: LogLevel;
  /** Human-readable output through pino-pretty instead of JSON lines. */
  prettyPrint?: boolean;
};

/** Pino-backed logger for the server and the migration script. */
export function createLogger(config: LoggerConfig = {}): Logger {
  const log = pino({
    name: "pressroom",
    level: config.level ?? "info",
    transport: config.prettyPrint
      ? { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" } }
      : undefined,
  });

  return {
    debug: (message, metadata) => log.debug(metadata ?? {}, message),
    info: (message, metadata) => log.info(metadata ?? {}, message),
    warn: (message, metadata) => log.warn(metadata ?? {}, message),
    error: (message, metadata) => {
      if (message instanceof Error) log.error({ ...metadata, err: message }, message.message);
      else log.error(metadata ?? {}, message);
    },
  };
}

/** Discards everything. Default for library callers that pass no logger. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
