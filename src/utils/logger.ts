import pino, { type Logger } from "pino";

/**
 * The slice of a pino logger the services depend on. Tests pass a recorder.
 */
export interface LogSink {
  debug(obj: Record<string, unknown>, msg: string): void;
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

let rootLogger: Logger | null = null;

export function parseLogLevel(raw: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = String(raw || "").trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: "compute-social-agent",
      level: parseLogLevel(process.env.LOG_LEVEL),
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }
  return rootLogger;
}

export function setLogLevel(level: LogLevel): void {
  getRootLogger().level = level;
}

export function createLogger(module: string): Logger {
  return getRootLogger().child({ module });
}

