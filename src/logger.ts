import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function isDaemon(): boolean {
  return process.env.SESSION_BRIDGE_DAEMON === "true";
}

function shouldColorizeLogs(): boolean {
  if (process.env.NO_COLOR === "1" || process.env.NO_COLOR === "true") {
    return false;
  }
  if (isDaemon()) {
    return false;
  }
  return process.stdout.isTTY;
}

// Daemon output goes to a log file as JSON lines; interactive runs get pino-pretty.
export const logger = isDaemon()
  ? pino({ level: process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL })
  : pino({
      level: process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: shouldColorizeLogs(),
        },
      },
    });

export type Logger = pino.Logger;

export function configureLogger(level?: string): void {
  const normalized = (level || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  const match = LOG_LEVELS.find((candidate) => candidate === normalized);
  if (match) {
    logger.level = match;
    return;
  }
  logger.warn({ level }, "Invalid logger level in config; keeping current level");
}
