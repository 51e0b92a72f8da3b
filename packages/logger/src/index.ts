/**
 * @ttlink/logger
 *
 * pino loggers for the HTTP service, the reaper and the stores. Each
 * component gets its own child name (`ttlink:<component>`) so reaper
 * sweeps and request logs can be told apart in one stream.
 *
 * ```ts
 * const log = createLogger("reaper", config.logLevel);
 * log.warn({ err, code, target }, "ArtifactRemovalFailed");
 * ```
 *
 * Output is JSON lines, except in development where pino-pretty is used.
 * Tests pass level "silent" and spy on the methods they care about.
 */

import pino from "pino";

export type { Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Parse a level name case-insensitively; anything pino does not know
 * becomes `fallback`.
 */
export function parseLogLevel(level: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = (level ?? "").toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === normalized) ?? fallback;
}

const NODE_ENV = process.env.NODE_ENV || "development";
const DEFAULT_LEVEL = parseLogLevel(process.env.LOG_LEVEL);

const prettyTransport: pino.TransportSingleOptions = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:standard",
    ignore: "pid,hostname,env",
  },
};

/**
 * @param component - short name, e.g. "redirect", "reaper", "db"
 * @param level - a LogLevel, or "silent" to discard everything
 */
export function createLogger(component: string, level: LogLevel | "silent" = DEFAULT_LEVEL): pino.Logger {
  return pino({
    name: `ttlink:${component}`,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    transport: NODE_ENV === "development" ? prettyTransport : undefined,
    base: { service: component, env: NODE_ENV },
  });
}

/** Process-wide logger for code that has no component of its own */
export const logger = createLogger("main");
