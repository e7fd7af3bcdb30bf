import { pino } from "pino";
import type { Level, Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: Level | "silent";
  pretty?: boolean;
}

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function isLevel(value: string | undefined): value is Level | "silent" {
  return LEVELS.some((level) => level === value);
}

function defaultLevel(): Level | "silent" {
  const fromEnv = process.env.REVIEW_GATE_LOG_LEVEL ?? process.env.LOG_LEVEL;
  if (isLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "test" ? "silent" : "info";
}

/**
 * Root logger for the SDK. Components log through
 * `logger.child({ component })`; pass your own pino instance in the
 * client config to merge SDK logs into the host application's.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pretty = options.pretty ?? process.env.REVIEW_GATE_LOG_PRETTY === "1";

  return pino({
    level: options.level ?? defaultLevel(),
    base: { name: "agent-review-gate" },
    ...(pretty
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "SYS:standard" },
          },
        }
      : {}),
  });
}
