import pino, { type Logger, type LevelWithSilent } from "pino";
import { z } from "zod";

export type { Logger, LevelWithSilent };

export const SERVICE_NAME = "employee-auth-core";

export const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export const LogLevelSchema = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v): v is LevelWithSilent => LOG_LEVELS.some((l) => l === v), {
    message: `must be one of ${LOG_LEVELS.join(", ")}`,
  });

/** Lenient form of LogLevelSchema for the module logger: unknown levels mean info. */
export function parseLogLevel(value: string | undefined): LevelWithSilent {
  return LogLevelSchema.catch("info").parse(value);
}

export function createLogger(
  level: LevelWithSilent = "info",
  service: string = SERVICE_NAME,
): Logger {
  return pino({
    level,
    base: { service },
    timestamp: pino.stdTimeFunctions.isoTime,
    // never let secrets reach a log line, even when a caller logs a whole input
    redact: {
      remove: true,
      paths: ["password", "token", "accessToken", "authorizationHeader"],
    },
  });
}

export const logger = createLogger(parseLogLevel(process.env.LOG_LEVEL));
