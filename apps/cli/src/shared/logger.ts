// apps/cli/src/shared/logger.ts
import pino, { type Logger } from "pino";

export type { Logger };

export const DEFAULT_LOG_LEVEL = "warn";

/**
 * JSON logger on stderr. stdout carries command output only.
 */
export function createLogger(options: { level?: string } = {}): Logger {
  return pino(
    {
      name: "gendex",
      level: options.level || DEFAULT_LOG_LEVEL
    },
    pino.destination(2)
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
