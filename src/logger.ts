import pino from "pino";
import type { Logger } from "pino";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function resolveLevel(): string {
  const raw = process.env.LOG_LEVEL?.trim().toLowerCase();
  return raw && LEVELS.includes(raw) ? raw : "warn";
}

/**
 * Diagnostics go to stderr so that stdout stays reserved for the report.
 */
function createLogger(): Logger {
  return pino(
    {
      level: resolveLevel(),
      base: {
        service: "docstyle",
      },
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

export const logger = createLogger();

export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
