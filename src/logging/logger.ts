import pino from "pino";

const LOG_LEVEL = process.env["LOG_LEVEL"] ?? "info";

// stdout belongs to CLI output; logs go to stderr.
export const rootLogger = pino(
  {
    level: LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label: string) {
        return { level: label };
      }
    },
    redact: {
      paths: ["apiKey", "googleApiKey", "settings.googleApiKey"],
      censor: "[REDACTED]"
    }
  },
  pino.destination(2)
);

export type Logger = pino.Logger;

export function createLogger(module: string, extra?: Record<string, unknown>): Logger {
  return rootLogger.child({ module, ...extra });
}
