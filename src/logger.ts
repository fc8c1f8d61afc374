import pino from "pino";

/**
 * Creates the structured JSON logger shared by every component.
 *
 * - Level labels instead of numbers
 * - ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaulting to `info`
 *
 * @param level - Overrides `LOG_LEVEL` when given
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    base: { name: "release-watch" },
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
