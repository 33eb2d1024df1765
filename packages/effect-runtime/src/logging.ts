/**
 * Logging for the store and the CLI.
 *
 * Store code logs through Effect's logger (`Effect.logInfo`, ...); these
 * helpers choose how those lines look and which levels get through.
 */
import { Layer, Logger, LogLevel } from "effect";

// ── Pretty logger ──────────────────────────────────────────────────────────

function render(message: unknown): string {
  if (typeof message === "string") return message;
  if (Array.isArray(message)) return message.map(render).join(" ");
  return JSON.stringify(message);
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  console.error(`[${ts}] ${lvl} ${render(message)}`);
});

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}

/** Replaces the default logger with `prettyLogger` at the given minimum level. */
export const LoggerLive = (level: string): Layer.Layer<never> =>
  Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(parseLogLevel(level)),
  );
