import pino from "pino";
import type { Logger, LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Defaults to stdout; tests pass an in-memory stream. */
  destination?: pino.DestinationStream;
}

export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino(
    {
      level: options.level ?? "info",
      base: { service: "html-book-translator" },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.destination,
  );

/** Logger for tests and library callers that don't want output. */
export const silentLogger = (): Logger => pino({ level: "silent" });
