// Structured logging (pino). Components receive a Logger and derive scoped children from it.
import { pino, type Logger, type DestinationStream } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: string;
  /** Write somewhere other than stdout (tests pass a capture stream) */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? (process.env.DEBUG ? "debug" : process.env.LOG_LEVEL ?? "info");
  const base = { name: "gateway" };
  return options.destination
    ? pino({ level, base }, options.destination)
    : pino({ level, base });
}

/** A logger that discards everything */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
