/**
 * Diagnostic logging for the client.
 *
 * Request URLs, bodies and decode results are logged at `debug`. The logger is passed to each
 * session through its config; when none is given a disabled one is created.
 */

import pino, { type DestinationStream, type Level, type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerConfig {
  /** Write diagnostics at all. Defaults to false. */
  enabled?: boolean;
  /** Level used while enabled */
  level?: Level;
  /** Defaults to stderr */
  destination?: DestinationStream;
}

const DEFAULT_LEVEL: Level = "debug";

export function createLogger(config: LoggerConfig = {}): Logger {
  const level = config.enabled ? config.level ?? DEFAULT_LEVEL : "silent";
  const destination = config.destination ?? pino.destination({ dest: 2, sync: true });
  return pino(
    {
      name: "toggl",
      level,
      base: { service: "toggl-track-client" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}

/**
 * Turns diagnostics on or off for `logger`. Safe to call while requests are in flight.
 */
export function setLoggingEnabled(logger: Logger, enabled: boolean, level: Level = DEFAULT_LEVEL): void {
  logger.level = enabled ? level : "silent";
}
