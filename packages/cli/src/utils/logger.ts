import pino from "pino";
import type { Config } from "../config.js";

export type Logger = pino.Logger;

/**
 * Pino logger writing to stderr, and to a log file when one is configured.
 * The file destination is synchronous so nothing is lost when the process exits.
 */
export function createLogger(config: Config): Logger {
  const streams: pino.StreamEntry[] = [{ level: "trace", stream: process.stderr }];

  if (config.logFile) {
    streams.push({
      level: "trace",
      stream: pino.destination({ dest: config.logFile, sync: true, mkdir: true }),
    });
  }

  return pino(
    {
      level: config.logLevel,
      timestamp: () => `,"time":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
    },
    pino.multistream(streams)
  );
}
