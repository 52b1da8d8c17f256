import { z } from "zod";
import { UsageError } from "./errors.js";

const LogLevel = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const Config = z.object({
  logLevel: LogLevel.default("warn"),
  logFile: z.string().optional(),
});
export type Config = z.infer<typeof Config>;

/**
 * Read ambient settings from the environment.
 * Commands themselves are configured only through their arguments.
 *
 * - NOTES_TOOLKIT_LOG_LEVEL: pino level (default "warn")
 * - NOTES_TOOLKIT_LOG_FILE: also write logs to this file
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = Config.safeParse({
    logLevel: env.NOTES_TOOLKIT_LOG_LEVEL?.toLowerCase() || undefined,
    logFile: env.NOTES_TOOLKIT_LOG_FILE || undefined,
  });

  if (!result.success) {
    throw new UsageError(`Invalid environment settings:\n${z.prettifyError(result.error)}`);
  }

  return result.data;
}
