/**
 * Type definitions for notes-toolkit commands
 */

import type { Logger } from "../utils/logger.js";

/**
 * Context passed to all command handlers
 */
export interface CommandContext {
  logger: Logger;
}

export interface CommandArg {
  name: string;
  description: string;
  required: boolean;
}

export interface CommandOption {
  /** Key the value is stored under in the parsed args */
  name: string;
  flag: string;
  /** Other spellings of the flag, such as "-o" */
  aliases?: string[];
  description: string;
  type: "string" | "boolean";
}

export interface CommandDefinition {
  name: string;
  description: string;
  group: string;
  args: CommandArg[];
  options: CommandOption[];
}

/**
 * Command result: text for stdout and the process exit code
 */
export interface CommandResult {
  text?: string;
  exitCode: number;
}

/**
 * A command: its definition and the handler that runs it.
 * Args are parsed from argv by the dispatcher and validated by each handler's zod schema.
 */
export interface Command {
  definition: CommandDefinition;
  handler: (args: unknown, context: CommandContext) => Promise<CommandResult>;
}
