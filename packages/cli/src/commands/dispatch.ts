import { z } from "zod";
import { IOError, MalformedTableError, ToolkitError, UsageError } from "../errors.js";
import { parseCommandArgs, formatCommandHelp, formatCommandList } from "./parser.js";
import type { Command, CommandContext } from "./types.js";

/** Fields worth logging beside the message */
function errorDetails(error: ToolkitError): Record<string, unknown> {
  if (error instanceof IOError) return { path: error.path };
  if (error instanceof MalformedTableError && error.line !== undefined) return { line: error.line };
  return {};
}

/**
 * Dispatch a command: lookup, parse args, execute, print output.
 * Returns the exit code instead of exiting so callers decide when the process ends.
 */
export async function dispatchCommand(
  commands: Command[],
  commandName: string,
  argv: string[],
  context: CommandContext,
  cliName: string
): Promise<number> {
  const command = commands.find((c) => c.definition.name === commandName);
  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.error("");
    console.error(formatCommandList(commands, cliName));
    return 1;
  }

  const help = formatCommandHelp(command.definition, cliName);

  if (argv.includes("--help") || argv.includes("-h")) {
    console.log(help);
    return 0;
  }

  const logger = context.logger.child({ group: commandName });

  try {
    const args = parseCommandArgs(argv, command.definition);
    const output = await command.handler(args, { ...context, logger });

    if (output.text !== undefined) {
      console.log(output.text);
    }
    return output.exitCode;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error(`Error: invalid arguments\n${z.prettifyError(error)}`);
      console.error("");
      console.error(help);
      return 1;
    }

    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error("");
      console.error(help);
      return 1;
    }

    if (error instanceof ToolkitError) {
      logger.debug({ err: error, ...errorDetails(error) }, "Command failed");
      console.error(`Error: ${error.message}`);
      return 1;
    }

    logger.fatal({ err: error }, "Unexpected failure");
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

/**
 * Entry point logic: top-level help, then command dispatch
 */
export async function runCli(
  argv: string[],
  commands: Command[],
  context: CommandContext,
  cliName: string
): Promise<number> {
  if (argv.length === 0 || argv[0] === "--help" || argv[0] === "-h") {
    console.log(formatCommandList(commands, cliName));
    return 0;
  }

  const [commandName, ...rest] = argv;
  return dispatchCommand(commands, commandName, rest, context, cliName);
}
