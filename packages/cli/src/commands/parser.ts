import { UsageError } from "../errors.js";
import type { Command, CommandDefinition, CommandOption } from "./types.js";

function findOption(definition: CommandDefinition, flag: string): CommandOption | undefined {
  return definition.options.find(
    (option) => option.flag === flag || (option.aliases ?? []).includes(flag)
  );
}

// A leading "-" followed by a digit is a value (e.g. a column order), not a flag
function isFlag(token: string): boolean {
  return token.startsWith("-") && token.length > 1 && !/^-\d/.test(token);
}

/**
 * Parse argv into a record of named arguments for a command.
 * Positional args are matched in order, options by flag or alias.
 * Boolean options default to false.
 */
export function parseCommandArgs(
  argv: string[],
  definition: CommandDefinition
): Record<string, unknown> {
  const args: Record<string, unknown> = {};
  const positionals: string[] = [];

  for (const option of definition.options) {
    if (option.type === "boolean") args[option.name] = false;
  }

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];

    if (token === "--") {
      positionals.push(...argv.slice(i + 1));
      break;
    }

    if (!isFlag(token)) {
      positionals.push(token);
      continue;
    }

    const eq = token.startsWith("--") ? token.indexOf("=") : -1;
    const flag = eq === -1 ? token : token.slice(0, eq);
    const inlineValue = eq === -1 ? undefined : token.slice(eq + 1);

    const option = findOption(definition, flag);
    if (!option) {
      throw new UsageError(`Unknown option: ${flag}`);
    }

    if (option.type === "boolean") {
      if (inlineValue !== undefined) {
        throw new UsageError(`Option ${flag} does not take a value`);
      }
      args[option.name] = true;
      continue;
    }

    const value = inlineValue ?? argv[i + 1];
    if (value === undefined) {
      throw new UsageError(`Option ${flag} requires a value`);
    }
    if (inlineValue === undefined) i++;
    args[option.name] = value;
  }

  if (positionals.length > definition.args.length) {
    throw new UsageError(`Unexpected argument: ${positionals[definition.args.length]}`);
  }

  definition.args.forEach((arg, index) => {
    const value = positionals[index];
    if (value === undefined) {
      if (arg.required) {
        throw new UsageError(`Missing required argument: <${arg.name}>`);
      }
      return;
    }
    args[arg.name] = value;
  });

  return args;
}

function optionLabel(option: CommandOption): string {
  const flags = [...(option.aliases ?? []), option.flag].join(", ");
  return option.type === "string" ? `${flags} <value>` : flags;
}

function formatTwoColumns(rows: Array<[string, string]>): string[] {
  const width = Math.max(...rows.map(([left]) => left.length));
  return rows.map(([left, right]) => `  ${left.padEnd(width)}  ${right}`);
}

/** Format help text for a single command */
export function formatCommandHelp(definition: CommandDefinition, cliName: string): string {
  const usage = [
    `${cliName} ${definition.name}`,
    ...definition.args.map((arg) => (arg.required ? `<${arg.name}>` : `[${arg.name}]`)),
    ...(definition.options.length > 0 ? ["[options]"] : []),
  ].join(" ");

  const lines = [`Usage: ${usage}`, "", definition.description];

  if (definition.args.length > 0) {
    lines.push("", "Arguments:");
    lines.push(
      ...formatTwoColumns(definition.args.map((arg) => [`<${arg.name}>`, arg.description]))
    );
  }

  if (definition.options.length > 0) {
    lines.push("", "Options:");
    lines.push(
      ...formatTwoColumns(
        definition.options.map((option) => [optionLabel(option), option.description])
      )
    );
  }

  return lines.join("\n");
}

/** Format a grouped listing of all commands */
export function formatCommandList(commands: Command[], cliName: string): string {
  const groups = new Map<string, CommandDefinition[]>();
  for (const { definition } of commands) {
    groups.set(definition.group, [...(groups.get(definition.group) ?? []), definition]);
  }

  const lines = [`Usage: ${cliName} <command> [args] [options]`];
  for (const [group, definitions] of groups) {
    lines.push("", `${group}:`);
    lines.push(
      ...formatTwoColumns(definitions.map((definition) => [definition.name, definition.description]))
    );
  }
  lines.push("", `Run '${cliName} <command> --help' for details on a command.`);

  return lines.join("\n");
}
