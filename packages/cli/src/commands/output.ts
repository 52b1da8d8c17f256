import { z } from "zod";
import { writeTextFile } from "../file-io.js";
import type { Logger } from "../utils/logger.js";
import type { CommandOption, CommandResult } from "./types.js";

/** Args shared by commands that rewrite one file */
export const OutputArgs = z.object({
  output: z.string().min(1).optional(),
  dryRun: z.boolean().default(false),
});

export const outputOptions: CommandOption[] = [
  {
    name: "output",
    flag: "--output",
    aliases: ["-o"],
    description: "Write the result to this file instead of the input",
    type: "string",
  },
  {
    name: "dryRun",
    flag: "--dry-run",
    aliases: ["-n"],
    description: "Print the result without writing anything",
    type: "boolean",
  },
];

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/**
 * Deliver a fully computed result: print it for a dry run, otherwise write it
 * to the output file or back over the input file.
 */
export async function deliverContent(
  content: string,
  target: { file: string; output?: string; dryRun: boolean },
  logger: Logger,
  summary: string
): Promise<CommandResult> {
  if (target.dryRun) {
    return { text: content, exitCode: 0 };
  }

  const destination = target.output ?? target.file;
  await writeTextFile(destination, content);
  logger.info({ file: destination }, summary);

  return { text: `${summary}: ${destination}`, exitCode: 0 };
}
