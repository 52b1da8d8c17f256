import { z } from "zod";
import { readTextFile } from "../file-io.js";
import { convertDates, parseInputFormats, INPUT_FORMATS } from "../dates/date-formats.js";
import { OutputArgs, outputOptions, deliverContent, plural } from "./output.js";
import type { Command } from "./types.js";

const Args = OutputArgs.extend({
  file: z.string().min(1),
  format: z.string().min(1).default("YYYY-MM-DD"),
  input: z.string().optional(),
});

/**
 * ConvertDates Command
 *
 * Normalize the dates written in a note to one format.
 */
export const ConvertDates: Command = {
  definition: {
    name: "convert-dates",
    description: "Convert dates in a Markdown file to a single format",
    group: "Dates",
    args: [{ name: "file", description: "Markdown file to process", required: true }],
    options: [
      {
        name: "format",
        flag: "--format",
        aliases: ["-f"],
        description:
          "Output format: YYYY-MM-DD (default), DD.MM.YYYY, DD.MM, MM-DD, YYYY-MM, MM.DD or a luxon format",
        type: "string",
      },
      {
        name: "input",
        flag: "--input",
        aliases: ["-i"],
        description: `Comma-separated input formats to detect: ${INPUT_FORMATS.join(", ")} or all (default)`,
        type: "string",
      },
      ...outputOptions,
    ],
  },

  async handler(args, { logger }) {
    const { file, format, input, output, dryRun } = Args.parse(args);

    const inputFormats = parseInputFormats(input);
    const content = await readTextFile(file);
    const result = convertDates(content, { outputFormat: format, inputFormats });

    logger.debug({ file, format, inputFormats, converted: result.converted }, "Converted dates");

    return deliverContent(
      result.content,
      { file, output, dryRun },
      logger,
      `Converted ${plural(result.converted, "date")}`
    );
  },
};
