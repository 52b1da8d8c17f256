import { z } from "zod";
import { readTextFile } from "../file-io.js";
import { rewriteTables } from "../table/rewrite.js";
import { reverseRows } from "../table/transforms.js";
import { OutputArgs, outputOptions, deliverContent, plural } from "./output.js";
import type { Command } from "./types.js";

const Args = OutputArgs.extend({
  file: z.string().min(1),
  includeHeader: z.boolean().default(false),
  all: z.boolean().default(false),
});

/**
 * ReverseTable Command
 *
 * Reverse the row order of a Markdown table. The separator row always stays second.
 */
export const ReverseTable: Command = {
  definition: {
    name: "reverse-table",
    description: "Reverse the row order of a Markdown table",
    group: "Tables",
    args: [{ name: "file", description: "Markdown file to process", required: true }],
    options: [
      {
        name: "includeHeader",
        flag: "--include-header",
        aliases: ["--no-header"],
        description: "Reverse the header row together with the data rows",
        type: "boolean",
      },
      {
        name: "all",
        flag: "--all",
        description: "Transform every table in the file, not only the first",
        type: "boolean",
      },
      ...outputOptions,
    ],
  },

  async handler(args, { logger }) {
    const { file, includeHeader, all, output, dryRun } = Args.parse(args);

    const content = await readTextFile(file);
    const result = rewriteTables(content, (table) => reverseRows(table, { includeHeader }), {
      all,
    });

    const how = includeHeader ? "including header" : "header kept";
    return deliverContent(
      result.content,
      { file, output, dryRun },
      logger,
      `Reversed rows of ${plural(result.tableCount, "table")} (${how})`
    );
  },
};
