import { z } from "zod";
import { readTextFile } from "../file-io.js";
import { rewriteTables } from "../table/rewrite.js";
import { parseColumnOrder, reorderColumns } from "../table/transforms.js";
import { OutputArgs, outputOptions, deliverContent, plural } from "./output.js";
import type { Command } from "./types.js";

const Args = OutputArgs.extend({
  file: z.string().min(1),
  order: z.string(),
  all: z.boolean().default(false),
});

/**
 * ReorderColumns Command
 *
 * Rearrange the columns of a Markdown table, e.g. "2,0,1" moves the third
 * column to the front.
 */
export const ReorderColumns: Command = {
  definition: {
    name: "reorder-columns",
    description: "Reorder the columns of a Markdown table",
    group: "Tables",
    args: [
      { name: "file", description: "Markdown file to process", required: true },
      {
        name: "order",
        description: 'New column order as 0-based indices, e.g. "2,0,1" or "1 0 2"',
        required: true,
      },
    ],
    options: [
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
    const { file, order, all, output, dryRun } = Args.parse(args);

    const columnOrder = parseColumnOrder(order);
    const content = await readTextFile(file);
    const result = rewriteTables(content, (table) => reorderColumns(table, columnOrder), {
      all,
    });

    return deliverContent(
      result.content,
      { file, output, dryRun },
      logger,
      `Reordered columns of ${plural(result.tableCount, "table")}`
    );
  },
};
