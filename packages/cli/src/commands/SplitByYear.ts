import path from "path";
import { DateTime } from "luxon";
import { z } from "zod";
import { detectLineEnding, splitFrontmatter } from "@notes-toolkit/utils";
import { NotFoundError } from "../errors.js";
import { readTextFile, writeTextFile } from "../file-io.js";
import { locateTable } from "../table/locator.js";
import { parseTable } from "../table/parser.js";
import { renderTable } from "../table/renderer.js";
import type { Row } from "../table/types.js";
import { plural } from "./output.js";
import type { Command } from "./types.js";

const Args = z.object({
  file: z.string().min(1),
  column: z.string().min(1).default("date"),
});

/** One output file's worth of rows */
export interface YearPart {
  /** null for rows whose date could not be read */
  year: number | null;
  rowCount: number;
  content: string;
}

/**
 * Year of a date cell such as "November 29, 2024" or "2024-11-29".
 * For a range ("A → B") only the start counts.
 */
export function yearOfDate(cell: string): number | null {
  const start = cell.split("→")[0].trim();
  if (start === "") return null;

  let date = DateTime.fromFormat(start.replace(/\s+/g, " "), "MMMM d, yyyy", { locale: "en-US" });
  if (!date.isValid) {
    date = DateTime.fromISO(start);
  }

  return date.isValid ? date.year : null;
}

/**
 * Index of the date column: a 0-based index, or a header name matched case-insensitively
 */
export function findDateColumn(header: Row, column: string): number {
  if (/^\d+$/.test(column)) {
    const index = Number(column);
    if (index >= header.length) {
      throw new NotFoundError(
        `Column index ${index} is out of range 0..${header.length - 1}`
      );
    }
    return index;
  }

  const wanted = column.toLowerCase();
  const index = header.findIndex((cell) => cell.toLowerCase() === wanted);
  if (index === -1) {
    throw new NotFoundError(`No "${column}" column in the table header`);
  }
  return index;
}

/**
 * Split the first table of a note into one table per year.
 * Each part repeats the note's frontmatter; years come in ascending order,
 * rows without a readable date last.
 */
export function splitTableByYear(content: string, column = "date"): YearPart[] {
  const lines = content.split("\n");
  const table = parseTable(lines, locateTable(lines));
  const dateColumn = findDateColumn(table.header, column);

  const byYear = new Map<number, Row[]>();
  const unknown: Row[] = [];

  for (const row of table.rows) {
    const year = yearOfDate(row[dateColumn]);
    if (year === null) {
      unknown.push(row);
    } else {
      byYear.set(year, [...(byYear.get(year) ?? []), row]);
    }
  }

  const eol = detectLineEnding(content);
  const frontmatter = splitFrontmatter(content);
  const prefix = frontmatter ? frontmatter.open + frontmatter.yaml + frontmatter.close + eol : "";

  const render = (rows: Row[]): string =>
    prefix + renderTable({ ...table, rows }).join(eol) + eol;

  const parts: YearPart[] = [...byYear.keys()]
    .sort((a, b) => a - b)
    .map((year) => {
      const rows = byYear.get(year) ?? [];
      return { year, rowCount: rows.length, content: render(rows) };
    });

  if (unknown.length > 0) {
    parts.push({ year: null, rowCount: unknown.length, content: render(unknown) });
  }

  return parts;
}

export function partFileName(stem: string, year: number | null): string {
  return year === null ? `${stem}_unknown_dates.md` : `${stem}_${year}.md`;
}

/**
 * SplitByYear Command
 */
export const SplitByYear: Command = {
  definition: {
    name: "split-by-year",
    description: "Split a Markdown table into one file per year of its date column",
    group: "Tables",
    args: [{ name: "file", description: "Markdown file with a table", required: true }],
    options: [
      {
        name: "column",
        flag: "--column",
        aliases: ["-c"],
        description: 'Date column name or 0-based index (default "date")',
        type: "string",
      },
    ],
  },

  async handler(args, { logger }) {
    const { file, column } = Args.parse(args);

    const parts = splitTableByYear(await readTextFile(file), column);
    const dir = path.dirname(file);
    const stem = path.basename(file, path.extname(file));
    const lines: string[] = [];

    for (const part of parts) {
      const target = path.join(dir, partFileName(stem, part.year));
      await writeTextFile(target, part.content);
      logger.info({ file: target, rows: part.rowCount }, "Wrote year file");
      lines.push(`Created ${target} (${plural(part.rowCount, "row")})`);
    }

    const years = parts.filter((part) => part.year !== null).length;
    lines.push(`Total years: ${years}`);
    const unknownPart = parts.find((part) => part.year === null);
    if (unknownPart) {
      lines.push(`Rows with unknown dates: ${unknownPart.rowCount}`);
    }

    return { text: lines.join("\n"), exitCode: 0 };
  },
};
