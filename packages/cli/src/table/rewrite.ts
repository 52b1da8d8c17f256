import { detectLineEnding } from "@notes-toolkit/utils";
import { NotFoundError } from "../errors.js";
import { locateTables } from "./locator.js";
import { parseTable } from "./parser.js";
import { renderTable } from "./renderer.js";
import type { Table, TableBlock } from "./types.js";

const BOM = "\uFEFF";

export interface RewriteOptions {
  /** Transform every table instead of only the first */
  all?: boolean;
}

export interface RewriteResult {
  content: string;
  tableCount: number;
}

/**
 * Replace tables in a text with transformed versions.
 *
 * Every targeted table is parsed and transformed before any text is built,
 * so a malformed table or a rejected transform leaves nothing half-done.
 * Text outside the table blocks is kept exactly.
 */
export function rewriteTables(
  text: string,
  transform: (table: Table) => Table,
  options: RewriteOptions = {}
): RewriteResult {
  const lines = text.split("\n");
  const found = locateTables(lines);
  if (found.length === 0) {
    throw new NotFoundError("No Markdown table found");
  }
  const blocks = options.all ? found : found.slice(0, 1);

  const rendered = blocks.map((block) =>
    renderTable(transform(parseTable(lines, block)))
  );

  const eol = detectLineEnding(text);
  const offsets = lineOffsets(lines);

  let content = "";
  let cursor = 0;
  blocks.forEach((block, i) => {
    const { start, end } = blockSpan(lines, offsets, block);
    content += text.slice(cursor, start) + rendered[i].join(eol);
    cursor = end;
  });
  content += text.slice(cursor);

  return { content, tableCount: blocks.length };
}

function lineOffsets(lines: readonly string[]): number[] {
  const offsets: number[] = [];
  let offset = 0;
  for (const line of lines) {
    offsets.push(offset);
    offset += line.length + 1;
  }
  return offsets;
}

/** Character span of a block, excluding the last line's ending */
function blockSpan(
  lines: readonly string[],
  offsets: readonly number[],
  block: TableBlock
): { start: number; end: number } {
  const last = lines[block.endLine - 1];
  const lastLength = last.endsWith("\r") ? last.length - 1 : last.length;
  // A byte order mark before a table on the first line stays in front of it
  const bom = block.startLine === 0 && lines[0].startsWith(BOM) ? BOM.length : 0;
  return {
    start: offsets[block.startLine] + bom,
    end: offsets[block.endLine - 1] + lastLength,
  };
}
