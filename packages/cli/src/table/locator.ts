import { frontmatterLineCount } from "@notes-toolkit/utils";
import { NotFoundError } from "../errors.js";
import { containsDelimiter, isSeparatorLine } from "./parser.js";
import type { TableBlock } from "./types.js";

const FENCE_OPEN = /^\s*(`{3,}|~{3,})/;

function closesFence(line: string, fence: string): boolean {
  const trimmed = line.trim();
  return trimmed.length >= fence.length && [...trimmed].every((c) => c === fence[0]);
}

/**
 * Find every pipe table in a file's lines, in order.
 *
 * A table starts at a line with a `|` directly followed by a separator row,
 * and runs over the following non-blank lines that contain a `|`.
 * Frontmatter and fenced code blocks are skipped.
 */
export function locateTables(lines: readonly string[]): TableBlock[] {
  const blocks: TableBlock[] = [];
  let fence: string | null = null;
  let i = frontmatterLineCount(lines);

  while (i < lines.length) {
    const line = lines[i];

    if (fence !== null) {
      if (closesFence(line, fence)) fence = null;
      i++;
      continue;
    }

    const fenceMatch = FENCE_OPEN.exec(line);
    if (fenceMatch) {
      fence = fenceMatch[1];
      i++;
      continue;
    }

    if (containsDelimiter(line) && i + 1 < lines.length && isSeparatorLine(lines[i + 1])) {
      let end = i + 2;
      while (
        end < lines.length &&
        lines[end].trim() !== "" &&
        containsDelimiter(lines[end]) &&
        !FENCE_OPEN.test(lines[end])
      ) {
        end++;
      }

      blocks.push({ startLine: i, endLine: end });
      i = end;
      continue;
    }

    i++;
  }

  return blocks;
}

/** The first table in a file's lines */
export function locateTable(lines: readonly string[]): TableBlock {
  const [first] = locateTables(lines);
  if (!first) {
    throw new NotFoundError("No Markdown table found");
  }
  return first;
}
