import { MalformedTableError } from "../errors.js";
import type { Alignment, Row, Table, TableBlock } from "./types.js";

const SEPARATOR_CELL = /^(:?)-+(:?)$/;

/**
 * Split a table row into trimmed cells on unescaped `|` delimiters.
 *
 * An escaped `\|` stays in the cell as written. The empty cell produced
 * before a leading `|` and after a trailing `|` is dropped.
 */
export function splitRow(line: string): string[] {
  const text = line.trim();
  const cells: string[] = [];
  let current = "";
  let endedOnDelimiter = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (char === "\\" && i + 1 < text.length) {
      current += char + text[i + 1];
      i++;
      endedOnDelimiter = false;
    } else if (char === "|") {
      cells.push(current);
      current = "";
      endedOnDelimiter = true;
    } else {
      current += char;
      endedOnDelimiter = false;
    }
  }
  cells.push(current);

  if (text.startsWith("|")) cells.shift();
  if (endedOnDelimiter && cells.length > 0) cells.pop();

  return cells.map((cell) => cell.trim());
}

/** Whether a line contains a `|` that is not escaped */
export function containsDelimiter(line: string): boolean {
  for (let i = 0; i < line.length; i++) {
    if (line[i] === "\\") {
      i++;
    } else if (line[i] === "|") {
      return true;
    }
  }
  return false;
}

/** Whether a line is a separator row such as `| --- | :-: |` */
export function isSeparatorLine(line: string): boolean {
  const text = line.trim();
  if (!/^[\s|:-]+$/.test(text) || !text.includes("|") || !text.includes("-")) {
    return false;
  }

  const cells = splitRow(text);
  return cells.length > 0 && cells.every((cell) => SEPARATOR_CELL.test(cell));
}

export function parseAlignment(cell: string): Alignment {
  const match = SEPARATOR_CELL.exec(cell);
  if (!match) {
    throw new MalformedTableError(`Invalid separator cell "${cell}"`);
  }

  const left = match[1] === ":";
  const right = match[2] === ":";
  if (left && right) return "center";
  if (left) return "left";
  if (right) return "right";
  return "none";
}

/**
 * Parse the lines of a located table block.
 * Every row must have exactly as many cells as the header.
 */
export function parseTable(lines: readonly string[], block: TableBlock): Table {
  const { startLine, endLine } = block;
  if (endLine - startLine < 2 || endLine > lines.length) {
    throw new MalformedTableError(
      `Table at line ${startLine + 1} needs a header and a separator row`,
      startLine + 1
    );
  }

  const header = splitRow(lines[startLine]);
  const columnCount = header.length;

  const separatorCells = splitRow(lines[startLine + 1]);
  if (separatorCells.length !== columnCount) {
    throw new MalformedTableError(
      `Separator row (line ${startLine + 2}) has ${separatorCells.length} cells, expected ${columnCount}`,
      startLine + 2
    );
  }
  const separator = separatorCells.map(parseAlignment);

  const rows: Row[] = [];
  for (let i = startLine + 2; i < endLine; i++) {
    const cells = splitRow(lines[i]);
    if (cells.length !== columnCount) {
      throw new MalformedTableError(
        `Row ${i - startLine - 1} (line ${i + 1}) has ${cells.length} cells, expected ${columnCount}`,
        i + 1
      );
    }
    rows.push(cells);
  }

  return { header, separator, rows };
}
