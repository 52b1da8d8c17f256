import type { Alignment, Row, Table } from "./types.js";

const ALIGNMENT_MARKERS: Record<Alignment, string> = {
  none: "---",
  left: ":---",
  right: "---:",
  center: ":---:",
};

export function renderRow(cells: Row): string {
  return `| ${cells.join(" | ")} |`;
}

export function renderSeparator(separator: readonly Alignment[]): string {
  return renderRow(separator.map((alignment) => ALIGNMENT_MARKERS[alignment]));
}

/** Render a table as Markdown lines, without line endings */
export function renderTable(table: Table): string[] {
  return [
    renderRow(table.header),
    renderSeparator(table.separator),
    ...table.rows.map(renderRow),
  ];
}
