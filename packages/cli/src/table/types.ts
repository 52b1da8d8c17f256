/**
 * Markdown pipe table model
 */

/** One row of cells, in column order. Cells are stored trimmed. */
export type Row = readonly string[];

/** Column alignment, as written in the separator row */
export type Alignment = "none" | "left" | "right" | "center";

export interface Table {
  header: Row;
  /** One alignment per column; rendered as the second line */
  separator: readonly Alignment[];
  rows: readonly Row[];
}

/** Output column i takes input column order[i] */
export type ColumnOrder = readonly number[];

/** Zero-based line range of a table within a file; endLine is exclusive */
export interface TableBlock {
  startLine: number;
  endLine: number;
}
