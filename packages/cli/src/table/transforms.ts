import { InvalidPermutationError } from "../errors.js";
import type { ColumnOrder, Row, Table } from "./types.js";

/**
 * Parse a column order such as "2,0,1" or "2 0 1" (0-based indices)
 */
export function parseColumnOrder(text: string): ColumnOrder {
  const parts = text.split(/[\s,]+/).filter((part) => part !== "");
  if (parts.length === 0) {
    throw new InvalidPermutationError("Column order is empty");
  }

  return parts.map((part) => {
    if (!/^\d+$/.test(part)) {
      throw new InvalidPermutationError(
        `Invalid column index "${part}" in order "${text}"`
      );
    }
    return Number(part);
  });
}

/**
 * Check that an order is a permutation of [0, columnCount)
 */
export function validateColumnOrder(order: ColumnOrder, columnCount: number): void {
  if (order.length !== columnCount) {
    throw new InvalidPermutationError(
      `Column order has ${order.length} entries, but the table has ${columnCount} columns`
    );
  }

  const seen = new Set<number>();
  for (const index of order) {
    if (!Number.isInteger(index) || index < 0 || index >= columnCount) {
      throw new InvalidPermutationError(
        `Column index ${index} is out of range 0..${columnCount - 1}`
      );
    }
    if (seen.has(index)) {
      throw new InvalidPermutationError(`Column index ${index} appears more than once`);
    }
    seen.add(index);
  }
}

function permute<T>(cells: readonly T[], order: ColumnOrder): T[] {
  return order.map((index) => cells[index]);
}

/**
 * Rearrange the columns of a table: output column i is input column order[i].
 * The input table is not modified.
 */
export function reorderColumns(table: Table, order: ColumnOrder): Table {
  validateColumnOrder(order, table.header.length);

  return {
    header: permute(table.header, order),
    separator: permute(table.separator, order),
    rows: table.rows.map((row) => permute(row, order)),
  };
}

export interface ReverseOptions {
  /** Reverse the header together with the data rows */
  includeHeader?: boolean;
}

/**
 * Reverse the row order of a table. The separator never moves.
 * With includeHeader, the first row of the reversed sequence becomes the header.
 */
export function reverseRows(table: Table, options: ReverseOptions = {}): Table {
  const { includeHeader = false } = options;

  if (!includeHeader) {
    return {
      header: table.header,
      separator: table.separator,
      rows: [...table.rows].reverse(),
    };
  }

  const [header, ...rows]: Row[] = [table.header, ...table.rows].reverse();
  return { header, separator: table.separator, rows };
}
