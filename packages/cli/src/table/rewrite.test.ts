import { describe, it, expect } from "vitest";
import { MalformedTableError, NotFoundError } from "../errors.js";
import { rewriteTables } from "./rewrite.js";
import { reorderColumns, reverseRows } from "./transforms.js";

describe("rewriteTables()", () => {
  it("should reorder the Name/Age/City table and keep the text around it", () => {
    const text = [
      "# People",
      "",
      "Intro text.",
      "",
      "| Name | Age | City |",
      "|---|---|---|",
      "| Alice | 30 | NYC |",
      "",
      "Outro.",
      "",
    ].join("\n");

    const result = rewriteTables(text, (table) => reorderColumns(table, [2, 0, 1]));

    expect(result.tableCount).toBe(1);
    expect(result.content).toBe(
      [
        "# People",
        "",
        "Intro text.",
        "",
        "| City | Name | Age |",
        "| --- | --- | --- |",
        "| NYC | Alice | 30 |",
        "",
        "Outro.",
        "",
      ].join("\n")
    );
  });

  it("should keep CRLF line endings", () => {
    const text = "a\r\n| x | y |\r\n|---|---|\r\n| 1 | 2 |\r\nz";
    const result = rewriteTables(text, (table) => reorderColumns(table, [1, 0]));

    expect(result.content).toBe("a\r\n| y | x |\r\n| --- | --- |\r\n| 2 | 1 |\r\nz");
  });

  it("should handle a table at the very end without a final newline", () => {
    const text = "| h |\n|:-:|\n| 1 |\n| 2 |";
    const result = rewriteTables(text, (table) => reverseRows(table));

    expect(result.content).toBe("| h |\n| :---: |\n| 2 |\n| 1 |");
  });

  it("should only touch the first table by default", () => {
    const text = "| a |\n|---|\n| 1 |\n| 2 |\n\n| b |\n|---|\n| 3 |\n| 4 |\n";
    const result = rewriteTables(text, (table) => reverseRows(table));

    expect(result.tableCount).toBe(1);
    expect(result.content).toBe(
      "| a |\n| --- |\n| 2 |\n| 1 |\n\n| b |\n|---|\n| 3 |\n| 4 |\n"
    );
  });

  it("should transform every table with all", () => {
    const text = "| a |\n|---|\n| 1 |\n| 2 |\n\n| b |\n|---|\n| 3 |\n| 4 |\n";
    const result = rewriteTables(text, (table) => reverseRows(table), { all: true });

    expect(result.tableCount).toBe(2);
    expect(result.content).toBe(
      "| a |\n| --- |\n| 2 |\n| 1 |\n\n| b |\n| --- |\n| 4 |\n| 3 |\n"
    );
  });

  it("should keep frontmatter untouched", () => {
    const text = "---\ntitle: x\n---\n| a | b |\n|--|--|\n| 1 | 2 |\n";
    const result = rewriteTables(text, (table) => reverseRows(table, { includeHeader: true }));

    expect(result.content).toBe("---\ntitle: x\n---\n| 1 | 2 |\n| --- | --- |\n| a | b |\n");
  });

  it("should reject a malformed table before transforming", () => {
    const text = "| a | b |\n|---|---|\n| 1 | 2 |\n| 3 |\n";
    let calls = 0;

    expect(() =>
      rewriteTables(text, (table) => {
        calls++;
        return table;
      })
    ).toThrow(MalformedTableError);
    expect(calls).toBe(0);
  });

  it("should throw NotFoundError without a table", () => {
    expect(() => rewriteTables("just text\n", (table) => table)).toThrow(NotFoundError);
    expect(() => rewriteTables("just text\n", (table) => table, { all: true })).toThrow(
      NotFoundError
    );
  });

  it("should keep a byte order mark in front of a table on the first line", () => {
    const text = "\uFEFF| a | b |\n| --- | --- |\n| 1 | 2 |\n";
    const result = rewriteTables(text, (table) => reorderColumns(table, [1, 0]));

    expect(result.content).toBe("\uFEFF| b | a |\n| --- | --- |\n| 2 | 1 |\n");
  });
});
