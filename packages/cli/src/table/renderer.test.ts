import { describe, it, expect } from "vitest";
import { parseTable } from "./parser.js";
import { renderRow, renderSeparator, renderTable } from "./renderer.js";
import type { Table } from "./types.js";

describe("renderRow()", () => {
  it("should pad cells with single spaces", () => {
    expect(renderRow(["a", "b"])).toBe("| a | b |");
  });

  it("should render empty cells", () => {
    expect(renderRow(["a", "", "c"])).toBe("| a |  | c |");
  });
});

describe("renderSeparator()", () => {
  it("should write one marker per column", () => {
    expect(renderSeparator(["none", "left", "right", "center"])).toBe(
      "| --- | :--- | ---: | :---: |"
    );
  });
});

describe("renderTable()", () => {
  it("should render the separator second", () => {
    const table: Table = {
      header: ["Name", "Age"],
      separator: ["none", "right"],
      rows: [["Ann", "30"]],
    };

    expect(renderTable(table)).toEqual(["| Name | Age |", "| --- | ---: |", "| Ann | 30 |"]);
  });

  it("should give the same text after parsing its own output", () => {
    const table: Table = {
      header: ["Link", "Note", ""],
      separator: ["center", "none", "left"],
      rows: [
        ["[[Page\\|Alias]]", "", "x"],
        ["a \\| b", "two words", "3"],
      ],
    };

    const rendered = renderTable(table);
    const reparsed = parseTable(rendered, { startLine: 0, endLine: rendered.length });

    expect(reparsed).toEqual(table);
    expect(renderTable(reparsed)).toEqual(rendered);
  });
});
