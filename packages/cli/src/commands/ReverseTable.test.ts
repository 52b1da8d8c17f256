import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import pino from "pino";
import { MalformedTableError } from "../errors.js";
import { ReverseTable } from "./ReverseTable.js";

const context = { logger: pino({ level: "silent" }) };

describe("ReverseTable", () => {
  let tempDir: string;
  let file: string;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `notes-toolkit-reverse-${Date.now()}`);
    await fs.mkdir(tempDir, { recursive: true });
    file = path.join(tempDir, "log.md");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should reverse the data rows and keep the header", async () => {
    await fs.writeFile(file, "| Day |\n| --- |\n| Mon |\n| Tue |\n| Wed |\n", "utf-8");

    const result = await ReverseTable.handler({ file }, context);

    expect(result.text).toBe(`Reversed rows of 1 table (header kept): ${file}`);
    expect(await fs.readFile(file, "utf-8")).toBe("| Day |\n| --- |\n| Wed |\n| Tue |\n| Mon |\n");
  });

  it("should move the header last with includeHeader", async () => {
    await fs.writeFile(file, "| Day |\n| --- |\n| Mon |\n| Tue |\n", "utf-8");

    const result = await ReverseTable.handler({ file, includeHeader: true }, context);

    expect(result.text).toBe(`Reversed rows of 1 table (including header): ${file}`);
    expect(await fs.readFile(file, "utf-8")).toBe("| Tue |\n| --- |\n| Mon |\n| Day |\n");
  });

  it("should reverse every table with all", async () => {
    await fs.writeFile(file, "| A |\n| --- |\n| 1 |\n| 2 |\n\n| B |\n| --- |\n| 3 |\n| 4 |\n", "utf-8");

    const result = await ReverseTable.handler({ file, all: true }, context);

    expect(result.text).toBe(`Reversed rows of 2 tables (header kept): ${file}`);
    expect(await fs.readFile(file, "utf-8")).toBe(
      "| A |\n| --- |\n| 2 |\n| 1 |\n\n| B |\n| --- |\n| 4 |\n| 3 |\n"
    );
  });

  it("should leave a malformed table untouched", async () => {
    const content = "| A | B |\n| --- | --- |\n| 1 | 2 |\n| 3 |\n";
    await fs.writeFile(file, content, "utf-8");

    await expect(ReverseTable.handler({ file }, context)).rejects.toThrow(MalformedTableError);
    expect(await fs.readFile(file, "utf-8")).toBe(content);
  });
});
