import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import pino from "pino";
import { InvalidPermutationError, NotFoundError } from "../errors.js";
import { ReorderColumns } from "./ReorderColumns.js";

const context = { logger: pino({ level: "silent" }) };

const note = [
  "# Trips",
  "",
  "| Name | Age | City |",
  "| --- | :---: | ---: |",
  "| Ann | 30 | Oslo |",
  "| Bo | 25 | Rome |",
  "",
  "End",
  "",
].join("\n");

const reordered = [
  "# Trips",
  "",
  "| City | Name | Age |",
  "| ---: | --- | :---: |",
  "| Oslo | Ann | 30 |",
  "| Rome | Bo | 25 |",
  "",
  "End",
  "",
].join("\n");

describe("ReorderColumns", () => {
  let tempDir: string;
  let file: string;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `notes-toolkit-reorder-${Date.now()}`);
    await fs.mkdir(tempDir, { recursive: true });
    file = path.join(tempDir, "trips.md");
    await fs.writeFile(file, note, "utf-8");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should rewrite the file in place", async () => {
    const result = await ReorderColumns.handler({ file, order: "2,0,1" }, context);

    expect(result).toEqual({ text: `Reordered columns of 1 table: ${file}`, exitCode: 0 });
    expect(await fs.readFile(file, "utf-8")).toBe(reordered);
  });

  it("should accept a space-separated order", async () => {
    await ReorderColumns.handler({ file, order: "2 0 1" }, context);

    expect(await fs.readFile(file, "utf-8")).toBe(reordered);
  });

  it("should print the result for a dry run and leave the file alone", async () => {
    const result = await ReorderColumns.handler({ file, order: "2,0,1", dryRun: true }, context);

    expect(result).toEqual({ text: reordered, exitCode: 0 });
    expect(await fs.readFile(file, "utf-8")).toBe(note);
  });

  it("should write to the output file when one is given", async () => {
    const output = path.join(tempDir, "out.md");
    await ReorderColumns.handler({ file, order: "2,0,1", output }, context);

    expect(await fs.readFile(output, "utf-8")).toBe(reordered);
    expect(await fs.readFile(file, "utf-8")).toBe(note);
  });

  it("should reject an order that is not a permutation", async () => {
    await expect(ReorderColumns.handler({ file, order: "0,0,1" }, context)).rejects.toThrow(
      InvalidPermutationError
    );
    expect(await fs.readFile(file, "utf-8")).toBe(note);
  });

  it("should report a file without a table", async () => {
    await fs.writeFile(file, "Just prose.\n", "utf-8");

    await expect(ReorderColumns.handler({ file, order: "0" }, context)).rejects.toThrow(
      NotFoundError
    );
  });
});
