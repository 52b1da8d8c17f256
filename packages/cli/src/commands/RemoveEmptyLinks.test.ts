import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import pino from "pino";
import { RemoveEmptyLinks, removeEmptyLinks, findMissingLinkPaths } from "./RemoveEmptyLinks.js";

const context = { logger: pino({ level: "silent" }) };

describe("removeEmptyLinks", () => {
  it("should replace missing links with their alias or text", () => {
    const result = removeEmptyLinks("[[Kept]], [[Gone|alias]], [[Lost#Part]]", (link) =>
      link.path !== "Kept"
    );

    expect(result.content).toBe("[[Kept]], alias, Lost#Part");
    expect(result.removed.map((link) => link.raw)).toEqual(["[[Gone|alias]]", "[[Lost#Part]]"]);
  });

  it("should never touch embeds or same-note links", () => {
    const content = "![[Picture]] and [[#Heading]]";
    const result = removeEmptyLinks(content, () => true);

    expect(result.content).toBe(content);
    expect(result.removed).toEqual([]);
  });
});

describe("RemoveEmptyLinks", () => {
  let tempDir: string;
  let file: string;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `notes-toolkit-links-${Date.now()}`);
    await fs.mkdir(path.join(tempDir, "people"), { recursive: true });
    await fs.writeFile(path.join(tempDir, "Existing.md"), "", "utf-8");
    await fs.writeFile(path.join(tempDir, "people", "Ann.md"), "", "utf-8");
    file = path.join(tempDir, "note.md");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should find link paths without a note beside the file", async () => {
    const missing = await findMissingLinkPaths(
      "[[Existing]] [[people/Ann]] [[Missing]] [[Missing|again]]",
      tempDir
    );

    expect([...missing]).toEqual(["Missing"]);
  });

  it("should unlink missing notes and report them", async () => {
    await fs.writeFile(
      file,
      "See [[Existing]], [[Missing]], [[Gone|the alias]] and ![[Missing]].\n",
      "utf-8"
    );

    const result = await RemoveEmptyLinks.handler({ file }, context);

    expect(await fs.readFile(file, "utf-8")).toBe(
      "See [[Existing]], Missing, the alias and ![[Missing]].\n"
    );
    expect(result.text).toBe(
      [
        "[[Missing]] -> Missing (no Missing.md)",
        "[[Gone|the alias]] -> the alias (no Gone.md)",
        `Removed 2 links from ${file}`,
      ].join("\n")
    );
  });

  it("should not rewrite a file without dead links", async () => {
    await fs.writeFile(file, "[[Existing]]\n", "utf-8");
    const before = await fs.stat(file);

    const result = await RemoveEmptyLinks.handler({ file }, context);

    expect(result.text).toBe(`Removed 0 links from ${file}`);
    expect((await fs.stat(file)).mtimeMs).toBe(before.mtimeMs);
  });
});
