import path from "path";
import matter from "gray-matter";
import { z } from "zod";
import { splitFrontmatter } from "@notes-toolkit/utils";
import { listNoteFiles, readTextFile } from "../file-io.js";
import { plural } from "./output.js";
import type { Command } from "./types.js";

const Args = z.object({
  folder: z.string().min(1),
});

export interface FrontmatterIssue {
  kind: "missing" | "invalid";
  message: string;
}

/**
 * Check that a note starts with a frontmatter block holding valid YAML.
 * Returns null when the frontmatter is fine.
 */
export function checkFrontmatter(content: string): FrontmatterIssue | null {
  if (!splitFrontmatter(content)) {
    return { kind: "missing", message: "no frontmatter" };
  }

  try {
    // Options bypass gray-matter's per-content cache, which would keep a failed parse
    matter(content, {});
    return null;
  } catch (error) {
    const reason = error instanceof Error ? error.message.split("\n")[0] : String(error);
    return { kind: "invalid", message: `invalid YAML: ${reason}` };
  }
}

/**
 * CheckFrontmatter Command
 *
 * Lists notes without frontmatter or with frontmatter that does not parse.
 * Exits with 1 when any note is listed.
 */
export const CheckFrontmatter: Command = {
  definition: {
    name: "check-frontmatter",
    description: "Report Markdown files with missing or invalid frontmatter",
    group: "Metadata",
    args: [{ name: "folder", description: "Folder to scan recursively", required: true }],
    options: [],
  },

  async handler(args, { logger }) {
    const { folder } = Args.parse(args);

    const files = await listNoteFiles(folder);
    const problems: string[] = [];

    for (const file of files) {
      const issue = checkFrontmatter(await readTextFile(file));
      if (!issue) continue;

      logger.debug({ file, kind: issue.kind }, "Frontmatter problem");
      problems.push(`- ${path.relative(folder, file)}: ${issue.message}`);
    }

    const lines = [
      `Looked at ${plural(files.length, "Markdown file")}: ${files.length - problems.length} OK, ${problems.length} with problems`,
    ];
    if (problems.length > 0) {
      lines.push("", ...problems);
    }

    return { text: lines.join("\n"), exitCode: problems.length > 0 ? 1 : 0 };
  },
};
