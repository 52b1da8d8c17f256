import path from "path";
import { z } from "zod";
import {
  escapeRegExp,
  joinFrontmatter,
  splitFrontmatter,
  splitLinesKeepEnds,
  stripLineEnding,
} from "@notes-toolkit/utils";
import { UsageError } from "../errors.js";
import { listNoteFiles, readTextFile, writeTextFile } from "../file-io.js";
import { plural } from "./output.js";
import type { Command } from "./types.js";

const Args = z.object({
  folder: z.string().min(1),
  tag: z.string().min(1),
});

function removeBodyTag(body: string, tag: string): { body: string; removed: number } {
  // "#daily" must not match the start of "#daily-notes" or "#daily/work"
  const pattern = new RegExp(`(^|\\s)#${escapeRegExp(tag)}(?![\\p{L}\\p{N}_/-])`, "gimu");

  let removed = 0;
  const result = body.replace(pattern, (_match, prefix: string) => {
    removed++;
    return prefix;
  });

  return { body: result, removed };
}

/**
 * Remove a tag from a note: frontmatter list items (with or without "#",
 * optionally quoted) and "#tag" occurrences in the body. Case-insensitive.
 */
export function removeTag(content: string, tag: string): { content: string; removed: number } {
  const bareTag = tag.replace(/^#/, "");
  const block = splitFrontmatter(content);

  if (!block) {
    const { body, removed } = removeBodyTag(content, bareTag);
    return { content: body, removed };
  }

  const itemPattern = new RegExp(`^\\s*-\\s*["']?#?${escapeRegExp(bareTag)}["']?\\s*$`, "i");
  const yamlLines = splitLinesKeepEnds(block.yaml);
  const keptLines = yamlLines.filter((line) => !itemPattern.test(stripLineEnding(line)));

  const { body, removed } = removeBodyTag(block.body, bareTag);

  return {
    content: joinFrontmatter({ ...block, yaml: keptLines.join(""), body }),
    removed: removed + yamlLines.length - keptLines.length,
  };
}

/**
 * RemoveTag Command
 *
 * Strip a tag from every note under a folder.
 */
export const RemoveTag: Command = {
  definition: {
    name: "remove-tag",
    description: "Remove a tag from all Markdown files in a folder",
    group: "Metadata",
    args: [
      { name: "folder", description: "Folder to scan recursively", required: true },
      { name: "tag", description: 'Tag to remove, e.g. "daily" for #daily', required: true },
    ],
    options: [],
  },

  async handler(args, { logger }) {
    const { folder, tag } = Args.parse(args);

    const bareTag = tag.replace(/^#/, "");
    if (bareTag === "") {
      throw new UsageError("Tag must not be empty");
    }

    const files = await listNoteFiles(folder);
    const lines: string[] = [];
    let modified = 0;

    for (const file of files) {
      const content = await readTextFile(file);
      const result = removeTag(content, bareTag);
      if (result.removed === 0) continue;

      await writeTextFile(file, result.content);
      modified++;
      logger.info({ file, removed: result.removed }, "Removed tag");
      lines.push(
        `Removed ${plural(result.removed, "instance")} of #${bareTag} from ${path.relative(folder, file)}`
      );
    }

    lines.push(
      `Looked at ${plural(files.length, "Markdown file")}, removed #${bareTag} from ${plural(modified, "file")}`
    );

    return { text: lines.join("\n"), exitCode: 0 };
  },
};
