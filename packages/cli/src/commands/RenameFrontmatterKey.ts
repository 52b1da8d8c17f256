import path from "path";
import { z } from "zod";
import { escapeRegExp, joinFrontmatter, splitFrontmatter } from "@notes-toolkit/utils";
import { listNoteFiles, readTextFile, writeTextFile } from "../file-io.js";
import { plural } from "./output.js";
import type { Command } from "./types.js";

const Key = z
  .string()
  .min(1)
  .regex(/^[^:\s]+$/, "must not contain whitespace or ':'");

const Args = z.object({
  folder: z.string().min(1),
  oldKey: Key,
  newKey: Key,
});

/**
 * Rename a frontmatter key at any indentation. Values and layout stay as they are.
 */
export function renameFrontmatterKey(
  content: string,
  oldKey: string,
  newKey: string
): { content: string; renamed: number } {
  const block = splitFrontmatter(content);
  if (!block) return { content, renamed: 0 };

  const pattern = new RegExp(`^([ \\t]*)${escapeRegExp(oldKey)}:`, "gm");

  let renamed = 0;
  const yaml = block.yaml.replace(pattern, (_match, indent: string) => {
    renamed++;
    return `${indent}${newKey}:`;
  });

  return renamed === 0 ? { content, renamed } : { content: joinFrontmatter({ ...block, yaml }), renamed };
}

/**
 * RenameFrontmatterKey Command
 */
export const RenameFrontmatterKey: Command = {
  definition: {
    name: "rename-frontmatter-key",
    description: "Rename a frontmatter key in all Markdown files in a folder",
    group: "Metadata",
    args: [
      { name: "folder", description: "Folder to scan recursively", required: true },
      { name: "oldKey", description: "Key to rename", required: true },
      { name: "newKey", description: "New key name", required: true },
    ],
    options: [],
  },

  async handler(args, { logger }) {
    const { folder, oldKey, newKey } = Args.parse(args);

    const files = await listNoteFiles(folder);
    const lines: string[] = [];

    for (const file of files) {
      const content = await readTextFile(file);
      const result = renameFrontmatterKey(content, oldKey, newKey);
      if (result.renamed === 0) continue;

      await writeTextFile(file, result.content);
      logger.info({ file, oldKey, newKey }, "Renamed frontmatter key");
      lines.push(`- ${path.relative(folder, file)}`);
    }

    lines.push(`Renamed "${oldKey}" to "${newKey}" in ${plural(lines.length, "file")}`);

    return { text: lines.join("\n"), exitCode: 0 };
  },
};
