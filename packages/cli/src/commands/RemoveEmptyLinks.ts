import path from "path";
import { z } from "zod";
import {
  fileExists,
  parseWikiLinks,
  replaceWikiLinks,
  resolveLinkedNotePath,
  type WikiLink,
} from "@notes-toolkit/utils";
import { readTextFile, writeTextFile } from "../file-io.js";
import { plural } from "./output.js";
import type { Command } from "./types.js";

const Args = z.object({
  file: z.string().min(1),
});

/**
 * Replace links whose note is missing with their plain text.
 * `isMissing` receives each non-embed link that points at another note.
 */
export function removeEmptyLinks(
  content: string,
  isMissing: (link: WikiLink) => boolean
): { content: string; removed: WikiLink[] } {
  const removed: WikiLink[] = [];

  const result = replaceWikiLinks(content, (link) => {
    if (link.isEmbed || link.path === "" || !isMissing(link)) return undefined;

    removed.push(link);
    return link.alias ?? link.fullTarget;
  });

  return { content: result, removed };
}

/**
 * Link paths in `content` that have no note beside `noteDir`
 */
export async function findMissingLinkPaths(content: string, noteDir: string): Promise<Set<string>> {
  const missing = new Set<string>();
  const checked = new Set<string>();

  for (const link of parseWikiLinks(content)) {
    if (link.isEmbed || link.path === "" || checked.has(link.path)) continue;
    checked.add(link.path);

    if (!(await fileExists(resolveLinkedNotePath(noteDir, link.path)))) {
      missing.add(link.path);
    }
  }

  return missing;
}

/**
 * RemoveEmptyLinks Command
 */
export const RemoveEmptyLinks: Command = {
  definition: {
    name: "remove-empty-links",
    description: "Unlink wiki-links whose note does not exist next to the file",
    group: "Links",
    args: [{ name: "file", description: "Markdown file to process", required: true }],
    options: [],
  },

  async handler(args, { logger }) {
    const { file } = Args.parse(args);

    const noteDir = path.dirname(path.resolve(file));
    const content = await readTextFile(file);
    const missing = await findMissingLinkPaths(content, noteDir);
    const result = removeEmptyLinks(content, (link) => missing.has(link.path));

    if (result.removed.length > 0) {
      await writeTextFile(file, result.content);
      logger.info({ file, removed: result.removed.length }, "Removed links to missing notes");
    }

    const lines = result.removed.map(
      (link) => `${link.raw} -> ${link.alias ?? link.fullTarget} (no ${link.path}.md)`
    );
    lines.push(`Removed ${plural(result.removed.length, "link")} from ${file}`);

    return { text: lines.join("\n"), exitCode: 0 };
  },
};
