import path from "path";
import { z } from "zod";
import {
  fileExists,
  joinFrontmatter,
  parseWikiLinks,
  replaceWikiLinks,
  resolveLinkedNotePath,
  splitFrontmatter,
} from "@notes-toolkit/utils";
import { readTextFile, writeTextFile } from "../file-io.js";
import { plural } from "./output.js";
import type { Command } from "./types.js";

const Args = z.object({
  file: z.string().min(1),
});

const FENCE = "```";

function codeBlockHtml(language: string, lines: string[]): string {
  const languageClass = language ? ` class="language-${language}"` : "";
  // &#10; keeps the block on one line so it fits a table cell
  return `<pre><code${languageClass}>${lines.join("&#10;")}</code></pre>`;
}

/**
 * Turn note text into a single line: newlines become <br> and fenced code
 * blocks become <pre><code> elements.
 */
export function toSingleLineHtml(text: string): string {
  const parts: string[] = [];
  let code: { language: string; lines: string[] } | null = null;

  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (trimmed.startsWith(FENCE)) {
      if (code) {
        parts.push(codeBlockHtml(code.language, code.lines));
        code = null;
      } else {
        code = { language: trimmed.slice(FENCE.length).trim(), lines: [] };
      }
    } else if (code) {
      code.lines.push(line);
    } else {
      parts.push(line);
    }
  }

  // Unclosed fence: keep its lines as code
  if (code) {
    parts.push(codeBlockHtml(code.language, code.lines));
  }

  return parts.join("<br>");
}

/**
 * The part of a note that gets inlined: everything after the frontmatter, trimmed
 */
export function noteBody(content: string): string {
  const block = splitFrontmatter(content);
  return (block ? block.body : content).trim();
}

/**
 * Replace wiki-links (embeds too) with the single-line body of the linked note.
 * `notes` maps a link path to that note's content; links to other paths stay.
 * The host note's frontmatter is left alone.
 */
export function inlineLinks(
  content: string,
  notes: ReadonlyMap<string, string>
): { content: string; inlined: number } {
  const block = splitFrontmatter(content);
  const body = block ? block.body : content;

  let inlined = 0;
  const newBody = replaceWikiLinks(body, (link) => {
    const note = link.path === "" ? undefined : notes.get(link.path);
    if (note === undefined) return undefined;

    inlined++;
    return toSingleLineHtml(noteBody(note));
  });

  return {
    content: block ? joinFrontmatter({ ...block, body: newBody }) : newBody,
    inlined,
  };
}

/**
 * Read every note linked from `content` that exists beside `noteDir`, keyed by link path
 */
export async function loadLinkedNotes(
  content: string,
  noteDir: string
): Promise<Map<string, string>> {
  const notes = new Map<string, string>();

  for (const link of parseWikiLinks(content)) {
    if (link.path === "" || notes.has(link.path)) continue;

    const notePath = resolveLinkedNotePath(noteDir, link.path);
    if (await fileExists(notePath)) {
      notes.set(link.path, await readTextFile(notePath));
    }
  }

  return notes;
}

/**
 * InlineLinks Command
 */
export const InlineLinks: Command = {
  definition: {
    name: "inline-links",
    description: "Replace wiki-links with the content of the linked notes",
    group: "Links",
    args: [{ name: "file", description: "Markdown file to process", required: true }],
    options: [],
  },

  async handler(args, { logger }) {
    const { file } = Args.parse(args);

    const content = await readTextFile(file);
    const notes = await loadLinkedNotes(content, path.dirname(path.resolve(file)));
    const result = inlineLinks(content, notes);

    if (result.inlined > 0) {
      await writeTextFile(file, result.content);
      logger.info({ file, inlined: result.inlined }, "Inlined linked notes");
    }

    return { text: `Inlined ${plural(result.inlined, "link")} in ${file}`, exitCode: 0 };
  },
};
