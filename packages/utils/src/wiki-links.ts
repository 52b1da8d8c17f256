/**
 * Wiki link parser for Obsidian-style links
 *
 * Supports:
 * - Basic links: [[Note]]
 * - Aliases: [[Note|Alias]], and [[Note\|Alias]] as written inside tables
 * - Headers: [[Note#Header]]
 * - Blocks: [[Note#^block-id]]
 * - Same-note references: [[#Header]]
 * - Embeds: ![[Note]]
 */

export interface WikiLink {
  /** The target note name (without .md extension or folders) */
  target: string;
  /** The target note path as written (folders kept, without .md extension) */
  path: string;
  /** The full target including headers/blocks */
  fullTarget: string;
  /** Optional display alias */
  alias?: string;
  /** Whether this is an embed (![[...]]) */
  isEmbed: boolean;
  /** Header reference if present */
  header?: string;
  /** Block ID if present */
  blockId?: string;
  /** The link exactly as it appears in the content */
  raw: string;
  /** Offset of the first character of `raw` in the content */
  index: number;
}

/**
 * Parse all wiki links from note content, in document order
 */
export function parseWikiLinks(content: string): WikiLink[] {
  const links: WikiLink[] = [];

  const embedRegex = /!\[\[([^\]]+?)(?:\|([^\]]+?))?\]\]/g;
  const linkRegex = /(?<!!)\[\[([^\]]+?)(?:\|([^\]]+?))?\]\]/g;

  let match;
  while ((match = embedRegex.exec(content)) !== null) {
    links.push(toWikiLink(match, true));
  }

  while ((match = linkRegex.exec(content)) !== null) {
    links.push(toWikiLink(match, false));
  }

  return links.sort((a, b) => a.index - b.index);
}

function toWikiLink(match: RegExpExecArray, isEmbed: boolean): WikiLink {
  // A table cell escapes the alias pipe as "\|", which leaves the backslash on the target
  const fullTarget = match[1].replace(/\\$/, "");
  const alias = match[2];

  return {
    ...parseLinkTarget(fullTarget),
    fullTarget,
    alias,
    isEmbed,
    raw: match[0],
    index: match.index,
  };
}

/**
 * Parse link target to extract note, header, and block references
 */
function parseLinkTarget(
  fullTarget: string
): Pick<WikiLink, "target" | "path" | "header" | "blockId"> {
  // Same-note reference: [[#Header]] or [[#^block-id]]
  const sameNoteMatch = fullTarget.match(/^#(\^?)(.+)$/);
  if (sameNoteMatch) {
    return sameNoteMatch[1]
      ? { target: "", path: "", blockId: sameNoteMatch[2] }
      : { target: "", path: "", header: sameNoteMatch[2] };
  }

  // Check for block reference: [[Note#^block-id]]
  const blockMatch = fullTarget.match(/^([^#]+?)#\^(.+)$/);
  if (blockMatch) {
    return {
      target: cleanNoteName(blockMatch[1]),
      path: cleanNotePath(blockMatch[1]),
      blockId: blockMatch[2],
    };
  }

  // Check for header reference: [[Note#Header]]
  const headerMatch = fullTarget.match(/^([^#]+?)#(.+)$/);
  if (headerMatch) {
    return {
      target: cleanNoteName(headerMatch[1]),
      path: cleanNotePath(headerMatch[1]),
      header: headerMatch[2],
    };
  }

  return {
    target: cleanNoteName(fullTarget),
    path: cleanNotePath(fullTarget),
  };
}

function cleanNotePath(notePath: string): string {
  return notePath.trim().replace(/\.md$/, "");
}

/**
 * Clean note name (drop the .md extension and any folders)
 */
function cleanNoteName(noteName: string): string {
  const cleaned = cleanNotePath(noteName);
  const parts = cleaned.split("/");
  return parts[parts.length - 1].trim();
}

/**
 * Rebuild content with wiki links replaced.
 * The replacer returns the new text for a link, or undefined to keep it.
 */
export function replaceWikiLinks(
  content: string,
  replacer: (link: WikiLink) => string | undefined
): string {
  let result = "";
  let cursor = 0;

  for (const link of parseWikiLinks(content)) {
    const replacement = replacer(link);
    if (replacement === undefined) continue;

    result += content.slice(cursor, link.index) + replacement;
    cursor = link.index + link.raw.length;
  }

  return result + content.slice(cursor);
}
