/**
 * Notes Toolkit Utilities
 *
 * Shared helpers for working with Markdown note vaults:
 * - Wiki link parsing and replacement
 * - Frontmatter splitting
 * - Markdown file discovery
 *
 * @packageDocumentation
 */

// Wiki link parsing exports
export type { WikiLink } from "./wiki-links.js";
export { parseWikiLinks, replaceWikiLinks } from "./wiki-links.js";

// Frontmatter exports
export type { FrontmatterBlock } from "./frontmatter.js";
export { splitFrontmatter, joinFrontmatter, frontmatterLineCount } from "./frontmatter.js";

// Path utility exports
export {
  fileExists,
  ensureMarkdownExtension,
  resolveLinkedNotePath,
  listMarkdownFiles,
} from "./path.js";

// Text exports
export { splitLinesKeepEnds, stripLineEnding, detectLineEnding, escapeRegExp } from "./text.js";
