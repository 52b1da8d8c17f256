import { splitLinesKeepEnds, stripLineEnding } from "./text.js";

/**
 * A leading YAML frontmatter block, split so that every byte is kept.
 * `open + yaml + close + body` is the original content.
 */
export interface FrontmatterBlock {
  /** Opening `---` line, with its line ending */
  open: string;
  /** Lines between the fences, each with its line ending */
  yaml: string;
  /** Closing `---` line, with its line ending if it had one */
  close: string;
  /** Everything after the closing fence */
  body: string;
}

function isFence(line: string): boolean {
  return stripLineEnding(line).trim() === "---";
}

/**
 * Split a leading frontmatter block off note content.
 * Returns null when the content has no complete frontmatter block.
 */
export function splitFrontmatter(content: string): FrontmatterBlock | null {
  const lines = splitLinesKeepEnds(content);
  if (lines.length === 0 || !isFence(lines[0])) return null;

  for (let i = 1; i < lines.length; i++) {
    if (isFence(lines[i])) {
      return {
        open: lines[0],
        yaml: lines.slice(1, i).join(""),
        close: lines[i],
        body: lines.slice(i + 1).join(""),
      };
    }
  }

  return null;
}

export function joinFrontmatter(block: FrontmatterBlock): string {
  return block.open + block.yaml + block.close + block.body;
}

/**
 * Number of lines at the top of `lines` taken by a frontmatter block (0 if none)
 */
export function frontmatterLineCount(lines: readonly string[]): number {
  if (lines.length === 0 || !isFence(lines[0])) return 0;

  for (let i = 1; i < lines.length; i++) {
    if (isFence(lines[i])) return i + 1;
  }

  return 0;
}
