/**
 * Split text into lines, each keeping its own line ending.
 * Joining the result gives back the input.
 */
export function splitLinesKeepEnds(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

/** Strip a trailing "\n" or "\r\n" from a line. */
export function stripLineEnding(line: string): string {
  return line.replace(/\r?\n$/, "");
}

/** The line ending a text predominantly uses. */
export function detectLineEnding(text: string): "\n" | "\r\n" {
  return text.includes("\r\n") ? "\r\n" : "\n";
}

/** Escape a literal string for use inside a RegExp. */
export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
