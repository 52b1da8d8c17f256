import path from "path";
import fs from "fs/promises";

/**
 * Checks if a file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Ensures .md extension on note paths
 */
export function ensureMarkdownExtension(notePath: string): string {
  return notePath.toLowerCase().endsWith(".md") ? notePath : `${notePath}.md`;
}

/**
 * Absolute path of the note a link path points at, relative to the linking note's folder
 */
export function resolveLinkedNotePath(noteDir: string, linkPath: string): string {
  return path.join(noteDir, ensureMarkdownExtension(linkPath));
}

/**
 * Get all markdown files under a folder recursively, sorted.
 * The .obsidian settings folder is skipped.
 */
export async function listMarkdownFiles(dir: string): Promise<string[]> {
  const files: string[] = [];

  const entries = await fs.readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);

    if (entry.name === ".obsidian") {
      continue;
    }

    if (entry.isDirectory()) {
      files.push(...(await listMarkdownFiles(fullPath)));
    } else if (entry.isFile() && entry.name.endsWith(".md")) {
      files.push(fullPath);
    }
  }

  return files.sort();
}
