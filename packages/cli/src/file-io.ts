import fs from "fs/promises";
import { listMarkdownFiles } from "@notes-toolkit/utils";
import { IOError } from "./errors.js";

// ignoreBOM keeps a byte order mark in the text so it is written back unchanged
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

function describeFsError(error: unknown): string {
  const code =
    error instanceof Error && "code" in error && typeof error.code === "string"
      ? error.code
      : undefined;

  switch (code) {
    case "ENOENT":
      return "file not found";
    case "EACCES":
    case "EPERM":
      return "permission denied";
    case "EISDIR":
      return "is a directory";
    case "ENOTDIR":
      return "not a directory";
    default:
      return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Read a file as strict UTF-8 text
 */
export async function readTextFile(filePath: string): Promise<string> {
  let bytes: Uint8Array;
  try {
    bytes = await fs.readFile(filePath);
  } catch (error) {
    throw new IOError(`Cannot read ${filePath}: ${describeFsError(error)}`, filePath, error);
  }

  try {
    return utf8.decode(bytes);
  } catch (error) {
    throw new IOError(`Cannot read ${filePath}: not valid UTF-8`, filePath, error);
  }
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  try {
    await fs.writeFile(filePath, content, "utf-8");
  } catch (error) {
    throw new IOError(`Cannot write ${filePath}: ${describeFsError(error)}`, filePath, error);
  }
}

/**
 * Markdown files under a folder, recursively and sorted
 */
export async function listNoteFiles(folder: string): Promise<string[]> {
  try {
    return await listMarkdownFiles(folder);
  } catch (error) {
    throw new IOError(`Cannot read ${folder}: ${describeFsError(error)}`, folder, error);
  }
}
