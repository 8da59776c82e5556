import * as fs from "node:fs/promises";

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Result type for tryReadBytes.
 * - status: "ok" with the raw bytes for successful reads
 * - status: "not_found" when the file doesn't exist (ENOENT)
 */
export type FileReadResult =
  | { status: "ok"; content: Buffer }
  | { status: "not_found" };

/**
 * Read a file's bytes, treating a missing file as an expected outcome.
 * Permission and I/O errors are rethrown.
 */
export async function tryReadBytes(filePath: string): Promise<FileReadResult> {
  try {
    const content = await fs.readFile(filePath);
    return { status: "ok", content };
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return { status: "not_found" };
    }
    throw err;
  }
}
