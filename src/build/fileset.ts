import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import type { Logger } from "../logging";
import { ConfigError } from "../errors";

export const PARTIAL_PREFIX = "_";
export const DEFAULT_ASSET_EXTENSION = ".scss";

export interface FileSetOptions {
  recurse: boolean;
  /** Extra ancestor levels searched for a partial, beyond its own directory. */
  partialDepth: number;
  extension?: string;
  cwd?: string;
  logger?: Logger;
}

export function isPartial(filePath: string): boolean {
  return path.basename(filePath).startsWith(PARTIAL_PREFIX);
}

async function listMatching(
  dir: string,
  pattern: string
): Promise<string[]> {
  return fg(pattern, { cwd: dir, absolute: true, onlyFiles: true });
}

/**
 * Non-partial files with the extension directly inside `dir`.
 */
async function siblingsOf(dir: string, extension: string): Promise<string[]> {
  const matches = await listMatching(dir, `*${extension}`);
  return matches.filter((file) => !isPartial(file));
}

/**
 * Expand path arguments into the set of files to compile.
 *
 * Partials are never compiled themselves. Instead, the non-partial files in
 * the partial's directory and its `partialDepth` nearest ancestors are taken
 * as the files that may import it. This is an approximation of import-graph
 * resolution: nothing is parsed, so deep `@use` chains can be missed and
 * unrelated neighbours pulled in.
 */
export async function resolveFileSet(
  paths: string[],
  options: FileSetOptions
): Promise<string[]> {
  const extension = options.extension ?? DEFAULT_ASSET_EXTENSION;
  const cwd = options.cwd ?? process.cwd();

  if (!Number.isInteger(options.partialDepth) || options.partialDepth < 0) {
    throw new ConfigError(
      `Partial depth must be a non-negative integer, got ${options.partialDepth}`
    );
  }

  const considered = new Set<string>();
  for (const arg of paths) {
    const absolute = path.resolve(cwd, arg);
    let stat: Stats;
    try {
      stat = await fs.stat(absolute);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        throw new ConfigError(`Path does not exist: ${arg}`);
      }
      throw err;
    }

    if (stat.isDirectory()) {
      const pattern = (options.recurse ? "**/" : "") + `*${extension}`;
      for (const file of await listMatching(absolute, pattern)) {
        considered.add(path.normalize(file));
      }
    } else {
      considered.add(absolute);
    }
  }

  options.logger?.debug(`Considered files: ${[...considered].sort().join(", ")}`);

  const resolved = new Set<string>();
  for (const file of considered) {
    if (!isPartial(file)) {
      resolved.add(file);
      continue;
    }
    let dir = path.dirname(file);
    for (let level = 0; level <= options.partialDepth; level++) {
      for (const sibling of await siblingsOf(dir, extension)) {
        resolved.add(path.normalize(sibling));
      }
      dir = path.dirname(dir);
    }
  }

  return [...resolved].sort();
}
