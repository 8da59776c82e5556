import { createHash } from "node:crypto";
import type { Dirent } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "../logging";
import { HASH_PLACEHOLDER, type ResolvedOutput } from "./types";

/**
 * MD5 hex digest of `text` encoded with `encoding`.
 */
export function contentHash(text: string, encoding: BufferEncoding = "utf8"): string {
  return createHash("md5").update(Buffer.from(text, encoding)).digest("hex");
}

export function isHashedTemplate(outputPathTemplate: string): boolean {
  return path.basename(outputPathTemplate).includes(HASH_PLACEHOLDER);
}

/**
 * Substitute the placeholder in the file name only; directories are literal.
 */
export function resolveOutputPath(
  outputPathTemplate: string,
  digest: string
): ResolvedOutput {
  if (!isHashedTemplate(outputPathTemplate)) {
    return { finalPath: outputPathTemplate, isHashed: false };
  }
  const dir = path.dirname(outputPathTemplate);
  const name = path.basename(outputPathTemplate).replace(HASH_PLACEHOLDER, digest);
  return { finalPath: path.join(dir, name), isHashed: true };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Exactly what contentHash emits.
const DIGEST_PATTERN = "[0-9a-f]{32}";

/**
 * Regex matching every file name the template can produce.
 */
export function variantPattern(outputPathTemplate: string): RegExp {
  const [before, after] = splitOnPlaceholder(path.basename(outputPathTemplate));
  return new RegExp(`^${escapeRegExp(before)}${DIGEST_PATTERN}${escapeRegExp(after)}$`);
}

function splitOnPlaceholder(name: string): [string, string] {
  const index = name.indexOf(HASH_PLACEHOLDER);
  return [name.slice(0, index), name.slice(index + HASH_PLACEHOLDER.length)];
}

export async function findHashVariants(outputPathTemplate: string): Promise<string[]> {
  const dir = path.dirname(outputPathTemplate);
  const pattern = variantPattern(outputPathTemplate);

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw err;
  }

  return entries
    .filter((entry) => entry.isFile() && pattern.test(entry.name))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

export interface StaleVariantOptions {
  dryRun: boolean;
  logger: Logger;
}

export interface StaleVariantResult {
  removed: string[];
  /** True only when files were actually deleted. */
  changed: boolean;
}

/**
 * Delete every sibling produced by the same template except `finalPath`.
 */
export async function removeStaleVariants(
  outputPathTemplate: string,
  finalPath: string,
  options: StaleVariantOptions
): Promise<StaleVariantResult> {
  const target = path.resolve(finalPath);
  const removed: string[] = [];

  for (const variant of await findHashVariants(outputPathTemplate)) {
    if (path.resolve(variant) === target) {
      continue;
    }
    options.logger.debug(`Removed: ${variant}`);
    if (!options.dryRun) {
      await fs.unlink(variant);
    }
    removed.push(variant);
  }

  return { removed, changed: !options.dryRun && removed.length > 0 };
}
