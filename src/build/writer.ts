import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "../logging";
import type { FileStager } from "../git";
import { tryReadBytes } from "../fs/util";
import type { FileChangeRecord } from "./types";

export interface WriteOptions {
  encoding: BufferEncoding;
  dryRun: boolean;
  logger: Logger;
  stager?: FileStager;
  /** Source shown in progress messages. */
  sourcePath?: string;
}

// The next run must see the file as new, so it is removed when staging fails.
async function stageOrRollBack(stager: FileStager, filePath: string): Promise<void> {
  try {
    await stager.stageFile(filePath);
  } catch (err) {
    await fs.rm(filePath, { force: true });
    throw err;
  }
}

/**
 * Persist `text` at `filePath` only when the bytes on disk differ.
 *
 * Newly created files are staged; modified ones are assumed tracked already.
 * In dry-run mode the comparison still happens but nothing is touched.
 */
export async function writeOutput(
  filePath: string,
  text: string,
  options: WriteOptions
): Promise<FileChangeRecord> {
  const { encoding, dryRun, logger, stager } = options;
  const bytes = Buffer.from(text, encoding);
  const current = await tryReadBytes(filePath);

  let record: FileChangeRecord;

  if (current.status === "not_found") {
    if (!dryRun) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, bytes);
      if (stager) {
        await stageOrRollBack(stager, filePath);
      }
    }
    record = { path: filePath, created: true, contentChanged: true };
  } else if (!current.content.equals(bytes)) {
    if (!dryRun) {
      await fs.writeFile(filePath, bytes);
    }
    record = { path: filePath, created: false, contentChanged: true };
  } else {
    record = { path: filePath, created: false, contentChanged: false };
  }

  const source = options.sourcePath ?? filePath;
  if (record.contentChanged) {
    logger.info(`Compiled: ${source} -> ${filePath}`);
  } else {
    logger.debug(`Already exists: ${source} -> ${filePath}`);
  }

  return record;
}
