import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { vi } from "vitest";
import type { Logger } from "../logging";
import type { FileStager } from "../git";
import type { AssetCompiler, CompilerRegistry } from "../compilers/types";

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    json: vi.fn(),
  };
}

export async function makeTempDir(prefix = "assetwright-test-"): Promise<string> {
  return fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const filePath = path.join(root, rel);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  }
}

export async function listFiles(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}

export interface RecordingStager extends FileStager {
  staged: string[];
}

export function createRecordingStager(): RecordingStager {
  const staged: string[] = [];
  return {
    staged,
    async stageFile(absolutePath: string): Promise<void> {
      staged.push(absolutePath);
    },
  };
}

/**
 * A compiler that upper-cases its input, or throws when the source
 * contains "FAIL".
 */
export function createUpperCaseCompiler<O>(): AssetCompiler<O> {
  return {
    async compile(request) {
      const source = await fs.readFile(request.inputPath, "utf8");
      if (source.includes("FAIL")) {
        throw new Error(`cannot compile ${path.basename(request.inputPath)}`);
      }
      return { text: source.toUpperCase() };
    },
  };
}

export function createFakeCompilers(): CompilerRegistry {
  return {
    sass: createUpperCaseCompiler(),
    js: createUpperCaseCompiler(),
    template: createUpperCaseCompiler(),
  };
}
