import * as fsSync from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as nunjucks from "nunjucks";
import type { TemplateOptions } from "../build/types";
import { contentHash } from "../build/hash";
import { LookupError } from "../errors";
import { toRootKey } from "../fs/paths";
import type { AssetCompiler, CompileRequest, CompilerOutput } from "./types";

export interface TemplateFilters {
  compiledNameOf(inputPath: string): string;
  hashOf(inputPath: string): string;
}

/**
 * Filters that let a template refer to assets compiled earlier in the same
 * run, e.g. `{{ "src/site.scss" | compiled_name }}`.
 */
export function createTemplateFilters(
  root: string,
  fileMap: ReadonlyMap<string, string>
): TemplateFilters {
  const lookup = (value: unknown): { key: string; output: string } => {
    const raw = typeof value === "string" ? value : "";
    const key = raw ? toRootKey(root, raw) : "";
    const output = key ? fileMap.get(key) : undefined;
    if (output === undefined) {
      throw new LookupError(raw);
    }
    return { key, output };
  };

  return {
    compiledNameOf(inputPath: string): string {
      return path.posix.basename(lookup(inputPath).output);
    },
    hashOf(inputPath: string): string {
      const { key } = lookup(inputPath);
      return contentHash(fsSync.readFileSync(path.join(root, key), "utf8"));
    },
  };
}

export function createTemplateEnvironment(
  request: CompileRequest<TemplateOptions>
): nunjucks.Environment {
  const env = new nunjucks.Environment(null, { autoescape: false });
  for (const [name, value] of Object.entries(request.options.variables)) {
    env.addGlobal(name, value);
  }

  const filters = createTemplateFilters(request.root, request.fileMap);
  env.addFilter("compiled_name", (value: string) => filters.compiledNameOf(value));
  env.addFilter("hash", (value: string) => filters.hashOf(value));
  return env;
}

export const templateCompiler: AssetCompiler<TemplateOptions> = {
  async compile(request: CompileRequest<TemplateOptions>): Promise<CompilerOutput> {
    const source = await fs.readFile(request.inputPath, request.options.encoding);
    const env = createTemplateEnvironment(request);
    return { text: env.renderString(source, {}) };
  },
};
