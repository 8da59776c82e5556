import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import * as sass from "sass";
import type { SassOptions } from "../build/types";
import { toPosix } from "../fs/paths";
import type { AssetCompiler, CompileRequest, CompilerOutput } from "./types";

/**
 * Source maps are written beside the CSS as `<input file name>.map.json`.
 */
export function sourceMapFileName(inputPath: string): string {
  return `${path.basename(inputPath)}.map.json`;
}

function syntaxFor(inputPath: string): sass.Syntax {
  switch (path.extname(inputPath).toLowerCase()) {
    case ".sass":
      return "indented";
    case ".css":
      return "css";
    default:
      return "scss";
  }
}

function relativeSource(source: string, outDir: string): string {
  if (!source.startsWith("file:")) {
    return source;
  }
  return toPosix(path.relative(outDir, fileURLToPath(source)));
}

export const sassCompiler: AssetCompiler<SassOptions> = {
  async compile(request: CompileRequest<SassOptions>): Promise<CompilerOutput> {
    const { inputPath, outputPath, options } = request;
    const source = await fs.readFile(inputPath, options.encoding);
    const outDir = path.dirname(outputPath);

    const result = sass.compileString(source, {
      url: pathToFileURL(inputPath),
      syntax: syntaxFor(inputPath),
      style: options.style,
      sourceMap: options.sourceMap,
      loadPaths: [path.dirname(inputPath), ...options.loadPaths],
    });

    if (!options.sourceMap || !result.sourceMap) {
      return { text: result.css };
    }

    const map = {
      ...result.sourceMap,
      sources: result.sourceMap.sources.map((s) => relativeSource(s, outDir)),
    };

    return {
      text: `${result.css}\n\n/*# sourceMappingURL=${sourceMapFileName(inputPath)} */`,
      sourceMap: JSON.stringify(map),
    };
  },
};
