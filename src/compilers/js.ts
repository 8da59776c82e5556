import * as fs from "node:fs/promises";
import * as path from "node:path";
import { transformSync } from "esbuild";
import type { JsOptions } from "../build/types";
import type { AssetCompiler, CompileRequest, CompilerOutput } from "./types";

export const jsCompiler: AssetCompiler<JsOptions> = {
  async compile(request: CompileRequest<JsOptions>): Promise<CompilerOutput> {
    const { inputPath, options } = request;
    const source = await fs.readFile(inputPath, options.encoding);

    // "inline" keeps /*! and @license comments only
    const result = transformSync(source, {
      loader: "js",
      minify: true,
      legalComments: options.keepComments ? "inline" : "none",
      sourcefile: path.basename(inputPath),
    });

    return { text: result.code };
  },
};
