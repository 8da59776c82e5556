import type { CompilerKind, CompilerOptionsByKind } from "../build/types";

export interface CompileRequest<O> {
  inputPath: string;
  /** Output template; its directory is final even when the name is hashed. */
  outputPath: string;
  options: O;
  root: string;
  /** Outputs compiled earlier in the run, keyed by root-relative input path. */
  fileMap: ReadonlyMap<string, string>;
}

export interface CompilerOutput {
  text: string;
  sourceMap?: string;
}

export interface AssetCompiler<O> {
  compile(request: CompileRequest<O>): Promise<CompilerOutput>;
}

export type CompilerRegistry = {
  [K in CompilerKind]: AssetCompiler<CompilerOptionsByKind[K]>;
};
