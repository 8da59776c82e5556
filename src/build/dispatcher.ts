import type { AssetMapping, CompiledArtifact, CompilationFailure } from "./types";
import type { CompilerOutput, CompilerRegistry } from "../compilers/types";
import { fileExists } from "../fs/util";
import { errorMessage } from "../errors";

export type DispatchResult =
  | { ok: true; artifact: CompiledArtifact }
  | { ok: false; failure: CompilationFailure };

export interface DispatchContext {
  root: string;
  fileMap: ReadonlyMap<string, string>;
}

/**
 * Trailing whitespace is dropped and exactly one newline appended, so output
 * survives end-of-file fixers unchanged and hashes are reproducible.
 */
export function normalizeOutput(text: string): string {
  return text.trimEnd() + "\n";
}

function invoke(
  mapping: AssetMapping,
  compilers: CompilerRegistry,
  context: DispatchContext
): Promise<CompilerOutput> {
  const base = {
    inputPath: mapping.inputPath,
    outputPath: mapping.outputPathTemplate,
    root: context.root,
    fileMap: context.fileMap,
  };

  switch (mapping.kind) {
    case "sass":
      return compilers.sass.compile({ ...base, options: mapping.options });
    case "js":
      return compilers.js.compile({ ...base, options: mapping.options });
    case "template":
      return compilers.template.compile({ ...base, options: mapping.options });
  }
}

/**
 * Run the compiler for one mapping. Never throws for a bad input: a missing
 * file or a compiler rejection comes back as a failure record.
 */
export async function dispatch(
  mapping: AssetMapping,
  compilers: CompilerRegistry,
  context: DispatchContext
): Promise<DispatchResult> {
  if (!(await fileExists(mapping.inputPath))) {
    return {
      ok: false,
      failure: {
        kind: "input_not_found",
        inputPath: mapping.inputPath,
        message: "Path does not exist",
      },
    };
  }

  let output: CompilerOutput;
  try {
    output = await invoke(mapping, compilers, context);
  } catch (err) {
    return {
      ok: false,
      failure: {
        kind: "compile_error",
        inputPath: mapping.inputPath,
        message: errorMessage(err),
      },
    };
  }

  const artifact: CompiledArtifact = {
    primaryText: normalizeOutput(output.text),
    encoding: mapping.options.encoding,
  };
  if (output.sourceMap !== undefined) {
    artifact.sidecarText = normalizeOutput(output.sourceMap);
  }
  return { ok: true, artifact };
}
