import { sassCompiler } from "./sass";
import { jsCompiler } from "./js";
import { templateCompiler } from "./template";
import type { CompilerRegistry } from "./types";

export type {
  AssetCompiler,
  CompileRequest,
  CompilerOutput,
  CompilerRegistry,
} from "./types";
export { sassCompiler, sourceMapFileName } from "./sass";
export { jsCompiler } from "./js";
export {
  templateCompiler,
  createTemplateFilters,
  createTemplateEnvironment,
  type TemplateFilters,
} from "./template";

export function createDefaultCompilers(): CompilerRegistry {
  return {
    sass: sassCompiler,
    js: jsCompiler,
    template: templateCompiler,
  };
}
