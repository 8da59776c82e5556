export { runCompile, compileCommand, type CompileOptions, type CompileDeps } from "./commands/compile";
export { runScss, scssCommand, type ScssCommandOptions, type ScssDeps } from "./commands/scss";
export {
  loadConfig,
  loadScssConfig,
  readConfigFile,
  DEFAULT_CONFIG,
  DEFAULT_SCSS_CONFIG,
  type ConfigResolved,
  type ConfigOverrides,
  type ScssConfigResolved,
  type ScssOverrides,
} from "./config";
export { createRunContext, processMapping, runMappings, runBuild } from "./build/pipeline";
export { mappingsFromConfig, mappingsFromFiles, parseTranslations } from "./build/mappings";
export { resolveFileSet, isPartial } from "./build/fileset";
export { contentHash, resolveOutputPath, removeStaleVariants } from "./build/hash";
export { writeOutput } from "./build/writer";
export { ErrorAggregator, type ErrorPolicy } from "./build/errorAggregator";
export { formatFailures, resolveExitStatus } from "./build/report";
export type {
  AssetMapping,
  CompilationFailure,
  FileChangeRecord,
  RunContext,
  RunOutcome,
} from "./build/types";
export { createDefaultCompilers, type AssetCompiler, type CompilerRegistry } from "./compilers";
export { createGitStager, type FileStager } from "./git";
export { createLogger, type Logger } from "./logging";
export * from "./errors";
