import type { Logger } from "../logging";
import type { FileStager } from "../git";
import type { ErrorAggregator } from "./errorAggregator";

export type CompilerKind = "sass" | "js" | "template";

export const HASH_PLACEHOLDER = "[hash]";

export type SassOutputStyle = "expanded" | "compressed";

export interface SassOptions {
  style: SassOutputStyle;
  sourceMap: boolean;
  encoding: BufferEncoding;
  loadPaths: string[];
}

export interface JsOptions {
  keepComments: boolean;
  encoding: BufferEncoding;
}

export interface TemplateOptions {
  variables: Record<string, unknown>;
  encoding: BufferEncoding;
}

export interface CompilerOptionsByKind {
  sass: SassOptions;
  js: JsOptions;
  template: TemplateOptions;
}

interface MappingBase<K extends CompilerKind> {
  kind: K;
  /** Absolute path of the source file. */
  inputPath: string;
  /** Absolute output path, optionally containing HASH_PLACEHOLDER in its file name. */
  outputPathTemplate: string;
  options: CompilerOptionsByKind[K];
}

export type SassMapping = MappingBase<"sass">;
export type JsMapping = MappingBase<"js">;
export type TemplateMapping = MappingBase<"template">;

export type AssetMapping = SassMapping | JsMapping | TemplateMapping;

export interface CompiledArtifact {
  primaryText: string;
  sidecarText?: string;
  encoding: BufferEncoding;
}

export interface ResolvedOutput {
  finalPath: string;
  isHashed: boolean;
}

export interface FileChangeRecord {
  path: string;
  /** Implies contentChanged. */
  created: boolean;
  contentChanged: boolean;
}

export type FailureKind = "input_not_found" | "compile_error";

/**
 * A per-input failure. Collected, never thrown.
 */
export interface CompilationFailure {
  kind: FailureKind;
  inputPath: string;
  message: string;
}

export type RunPhase =
  | "start"
  | "resolving"
  | "dispatching"
  | "aborted"
  | "aggregating"
  | "reported";

export interface RunOutcome {
  anyChanged: boolean;
  /** root-relative input path -> message, in processing order */
  errors: ReadonlyMap<string, string>;
  /** Inputs compiled and written without error, in processing order. */
  compiled: string[];
  changes: FileChangeRecord[];
  aborted: boolean;
}

/**
 * Mutable state threaded through one run. Never shared between runs.
 */
export interface RunContext {
  root: string;
  dryRun: boolean;
  logger: Logger;
  stager?: FileStager;
  errors: ErrorAggregator;
  /** root-relative input -> root-relative final output */
  fileMap: Map<string, string>;
  /** Mapping identities already handled in this run. */
  processed: Set<string>;
  changes: FileChangeRecord[];
  compiled: string[];
  anyChanged: boolean;
  phase: RunPhase;
}
