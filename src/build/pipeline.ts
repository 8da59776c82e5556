import * as path from "node:path";
import type { Logger } from "../logging";
import type { FileStager } from "../git";
import type { CompilerRegistry } from "../compilers/types";
import { sourceMapFileName } from "../compilers/sass";
import { toRootKey } from "../fs/paths";
import { ErrorAggregator, type ErrorPolicy, type FailureVerdict } from "./errorAggregator";
import { dispatch } from "./dispatcher";
import { contentHash, isHashedTemplate, removeStaleVariants, resolveOutputPath } from "./hash";
import { writeOutput } from "./writer";
import { reportOutcome } from "./report";
import type {
  AssetMapping,
  FileChangeRecord,
  RunContext,
  RunOutcome,
} from "./types";

export interface RunContextOptions {
  root: string;
  dryRun: boolean;
  logger: Logger;
  policy: ErrorPolicy;
  stager?: FileStager;
}

export function createRunContext(options: RunContextOptions): RunContext {
  return {
    root: path.resolve(options.root),
    dryRun: options.dryRun,
    logger: options.logger,
    stager: options.stager,
    errors: new ErrorAggregator(options.policy),
    fileMap: new Map(),
    processed: new Set(),
    changes: [],
    compiled: [],
    anyChanged: false,
    phase: "start",
  };
}

function mappingId(mapping: AssetMapping): string {
  return `${mapping.kind}:${path.resolve(mapping.inputPath)}`;
}

async function persist(
  ctx: RunContext,
  filePath: string,
  text: string,
  encoding: BufferEncoding,
  sourcePath: string
): Promise<FileChangeRecord> {
  const record = await writeOutput(filePath, text, {
    encoding,
    dryRun: ctx.dryRun,
    logger: ctx.logger,
    stager: ctx.stager,
    sourcePath,
  });
  ctx.changes.push(record);
  if (record.contentChanged) {
    ctx.anyChanged = true;
  }
  return record;
}

/**
 * Compile, name, and write a single mapping.
 */
export async function processMapping(
  ctx: RunContext,
  mapping: AssetMapping,
  compilers: CompilerRegistry
): Promise<FailureVerdict> {
  const id = mappingId(mapping);
  if (ctx.processed.has(id)) {
    ctx.logger.warn(`Skipping duplicate mapping for ${mapping.inputPath}`);
    return "continue";
  }
  ctx.processed.add(id);
  ctx.phase = "dispatching";

  const result = await dispatch(mapping, compilers, {
    root: ctx.root,
    fileMap: ctx.fileMap,
  });
  if (!result.ok) {
    ctx.logger.debug(`Failed: ${mapping.inputPath}`);
    return ctx.errors.record({
      ...result.failure,
      inputPath: toRootKey(ctx.root, result.failure.inputPath),
    });
  }

  const { artifact } = result;
  let finalPath = mapping.outputPathTemplate;

  if (isHashedTemplate(mapping.outputPathTemplate)) {
    const digest = contentHash(artifact.primaryText, artifact.encoding);
    finalPath = resolveOutputPath(mapping.outputPathTemplate, digest).finalPath;
    const stale = await removeStaleVariants(mapping.outputPathTemplate, finalPath, {
      dryRun: ctx.dryRun,
      logger: ctx.logger,
    });
    if (stale.changed) {
      ctx.anyChanged = true;
    }
  }

  ctx.fileMap.set(toRootKey(ctx.root, mapping.inputPath), toRootKey(ctx.root, finalPath));

  await persist(ctx, finalPath, artifact.primaryText, artifact.encoding, mapping.inputPath);

  if (artifact.sidecarText !== undefined) {
    const sidecarPath = path.join(path.dirname(finalPath), sourceMapFileName(mapping.inputPath));
    await persist(ctx, sidecarPath, artifact.sidecarText, artifact.encoding, mapping.inputPath);
  }

  ctx.compiled.push(mapping.inputPath);
  return "continue";
}

export function finishRun(ctx: RunContext, aborted: boolean): RunOutcome {
  ctx.phase = aborted ? "aborted" : "aggregating";
  return {
    anyChanged: ctx.anyChanged,
    errors: ctx.errors.snapshot(),
    compiled: [...ctx.compiled],
    changes: [...ctx.changes],
    aborted,
  };
}

/**
 * Process mappings one at a time, in order. Stops after the first failure
 * when the context's policy is "stop".
 */
export async function runMappings(
  ctx: RunContext,
  mappings: AssetMapping[],
  compilers: CompilerRegistry
): Promise<RunOutcome> {
  for (const mapping of mappings) {
    const verdict = await processMapping(ctx, mapping, compilers);
    if (verdict === "abort") {
      return finishRun(ctx, true);
    }
  }
  return finishRun(ctx, false);
}

export interface BuildOptions extends RunContextOptions {
  compilers: CompilerRegistry;
  changedExitCode: number;
}

export interface BuildResult {
  outcome: RunOutcome;
  exitCode: number;
}

/**
 * One complete run: resolve the mappings, process them, report.
 */
export async function runBuild(
  options: BuildOptions,
  resolveMappings: () => AssetMapping[] | Promise<AssetMapping[]>
): Promise<BuildResult> {
  const ctx = createRunContext(options);
  ctx.phase = "resolving";
  const mappings = await resolveMappings();

  const outcome = await runMappings(ctx, mappings, options.compilers);
  const exitCode = reportOutcome(ctx, outcome, {
    changedExitCode: options.changedExitCode,
    logger: options.logger,
  });
  return { outcome, exitCode };
}
