import * as path from "node:path";
import { stringify } from "yaml";
import type { Logger } from "../logging";
import { loadScssConfig, type ScssConfigResolved, type ScssOverrides } from "../config";
import { createGitStager, type FileStager } from "../git";
import { createDefaultCompilers } from "../compilers";
import type { CompilerRegistry } from "../compilers/types";
import { policyFromFlags } from "../build/errorAggregator";
import { resolveFileSet } from "../build/fileset";
import { mappingsFromFiles, parseTranslations } from "../build/mappings";
import { runBuild, type BuildResult } from "../build/pipeline";
import { validateExitCode } from "./compile";

export interface ScssCommandOptions extends Omit<ScssOverrides, "translate"> {
  paths: string[];
  /** Raw `src:dest` values from `--translate`. */
  translate?: string[];
  config?: string;
  cwd: string;
  dryRun?: boolean;
}

export interface ScssDeps {
  compilers?: CompilerRegistry;
  createStager?: (cwd: string, logger: Logger) => Promise<FileStager>;
}

async function defaultStager(cwd: string, logger: Logger): Promise<FileStager> {
  return createGitStager({ cwd, logger });
}

function describeScss(scss: ScssConfigResolved): string {
  return stringify({
    recurse: scss.recurse,
    partial_depth: scss.partial_depth,
    stop_on_error: scss.stop_on_error,
    encoding: scss.encoding,
    format: scss.format,
    sourcemap: scss.sourcemap,
    hash_filenames: scss.hash_filenames,
    translate: scss.translate,
    git_add: scss.git_add,
    exit_code: scss.exit_code,
  }).trimEnd();
}

export async function runScss(
  options: ScssCommandOptions,
  logger: Logger,
  deps: ScssDeps = {}
): Promise<BuildResult> {
  const { paths, cwd, dryRun = false } = options;
  const scss = await loadScssConfig(
    options.config ? path.resolve(cwd, options.config) : undefined,
    {
      ...options,
      exitCode: validateExitCode(options.exitCode),
      translate: options.translate ? parseTranslations(options.translate) : undefined,
    }
  );

  logger.debug(`Configuration:\n${describeScss(scss)}`);
  if (dryRun) {
    logger.warn("Test run only!");
  }

  const createStager = deps.createStager ?? defaultStager;
  const stager = scss.git_add ? await createStager(cwd, logger) : undefined;

  return runBuild(
    {
      root: cwd,
      dryRun,
      logger,
      policy: policyFromFlags({ stopOnError: scss.stop_on_error }),
      stager,
      compilers: deps.compilers ?? createDefaultCompilers(),
      changedExitCode: scss.exit_code,
    },
    async () => {
      const files = await resolveFileSet(paths, {
        recurse: scss.recurse,
        partialDepth: scss.partial_depth,
        cwd,
        logger,
      });
      logger.debug(`Compiling ${files.length} file(s)`);
      return mappingsFromFiles(files, scss, cwd);
    }
  );
}

/**
 * Compile style sheets named on the command line, each beside its source
 * (or under a translated directory). Resolves to the exit status.
 */
export async function scssCommand(
  options: ScssCommandOptions,
  logger: Logger,
  deps: ScssDeps = {}
): Promise<number> {
  const { exitCode } = await runScss(options, logger, deps);
  return exitCode;
}
