import * as path from "node:path";
import { stringify } from "yaml";
import { createLogger, type Logger } from "../logging";
import { loadConfig, type ConfigOverrides, type ConfigResolved } from "../config";
import { ChangedExitCodeSchema } from "../schemas";
import { ConfigError } from "../errors";
import { DEFAULT_CONFIG_FILE, getRunRoot } from "../fs/paths";
import { createGitStager, type FileStager } from "../git";
import { createDefaultCompilers } from "../compilers";
import type { CompilerRegistry } from "../compilers/types";
import { policyFromFlags } from "../build/errorAggregator";
import { mappingsFromConfig } from "../build/mappings";
import { runBuild, type BuildResult } from "../build/pipeline";

export interface CompileOptions extends ConfigOverrides {
  config?: string;
  cwd: string;
  noColor?: boolean;
}

export interface CompileDeps {
  compilers?: CompilerRegistry;
  createStager?: (root: string, logger: Logger) => Promise<FileStager>;
}

export function validateExitCode(value: number | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const result = ChangedExitCodeSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Exit code must be an integer from 2 to 255, got ${value}`);
  }
  return result.data;
}

/**
 * The settings a run will use, as shown in verbose output.
 */
export function describeConfig(configPath: string, config: ConfigResolved): string {
  return stringify({
    config: configPath,
    sass: {
      files: Object.keys(config.sass.files).length,
      format: config.sass.format,
      sourcemap: config.sass.sourcemap,
      encoding: config.sass.encoding,
    },
    js: {
      files: Object.keys(config.js.files).length,
      comments: config.js.comments,
      encoding: config.js.encoding,
    },
    template: {
      files: Object.keys(config.template.files).length,
      encoding: config.template.encoding,
    },
    git_add: config.git_add,
    continue_on_error: config.continue_on_error,
    exit_code: config.exit_code,
    dry_run: config.dry_run,
  }).trimEnd();
}

// Flags given on the command line already shaped the logger; the file's own
// quiet/verbose only apply when the flags were silent.
function runLogger(options: CompileOptions, config: ConfigResolved, logger: Logger): Logger {
  if (options.quiet !== undefined || options.verbose !== undefined) {
    return logger;
  }
  if (!config.quiet && !config.verbose) {
    return logger;
  }
  return createLogger({ quiet: config.quiet, verbose: config.verbose, noColor: options.noColor });
}

async function defaultStager(root: string, logger: Logger): Promise<FileStager> {
  return createGitStager({ cwd: root, logger, requireTopLevel: true });
}

export async function runCompile(
  options: CompileOptions,
  logger: Logger,
  deps: CompileDeps = {}
): Promise<BuildResult> {
  const configPath = path.resolve(options.cwd, options.config ?? DEFAULT_CONFIG_FILE);
  const exitCode = validateExitCode(options.exitCode);
  const config = await loadConfig(configPath, { ...options, exitCode });
  const root = getRunRoot(configPath);
  const log = runLogger(options, config, logger);

  log.debug(`Configuration:\n${describeConfig(configPath, config)}`);
  if (config.dry_run) {
    log.warn("Dry run: no files will be written");
  }

  const createStager = deps.createStager ?? defaultStager;
  const stager = config.git_add ? await createStager(root, log) : undefined;

  return runBuild(
    {
      root,
      dryRun: config.dry_run,
      logger: log,
      policy: policyFromFlags({ continueOnError: config.continue_on_error }),
      stager,
      compilers: deps.compilers ?? createDefaultCompilers(),
      changedExitCode: config.exit_code,
    },
    () => mappingsFromConfig(config, root)
  );
}

/**
 * Compile everything a configuration file lists. Resolves to the exit status.
 */
export async function compileCommand(
  options: CompileOptions,
  logger: Logger,
  deps: CompileDeps = {}
): Promise<number> {
  const { exitCode } = await runCompile(options, logger, deps);
  return exitCode;
}
