import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { parse as parseYaml } from "yaml";
import {
  CONFIG_TOP_LEVEL_KEY,
  ConfigSchema,
  type Config,
  type Encoding,
  type FileMap,
  type SassFormat,
  type ScssSection,
} from "./schemas";
import { ConfigError, InvalidConfigFileError, SchemaValidationError, errorMessage } from "./errors";

export interface SassConfigResolved {
  files: FileMap;
  format: SassFormat;
  sourcemap: boolean;
  encoding: Encoding;
  load_paths: string[];
}

export interface JsConfigResolved {
  files: FileMap;
  comments: boolean;
  encoding: Encoding;
}

export interface TemplateConfigResolved {
  files: FileMap;
  variables: Record<string, unknown>;
  encoding: Encoding;
}

export interface ScssConfigResolved {
  recurse: boolean;
  partial_depth: number;
  stop_on_error: boolean;
  encoding: Encoding;
  format: SassFormat;
  sourcemap: boolean;
  hash_filenames: boolean;
  translate: Record<string, string>;
  load_paths: string[];
  exit_code: number;
  git_add: boolean;
}

export interface ConfigResolved {
  sass: SassConfigResolved;
  js: JsConfigResolved;
  template: TemplateConfigResolved;
  scss: ScssConfigResolved;
  git_add: boolean;
  continue_on_error: boolean;
  exit_code: number;
  dry_run: boolean;
  quiet: boolean;
  verbose: boolean;
}

export interface ConfigOverrides {
  sassFormat?: SassFormat;
  sassSourcemap?: boolean;
  sassEncoding?: Encoding;
  jsComments?: boolean;
  jsEncoding?: Encoding;
  templateEncoding?: Encoding;
  gitAdd?: boolean;
  continueOnError?: boolean;
  exitCode?: number;
  dryRun?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export interface ScssOverrides {
  recurse?: boolean;
  partialDepth?: number;
  stopOnError?: boolean;
  encoding?: Encoding;
  format?: SassFormat;
  sourcemap?: boolean;
  hashFilenames?: boolean;
  translate?: Record<string, string>;
  exitCode?: number;
  gitAdd?: boolean;
}

export const DEFAULT_SCSS_CONFIG: ScssConfigResolved = {
  recurse: true,
  partial_depth: 0,
  stop_on_error: false,
  encoding: "utf8",
  format: "compressed",
  sourcemap: false,
  hash_filenames: false,
  translate: {},
  load_paths: [],
  exit_code: 2,
  git_add: true,
};

export const DEFAULT_CONFIG: ConfigResolved = {
  sass: {
    files: {},
    format: "compressed",
    sourcemap: false,
    encoding: "utf8",
    load_paths: [],
  },
  js: {
    files: {},
    comments: false,
    encoding: "utf8",
  },
  template: {
    files: {},
    variables: {},
    encoding: "utf8",
  },
  scss: DEFAULT_SCSS_CONFIG,
  git_add: true,
  continue_on_error: false,
  exit_code: 3,
  dry_run: false,
  quiet: false,
  verbose: false,
};

export const CONFIG_EXTENSIONS = [".yml", ".yaml", ".json", ".toml"] as const;

/**
 * Parse raw file text according to the file's extension.
 */
export function parseConfigText(text: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  switch (ext) {
    case ".yml":
    case ".yaml":
      return parseYaml(text);
    case ".json":
      return JSON.parse(text);
    case ".toml":
      return TOML.parse(text);
    default:
      throw new Error(`file extension not one of: ${CONFIG_EXTENSIONS.join(", ")}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read the `assetwright` section of a configuration file and validate it.
 */
export async function readConfigFile(configPath: string): Promise<Config> {
  let text: string;
  try {
    text = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new ConfigError(`Configuration file does not exist: ${configPath}`);
    }
    throw new InvalidConfigFileError(configPath, errorMessage(err));
  }

  if (!text.trim()) {
    throw new InvalidConfigFileError(configPath, "File is empty");
  }

  let data: unknown;
  try {
    data = parseConfigText(text, configPath);
  } catch (err) {
    throw new InvalidConfigFileError(configPath, errorMessage(err));
  }

  if (!isRecord(data) || !(CONFIG_TOP_LEVEL_KEY in data)) {
    throw new InvalidConfigFileError(
      configPath,
      `must contain top-level key '${CONFIG_TOP_LEVEL_KEY}'`
    );
  }

  const result = ConfigSchema.safeParse(data[CONFIG_TOP_LEVEL_KEY] ?? {});
  if (!result.success) {
    throw new SchemaValidationError(
      `Schema validation failed for ${configPath}: ${result.error.message}`
    );
  }
  return result.data;
}

export function mergeScssWithDefaults(partial: ScssSection | undefined): ScssConfigResolved {
  const scss = partial ?? {};
  return {
    recurse: scss.recurse ?? DEFAULT_SCSS_CONFIG.recurse,
    partial_depth: scss.partial_depth ?? DEFAULT_SCSS_CONFIG.partial_depth,
    stop_on_error: scss.stop_on_error ?? DEFAULT_SCSS_CONFIG.stop_on_error,
    encoding: scss.encoding ?? DEFAULT_SCSS_CONFIG.encoding,
    format: scss.format ?? DEFAULT_SCSS_CONFIG.format,
    sourcemap: scss.sourcemap ?? DEFAULT_SCSS_CONFIG.sourcemap,
    hash_filenames: scss.hash_filenames ?? DEFAULT_SCSS_CONFIG.hash_filenames,
    translate: { ...DEFAULT_SCSS_CONFIG.translate, ...scss.translate },
    load_paths: scss.load_paths ?? DEFAULT_SCSS_CONFIG.load_paths,
    exit_code: scss.exit_code ?? DEFAULT_SCSS_CONFIG.exit_code,
    git_add: scss.git_add ?? DEFAULT_SCSS_CONFIG.git_add,
  };
}

export function mergeWithDefaults(partial: Config): ConfigResolved {
  const sass = partial.sass ?? {};
  const js = partial.js ?? {};
  const template = partial.template ?? {};

  return {
    sass: {
      files: sass.files ?? DEFAULT_CONFIG.sass.files,
      format: sass.format ?? DEFAULT_CONFIG.sass.format,
      sourcemap: sass.sourcemap ?? DEFAULT_CONFIG.sass.sourcemap,
      encoding: sass.encoding ?? DEFAULT_CONFIG.sass.encoding,
      load_paths: sass.load_paths ?? DEFAULT_CONFIG.sass.load_paths,
    },
    js: {
      files: js.files ?? DEFAULT_CONFIG.js.files,
      comments: js.comments ?? DEFAULT_CONFIG.js.comments,
      encoding: js.encoding ?? DEFAULT_CONFIG.js.encoding,
    },
    template: {
      files: template.files ?? DEFAULT_CONFIG.template.files,
      variables: template.variables ?? DEFAULT_CONFIG.template.variables,
      encoding: template.encoding ?? DEFAULT_CONFIG.template.encoding,
    },
    scss: mergeScssWithDefaults(partial.scss),
    git_add: partial.git_add ?? DEFAULT_CONFIG.git_add,
    continue_on_error: partial.continue_on_error ?? DEFAULT_CONFIG.continue_on_error,
    exit_code: partial.exit_code ?? DEFAULT_CONFIG.exit_code,
    dry_run: partial.dry_run ?? DEFAULT_CONFIG.dry_run,
    quiet: partial.quiet ?? DEFAULT_CONFIG.quiet,
    verbose: partial.verbose ?? DEFAULT_CONFIG.verbose,
  };
}

export function applyOverrides(
  config: ConfigResolved,
  overrides: ConfigOverrides
): ConfigResolved {
  return {
    sass: {
      ...config.sass,
      format: overrides.sassFormat ?? config.sass.format,
      sourcemap: overrides.sassSourcemap ?? config.sass.sourcemap,
      encoding: overrides.sassEncoding ?? config.sass.encoding,
    },
    js: {
      ...config.js,
      comments: overrides.jsComments ?? config.js.comments,
      encoding: overrides.jsEncoding ?? config.js.encoding,
    },
    template: {
      ...config.template,
      encoding: overrides.templateEncoding ?? config.template.encoding,
    },
    scss: config.scss,
    git_add: overrides.gitAdd ?? config.git_add,
    continue_on_error: overrides.continueOnError ?? config.continue_on_error,
    exit_code: overrides.exitCode ?? config.exit_code,
    dry_run: overrides.dryRun ?? config.dry_run,
    quiet: overrides.quiet ?? config.quiet,
    verbose: overrides.verbose ?? config.verbose,
  };
}

export function applyScssOverrides(
  scss: ScssConfigResolved,
  overrides: ScssOverrides
): ScssConfigResolved {
  return {
    recurse: overrides.recurse ?? scss.recurse,
    partial_depth: overrides.partialDepth ?? scss.partial_depth,
    stop_on_error: overrides.stopOnError ?? scss.stop_on_error,
    encoding: overrides.encoding ?? scss.encoding,
    format: overrides.format ?? scss.format,
    sourcemap: overrides.sourcemap ?? scss.sourcemap,
    hash_filenames: overrides.hashFilenames ?? scss.hash_filenames,
    translate: { ...scss.translate, ...overrides.translate },
    load_paths: scss.load_paths,
    exit_code: overrides.exitCode ?? scss.exit_code,
    git_add: overrides.gitAdd ?? scss.git_add,
  };
}

export async function loadConfig(
  configPath: string,
  overrides?: ConfigOverrides
): Promise<ConfigResolved> {
  const partial = await readConfigFile(configPath);
  const resolved = mergeWithDefaults(partial);

  if (overrides) {
    return applyOverrides(resolved, overrides);
  }

  return resolved;
}

/**
 * Path-mode settings: the optional file's `scss` section under the flags.
 */
export async function loadScssConfig(
  configPath: string | undefined,
  overrides: ScssOverrides
): Promise<ScssConfigResolved> {
  const base = configPath
    ? mergeScssWithDefaults((await readConfigFile(configPath)).scss)
    : DEFAULT_SCSS_CONFIG;
  return applyScssOverrides(base, overrides);
}
