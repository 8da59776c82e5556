import * as path from "node:path";
import type { ConfigResolved, ScssConfigResolved } from "../config";
import { ConfigError } from "../errors";
import { fileStem, isWithin } from "../fs/paths";
import { HASH_PLACEHOLDER, type AssetMapping, type SassOptions } from "./types";

/**
 * Mappings from a configuration file, in compile order: style sheets, then
 * scripts, then templates (which may reference the first two).
 */
export function mappingsFromConfig(config: ConfigResolved, root: string): AssetMapping[] {
  const resolve = (p: string): string => path.resolve(root, p);
  const mappings: AssetMapping[] = [];

  const sassOptions: SassOptions = {
    style: config.sass.format,
    sourceMap: config.sass.sourcemap,
    encoding: config.sass.encoding,
    loadPaths: config.sass.load_paths.map(resolve),
  };
  for (const [input, output] of Object.entries(config.sass.files)) {
    mappings.push({
      kind: "sass",
      inputPath: resolve(input),
      outputPathTemplate: resolve(output),
      options: sassOptions,
    });
  }

  for (const [input, output] of Object.entries(config.js.files)) {
    mappings.push({
      kind: "js",
      inputPath: resolve(input),
      outputPathTemplate: resolve(output),
      options: { keepComments: config.js.comments, encoding: config.js.encoding },
    });
  }

  for (const [input, output] of Object.entries(config.template.files)) {
    mappings.push({
      kind: "template",
      inputPath: resolve(input),
      outputPathTemplate: resolve(output),
      options: { variables: config.template.variables, encoding: config.template.encoding },
    });
  }

  return mappings;
}

/**
 * Parse `src:dest` pairs given on the command line.
 */
export function parseTranslations(values: string[]): Record<string, string> {
  const translations: Record<string, string> = {};
  for (const value of values) {
    const index = value.indexOf(":");
    if (index <= 0 || index === value.length - 1) {
      throw new ConfigError(`Malformed translate option: '${value}'`);
    }
    translations[value.slice(0, index)] = value.slice(index + 1);
  }
  return translations;
}

/**
 * Rewrite `dir` through the longest translation source that contains it.
 */
export function translateOutputDir(
  dir: string,
  translations: Record<string, string>,
  cwd: string
): string {
  const candidates = Object.entries(translations)
    .map(([src, dest]) => [path.resolve(cwd, src), path.resolve(cwd, dest)] as const)
    .filter(([src]) => isWithin(src, dir))
    .sort(([a], [b]) => b.length - a.length);

  const match = candidates[0];
  if (!match) {
    return dir;
  }
  const [src, dest] = match;
  return path.join(dest, path.relative(src, dir));
}

/**
 * Mappings for the path-driven `scss` command: one CSS file per input,
 * `<stem>.css` or `<stem>#[hash].css`, beside the input unless translated.
 */
export function mappingsFromFiles(
  files: string[],
  scss: ScssConfigResolved,
  cwd: string
): AssetMapping[] {
  const options: SassOptions = {
    style: scss.format,
    sourceMap: scss.sourcemap,
    encoding: scss.encoding,
    loadPaths: scss.load_paths.map((p) => path.resolve(cwd, p)),
  };

  return files.map((file): AssetMapping => {
    const inputPath = path.resolve(cwd, file);
    const outDir = translateOutputDir(path.dirname(inputPath), scss.translate, cwd);
    const name = scss.hash_filenames
      ? `${fileStem(inputPath)}#${HASH_PLACEHOLDER}.css`
      : `${fileStem(inputPath)}.css`;
    return {
      kind: "sass",
      inputPath,
      outputPathTemplate: path.join(outDir, name),
      options,
    };
  });
}
