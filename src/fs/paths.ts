import * as path from "node:path";

export const DEFAULT_CONFIG_FILE = "assetwright.yml";

export function resolveCwd(cwdOption?: string): string {
  if (cwdOption) {
    return path.resolve(cwdOption);
  }
  return process.cwd();
}

/**
 * The run root is the directory holding the configuration file;
 * every path in the file is relative to it.
 */
export function getRunRoot(configPath: string): string {
  return path.dirname(path.resolve(configPath));
}

export function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

/**
 * Root-relative, forward-slash key used for the run's file map.
 */
export function toRootKey(root: string, filePath: string): string {
  return toPosix(path.relative(root, path.resolve(root, filePath)));
}

/**
 * File name without its last extension: `a/b/site.scss` -> `site`.
 */
export function fileStem(filePath: string): string {
  const base = path.basename(filePath);
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * True when `child` equals `parent` or lies beneath it.
 */
export function isWithin(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}
