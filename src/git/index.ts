import { spawn } from "node:child_process";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Logger } from "../logging";
import { GitError, NotGitRepoError } from "../errors";

export interface GitOptions {
  cwd: string;
  logger: Logger;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Registers newly created files with the version-control index so that
 * tooling inspecting the index (pre-commit) sees them in the same cycle.
 */
export interface FileStager {
  stageFile(absolutePath: string): Promise<void>;
}

export async function runGitCommand(
  args: string[],
  options: GitOptions
): Promise<CommandResult> {
  const { cwd, logger } = options;

  logger.debug(`Running: git ${args.join(" ")}`);

  return new Promise((resolve) => {
    let proc: ReturnType<typeof spawn> | undefined;

    try {
      proc = spawn("git", args, {
        cwd,
        stdio: ["pipe", "pipe", "pipe"],
      });
    } catch {
      resolve({ stdout: "", stderr: "", exitCode: 1 });
      return;
    }

    if (!proc || typeof proc.on !== "function") {
      resolve({ stdout: "", stderr: "", exitCode: 1 });
      return;
    }

    let stdout = "";
    let stderr = "";

    proc.stdout?.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("close", (code: number | null) => {
      if (code !== 0 && stderr) {
        logger.debug(`Command stderr: ${stderr}`);
      }
      resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode: code ?? 0 });
    });

    proc.on("error", (err: Error) => {
      logger.debug(`Command error: ${err.message}`);
      resolve({ stdout: "", stderr: err.message, exitCode: 1 });
    });
  });
}

/**
 * Absolute path of the work tree containing `cwd`, or null outside a repository.
 */
export async function getWorkTreeRoot(options: GitOptions): Promise<string | null> {
  const result = await runGitCommand(["rev-parse", "--show-toplevel"], options);
  if (result.exitCode !== 0 || !result.stdout) {
    return null;
  }
  return path.resolve(result.stdout);
}

export async function stageFile(
  absolutePath: string,
  options: GitOptions
): Promise<void> {
  const result = await runGitCommand(["add", "--", absolutePath], options);
  if (result.exitCode !== 0) {
    throw new GitError(
      `Failed to add ${absolutePath} to git index${result.stderr ? `: ${result.stderr}` : ""}`
    );
  }
  options.logger.debug(`Added to git index: ${absolutePath}`);
}

export interface GitStagerOptions extends GitOptions {
  /**
   * When true, `cwd` itself must be the top level of the work tree,
   * not merely somewhere inside it.
   */
  requireTopLevel?: boolean;
}

async function realpathOrSelf(p: string): Promise<string> {
  try {
    return await fs.realpath(p);
  } catch {
    return path.resolve(p);
  }
}

/**
 * Verify the repository up front and return a stager bound to it.
 */
export async function createGitStager(
  options: GitStagerOptions
): Promise<FileStager> {
  const { requireTopLevel = false, ...gitOptions } = options;
  const workTree = await getWorkTreeRoot(gitOptions);

  if (workTree === null) {
    throw new NotGitRepoError(
      `Not a git repository: ${options.cwd} (use --no-git-add)`
    );
  }

  if (requireTopLevel) {
    const [actual, expected] = await Promise.all([
      realpathOrSelf(workTree),
      realpathOrSelf(options.cwd),
    ]);
    if (actual !== expected) {
      throw new NotGitRepoError(
        `Config file not the root of a git repository (use --no-git-add): ${options.cwd}`
      );
    }
  }

  return {
    stageFile: (absolutePath: string) => stageFile(absolutePath, gitOptions),
  };
}
