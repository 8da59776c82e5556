import { InvalidArgumentError } from "commander";
import type { Logger } from "./logging";
import { toExitCode, isAssetwrightError } from "./errors";

export interface CommandOptions {
  verbose?: boolean;
  quiet?: boolean;
  dryRun?: boolean;
  cwd?: string;
}

/**
 * Run a command body that resolves to a process exit code.
 * Fatal errors are logged and mapped through toExitCode.
 */
export async function executeCommand(
  fn: () => Promise<number>,
  logger: Logger,
  options: CommandOptions,
): Promise<never> {
  let code: number;
  try {
    code = await fn();
  } catch (error) {
    handleError(error, logger, options);
    code = toExitCode(error);
  }
  process.exit(code);
}

export function handleError(
  error: unknown,
  logger: Logger,
  options: CommandOptions,
): void {
  if (isAssetwrightError(error)) {
    logger.error(`[${error.code}] ${error.message}`);
  } else if (error instanceof Error) {
    logger.error(error.message);
    if (options.verbose) {
      logger.debug(error.stack || "");
    }
  } else {
    logger.error(String(error));
  }
}

export function setupInterruptHandler(logger: Logger): void {
  let interrupted = false;

  process.on("SIGINT", () => {
    if (interrupted) {
      process.exit(130);
    }
    interrupted = true;
    logger.warn("Interrupted. Press Ctrl+C again to force exit.");
    setTimeout(() => process.exit(130), 100);
  });
}

/**
 * Parse an integer flag value, rejecting anything that is not a whole number.
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`Expected an integer, got '${value}'.`);
  }
  return parseInt(value, 10);
}

export function collectValues(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
