import { stringify } from "yaml";
import type { Logger } from "../logging";
import type { RunContext, RunOutcome } from "./types";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

/**
 * Failure beats change: a run that both failed and wrote files exits EXIT_FAILURE.
 */
export function resolveExitStatus(outcome: RunOutcome, changedExitCode: number): number {
  if (outcome.errors.size > 0) {
    return EXIT_FAILURE;
  }
  if (outcome.anyChanged) {
    return changedExitCode;
  }
  return EXIT_SUCCESS;
}

/**
 * YAML block of `input path: message`, one literal block per failure,
 * so successive runs can be diffed.
 */
export function formatFailures(errors: ReadonlyMap<string, string>): string {
  return stringify(Object.fromEntries(errors), {
    defaultStringType: "BLOCK_LITERAL",
    defaultKeyType: "PLAIN",
    lineWidth: 0,
  }).trimEnd();
}

export interface ReportOptions {
  changedExitCode: number;
  logger: Logger;
}

export function reportOutcome(
  ctx: RunContext,
  outcome: RunOutcome,
  options: ReportOptions
): number {
  const { logger, changedExitCode } = options;
  ctx.phase = "reported";

  if (outcome.errors.size > 0) {
    logger.error(`Compilations failed:\n${formatFailures(outcome.errors)}`);
    return EXIT_FAILURE;
  }

  logger.info("Compilation succeeded!");
  if (outcome.anyChanged) {
    logger.info("File(s) changed");
  }
  return resolveExitStatus(outcome, changedExitCode);
}
