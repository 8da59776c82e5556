import type { CompilationFailure } from "./types";

export type ErrorPolicy = "stop" | "continue";

/** What the caller should do after a failure has been recorded. */
export type FailureVerdict = "abort" | "continue";

/**
 * Ordered per-input failure log. A repeated input path replaces its previous
 * message but keeps its original position.
 */
export class ErrorAggregator {
  private readonly failures = new Map<string, string>();

  constructor(public readonly policy: ErrorPolicy) {}

  record(failure: CompilationFailure): FailureVerdict {
    this.failures.set(failure.inputPath, failure.message);
    return this.policy === "stop" ? "abort" : "continue";
  }

  get size(): number {
    return this.failures.size;
  }

  hasErrors(): boolean {
    return this.failures.size > 0;
  }

  snapshot(): ReadonlyMap<string, string> {
    return new Map(this.failures);
  }
}

export function policyFromFlags(flags: {
  stopOnError?: boolean;
  continueOnError?: boolean;
}): ErrorPolicy {
  if (flags.stopOnError !== undefined) {
    return flags.stopOnError ? "stop" : "continue";
  }
  return flags.continueOnError ? "continue" : "stop";
}
