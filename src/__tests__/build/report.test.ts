import { describe, it, expect } from "vitest";
import { parse } from "yaml";
import { createRunContext } from "../../build/pipeline";
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  formatFailures,
  reportOutcome,
  resolveExitStatus,
} from "../../build/report";
import type { RunOutcome } from "../../build/types";
import { createMockLogger } from "../helpers";

function outcome(overrides: Partial<RunOutcome> = {}): RunOutcome {
  return {
    anyChanged: false,
    errors: new Map(),
    compiled: [],
    changes: [],
    aborted: false,
    ...overrides,
  };
}

describe("resolveExitStatus", () => {
  it("is success when nothing happened", () => {
    expect(resolveExitStatus(outcome(), 3)).toBe(EXIT_SUCCESS);
  });

  it("is the changed code when files changed", () => {
    expect(resolveExitStatus(outcome({ anyChanged: true }), 3)).toBe(3);
  });

  it("prefers failure over change", () => {
    const result = outcome({ anyChanged: true, errors: new Map([["a.scss", "x"]]) });
    expect(resolveExitStatus(result, 3)).toBe(EXIT_FAILURE);
  });
});

describe("formatFailures", () => {
  it("renders a YAML mapping of path to message", () => {
    const errors = new Map([
      ["src/b.scss", "Expected expression.\n  ╷\n1 │ a { color: }\n  ╵"],
      ["src/a.scss", "Path does not exist"],
    ]);

    const text = formatFailures(errors);

    expect(parse(text)).toEqual({
      "src/b.scss": "Expected expression.\n  ╷\n1 │ a { color: }\n  ╵",
      "src/a.scss": "Path does not exist",
    });
    expect(text.indexOf("src/b.scss")).toBeLessThan(text.indexOf("src/a.scss"));
    expect(text.endsWith("\n")).toBe(false);
  });
});

describe("reportOutcome", () => {
  const ctx = () =>
    createRunContext({ root: "/repo", dryRun: false, logger: createMockLogger(), policy: "stop" });

  it("logs the failure block and returns 1", () => {
    const logger = createMockLogger();
    const run = ctx();
    const errors = new Map([["src/a.scss", "Path does not exist"]]);

    const code = reportOutcome(run, outcome({ errors }), { changedExitCode: 3, logger });

    expect(code).toBe(1);
    expect(logger.error).toHaveBeenCalledWith(`Compilations failed:\n${formatFailures(errors)}`);
    expect(logger.info).not.toHaveBeenCalled();
    expect(run.phase).toBe("reported");
  });

  it("announces success and change", () => {
    const logger = createMockLogger();

    const code = reportOutcome(ctx(), outcome({ anyChanged: true }), {
      changedExitCode: 4,
      logger,
    });

    expect(code).toBe(4);
    expect(logger.info).toHaveBeenNthCalledWith(1, "Compilation succeeded!");
    expect(logger.info).toHaveBeenNthCalledWith(2, "File(s) changed");
  });
});
