import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { dispatch, normalizeOutput } from "../../build/dispatcher";
import type { AssetMapping } from "../../build/types";
import type { AssetCompiler, CompilerRegistry } from "../../compilers/types";
import { createFakeCompilers, makeTempDir, writeFiles } from "../helpers";

function constantCompiler<O>(text: string, sourceMap?: string): AssetCompiler<O> {
  return {
    async compile() {
      return sourceMap === undefined ? { text } : { text, sourceMap };
    },
  };
}

describe("normalizeOutput", () => {
  it("ends the text with exactly one newline", () => {
    expect(normalizeOutput("a{}")).toBe("a{}\n");
    expect(normalizeOutput("a{}  \n\n\n")).toBe("a{}\n");
    expect(normalizeOutput("")).toBe("\n");
  });
});

describe("dispatch", () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir("assetwright-dispatch-test-");
    await writeFiles(root, {
      "src/site.scss": "a {}  \n\n",
      "src/app.js": "x",
      "src/bad.scss": "FAIL",
    });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  function sassMapping(rel: string): AssetMapping {
    return {
      kind: "sass",
      inputPath: path.join(root, rel),
      outputPathTemplate: path.join(root, "dist", "site.css"),
      options: { style: "compressed", sourceMap: false, encoding: "utf8", loadPaths: [] },
    };
  }

  it("normalizes the compiled text", async () => {
    const result = await dispatch(sassMapping("src/site.scss"), createFakeCompilers(), {
      root,
      fileMap: new Map(),
    });

    expect(result).toEqual({
      ok: true,
      artifact: { primaryText: "A {}\n", encoding: "utf8" },
    });
  });

  it("routes by kind", async () => {
    const compilers: CompilerRegistry = {
      sass: constantCompiler("from sass"),
      js: constantCompiler("from js"),
      template: constantCompiler("from template"),
    };
    const mapping: AssetMapping = {
      kind: "js",
      inputPath: path.join(root, "src/app.js"),
      outputPathTemplate: path.join(root, "dist/app.js"),
      options: { keepComments: false, encoding: "utf8" },
    };

    const result = await dispatch(mapping, compilers, { root, fileMap: new Map() });

    expect(result.ok && result.artifact.primaryText).toBe("from js\n");
  });

  it("normalizes the source map too", async () => {
    const compilers: CompilerRegistry = {
      ...createFakeCompilers(),
      sass: constantCompiler("a{}", '{"version":3}'),
    };

    const result = await dispatch(sassMapping("src/site.scss"), compilers, {
      root,
      fileMap: new Map(),
    });

    expect(result.ok && result.artifact.sidecarText).toBe('{"version":3}\n');
  });

  it("records a missing input", async () => {
    const result = await dispatch(sassMapping("src/missing.scss"), createFakeCompilers(), {
      root,
      fileMap: new Map(),
    });

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: "input_not_found",
        inputPath: path.join(root, "src/missing.scss"),
        message: "Path does not exist",
      },
    });
  });

  it("records a compiler rejection", async () => {
    const result = await dispatch(sassMapping("src/bad.scss"), createFakeCompilers(), {
      root,
      fileMap: new Map(),
    });

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: "compile_error",
        inputPath: path.join(root, "src/bad.scss"),
        message: "cannot compile bad.scss",
      },
    });
  });
});
