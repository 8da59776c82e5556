import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  contentHash,
  findHashVariants,
  isHashedTemplate,
  removeStaleVariants,
  resolveOutputPath,
  variantPattern,
} from "../../build/hash";
import { createMockLogger, listFiles, makeTempDir, writeFiles } from "../helpers";

describe("contentHash", () => {
  it("is the md5 hex digest", () => {
    expect(contentHash("")).toBe("d41d8cd98f00b204e9800998ecf8427e");
    expect(contentHash("abc")).toBe("900150983cd24fb0d6963f7d28e17f72");
  });

  it("is deterministic", () => {
    expect(contentHash("a{color:red}\n")).toBe(contentHash("a{color:red}\n"));
  });
});

describe("resolveOutputPath", () => {
  it("substitutes the digest in the file name", () => {
    expect(resolveOutputPath("/out/site.[hash].css", "abc")).toEqual({
      finalPath: path.join("/out", "site.abc.css"),
      isHashed: true,
    });
  });

  it("leaves plain templates alone", () => {
    expect(resolveOutputPath("/out/site.css", "abc")).toEqual({
      finalPath: "/out/site.css",
      isHashed: false,
    });
  });

  it("only looks at the file name", () => {
    expect(isHashedTemplate("/out/[hash]/site.css")).toBe(false);
    expect(isHashedTemplate("/out/site#[hash].css")).toBe(true);
  });
});

const OLD = "1".repeat(32);
const CURRENT = "2".repeat(32);
const DIR = "d".repeat(32);

describe("variantPattern", () => {
  it("matches a digest between the fixed parts", () => {
    const pattern = variantPattern("/out/site.[hash].css");

    expect(pattern.test(`site.${contentHash("abc")}.css`)).toBe(true);
    expect(pattern.test("site..css")).toBe(false);
    expect(pattern.test("site.0123abcd.css")).toBe(false);
    expect(pattern.test(`site.${"A".repeat(32)}.css`)).toBe(false);
    expect(pattern.test(`other.${OLD}.css`)).toBe(false);
    expect(pattern.test(`site.${OLD}.css.map`)).toBe(false);
  });

  it("does not claim outputs of a template sharing its prefix", () => {
    const pattern = variantPattern("/out/app.[hash].css");

    expect(pattern.test(`app.${OLD}.css`)).toBe(true);
    expect(pattern.test(`app.${OLD}.min.css`)).toBe(false);
  });

  it("treats regex characters literally", () => {
    const pattern = variantPattern("/out/a+b.[hash].css");

    expect(pattern.test(`a+b.${OLD}.css`)).toBe(true);
    expect(pattern.test(`aab.${OLD}.css`)).toBe(false);
  });
});

describe("stale variants", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("assetwright-hash-test-");
    await writeFiles(tempDir, {
      [`site.${OLD}.css`]: "old",
      [`site.${CURRENT}.css`]: "current",
      [`site.${OLD}.min.css`]: "neighbour",
      "site.custom.css": "hand-written",
      "other.css": "unrelated",
    });
    await fs.mkdir(path.join(tempDir, `site.${DIR}.css`));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("finds files produced by the same template", async () => {
    const variants = await findHashVariants(path.join(tempDir, "site.[hash].css"));

    expect(variants).toEqual([
      path.join(tempDir, `site.${OLD}.css`),
      path.join(tempDir, `site.${CURRENT}.css`),
    ]);
  });

  it("finds nothing in a missing directory", async () => {
    expect(await findHashVariants(path.join(tempDir, "nope", "site.[hash].css"))).toEqual([]);
  });

  it("removes every variant except the current one", async () => {
    const logger = createMockLogger();

    const result = await removeStaleVariants(
      path.join(tempDir, "site.[hash].css"),
      path.join(tempDir, `site.${CURRENT}.css`),
      { dryRun: false, logger }
    );

    expect(result).toEqual({ removed: [path.join(tempDir, `site.${OLD}.css`)], changed: true });
    expect(await listFiles(tempDir)).toEqual([
      "other.css",
      `site.${OLD}.min.css`,
      `site.${CURRENT}.css`,
      "site.custom.css",
      `site.${DIR}.css`,
    ]);
    expect(logger.debug).toHaveBeenCalledWith(`Removed: ${path.join(tempDir, `site.${OLD}.css`)}`);
  });

  it("keeps files on a dry run and reports no change", async () => {
    const result = await removeStaleVariants(
      path.join(tempDir, "site.[hash].css"),
      path.join(tempDir, `site.${"3".repeat(32)}.css`),
      { dryRun: true, logger: createMockLogger() }
    );

    expect(result.removed).toHaveLength(2);
    expect(result.changed).toBe(false);
    expect(await listFiles(tempDir)).toHaveLength(6);
  });
});
