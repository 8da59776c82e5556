import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { fileExists, tryReadBytes } from "../../fs/util";
import { makeTempDir } from "../helpers";

describe("fs util", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("fileExists is true for files only", async () => {
    const filePath = path.join(tempDir, "site.scss");
    await fs.writeFile(filePath, "a {}");

    expect(await fileExists(filePath)).toBe(true);
    expect(await fileExists(tempDir)).toBe(false);
    expect(await fileExists(path.join(tempDir, "nope.scss"))).toBe(false);
  });

  it("tryReadBytes returns the raw bytes", async () => {
    const filePath = path.join(tempDir, "a.css");
    await fs.writeFile(filePath, "a{}\n");

    const result = await tryReadBytes(filePath);

    expect(result.status).toBe("ok");
    if (result.status === "ok") {
      expect(result.content.toString("utf8")).toBe("a{}\n");
    }
  });

  it("tryReadBytes reports a missing file", async () => {
    const result = await tryReadBytes(path.join(tempDir, "missing.css"));
    expect(result).toEqual({ status: "not_found" });
  });

  it("tryReadBytes rethrows other errors", async () => {
    await expect(tryReadBytes(tempDir)).rejects.toThrow();
  });
});
