import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createLogger,
  initLogger,
  logger,
  resolveLevel,
  setLogger,
  type Logger,
} from "../logging";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("implements all required methods", () => {
    const log = createLogger({ noColor: true });

    expect(typeof log.debug).toBe("function");
    expect(typeof log.info).toBe("function");
    expect(typeof log.warn).toBe("function");
    expect(typeof log.error).toBe("function");
    expect(typeof log.json).toBe("function");
  });

  it("accepts additional arguments", () => {
    const log = createLogger({ quiet: true });

    expect(() => log.debug("debug", "arg1")).not.toThrow();
    expect(() => log.info("info", { key: "value" })).not.toThrow();
  });

  it("json writes one JSON line to stdout", () => {
    const consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const log = createLogger();
    const data = { compiled: ["src/site.scss"], changed: true };

    log.json(data);

    expect(consoleLogSpy).toHaveBeenCalledWith(JSON.stringify(data));
  });

  it("initLogger replaces the global logger", () => {
    const original = logger;
    const next = initLogger({ quiet: true });

    expect(next).not.toBe(original);

    setLogger(original);
  });

  it("setLogger installs a custom logger", () => {
    const original = logger;
    const custom: Logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      json: vi.fn(),
    };

    setLogger(custom);
    expect(logger).toBe(custom);

    setLogger(original);
  });
});

describe("resolveLevel", () => {
  it("defaults to info", () => {
    expect(resolveLevel()).toBe("info");
  });

  it("verbose and debug mean debug", () => {
    expect(resolveLevel({ verbose: true })).toBe("debug");
    expect(resolveLevel({ debug: true })).toBe("debug");
  });

  it("quiet means error", () => {
    expect(resolveLevel({ quiet: true })).toBe("error");
  });

  it("verbose wins over quiet", () => {
    expect(resolveLevel({ quiet: true, verbose: true })).toBe("debug");
  });
});
