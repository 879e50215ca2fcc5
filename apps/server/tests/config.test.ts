import { afterEach, describe, it, expect, vi } from "vitest";
import { loadConfig } from "../src/config.js";
import { createConsoleLogger } from "../src/logger.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({ port: 3000, host: "0.0.0.0", logLevel: "info" });
  });

  it("reads overrides", () => {
    expect(loadConfig({ PORT: "8080", HOST: "127.0.0.1", LOG_LEVEL: "debug" })).toEqual({
      port: 8080,
      host: "127.0.0.1",
      logLevel: "debug",
    });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ PORT: "", HOST: "", LOG_LEVEL: "" })).toEqual({ port: 3000, host: "0.0.0.0", logLevel: "info" });
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow("Invalid configuration: PORT");
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow("Invalid configuration: PORT");
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow("Invalid configuration: LOG_LEVEL");
  });
});

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    createConsoleLogger("test").info("hello", { a: 1 });
    expect(info).toHaveBeenCalledWith("[test] hello", { a: 1 });
  });

  it("drops entries below the configured level", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const logger = createConsoleLogger("test", "warn");
    logger.info("skipped");
    logger.warn("kept");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[test] kept", "");
  });

  it("logs nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    createConsoleLogger("test", "silent").error("hidden");
    expect(error).not.toHaveBeenCalled();
  });
});
