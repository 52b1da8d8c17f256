import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { UsageError } from "./errors.js";

describe("loadConfig", () => {
  it("should default to warn without a log file", () => {
    expect(loadConfig({})).toEqual({ logLevel: "warn" });
  });

  it("should read level and file from the environment", () => {
    const config = loadConfig({
      NOTES_TOOLKIT_LOG_LEVEL: "DEBUG",
      NOTES_TOOLKIT_LOG_FILE: "/tmp/notes-toolkit.log",
    });

    expect(config).toEqual({ logLevel: "debug", logFile: "/tmp/notes-toolkit.log" });
  });

  it("should treat empty variables as unset", () => {
    expect(loadConfig({ NOTES_TOOLKIT_LOG_LEVEL: "", NOTES_TOOLKIT_LOG_FILE: "" })).toEqual({
      logLevel: "warn",
    });
  });

  it("should reject an unknown level", () => {
    expect(() => loadConfig({ NOTES_TOOLKIT_LOG_LEVEL: "loud" })).toThrow(UsageError);
  });
});
