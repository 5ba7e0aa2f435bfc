import path from "path";
import { describe, expect, it } from "vitest";
import { DEFAULT_TIMEZONE, loadConfig } from "./config.js";
import { ErrorKind } from "./errors.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({}, "/work")).toEqual({
      timeZone: DEFAULT_TIMEZONE,
      logLevel: "info",
      outputDir: "/work",
      openBrowser: true,
    });
  });

  it("reads overrides from the environment", () => {
    expect(
      loadConfig(
        {
          CHAT_TIMEZONE: "Europe/Berlin",
          LOG_LEVEL: "debug",
          CHAT_OUTPUT_DIR: "reports",
          CHAT_OPEN_BROWSER: "false",
        },
        "/work",
      ),
    ).toEqual({
      timeZone: "Europe/Berlin",
      logLevel: "debug",
      outputDir: path.resolve("/work", "reports"),
      openBrowser: false,
    });
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ CHAT_TIMEZONE: "", CHAT_OUTPUT_DIR: "  " }, "/work")).toEqual({
      timeZone: DEFAULT_TIMEZONE,
      logLevel: "info",
      outputDir: "/work",
      openBrowser: true,
    });
  });

  it("rejects unknown values", () => {
    let caught: unknown;
    try {
      loadConfig({ CHAT_OPEN_BROWSER: "maybe" }, "/work");
    } catch (error) {
      caught = error;
    }
    expect(caught).toMatchObject({ kind: ErrorKind.ENVIRONMENT });
  });
});
