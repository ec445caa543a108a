import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig, parseArg } from "../../src/config.js";

describe("loadConfig", () => {
  it("falls back to the working directory and defaults", () => {
    expect(loadConfig([], {}, "/work")).toEqual({
      workspaceRoot: "/work",
      pluginDir: join("/work", "plugins"),
      documentPath: undefined,
      logLevel: "info",
      displayDpi: 72
    });
  });

  it("prefers flags over environment variables", () => {
    const config = loadConfig(
      ["node", "inkscript-bridge", "--plugins", "/opt/plugins", "--log-level", "debug", "--dpi", "96"],
      { INKSCRIPT_PLUGIN_DIR: "/env/plugins", INKSCRIPT_LOG_LEVEL: "warn", INKSCRIPT_DOCUMENT: "/env/doc.json" },
      "/work"
    );

    expect(config).toEqual({
      workspaceRoot: "/work",
      pluginDir: "/opt/plugins",
      documentPath: "/env/doc.json",
      logLevel: "debug",
      displayDpi: 96
    });
  });

  it("rejects invalid settings", () => {
    expect(() => loadConfig([], { INKSCRIPT_DISPLAY_DPI: "0" }, "/work")).toThrow(
      "Invalid configuration: displayDpi: Number must be greater than or equal to 1"
    );
    expect(() => loadConfig(["--log-level", "loud"], {}, "/work")).toThrow(/^Invalid configuration: logLevel: /);
  });
});

describe("parseArg", () => {
  it("reads the value after a flag", () => {
    expect(parseArg(["--dpi", "120"], "--dpi")).toBe("120");
    expect(parseArg(["--dpi"], "--dpi")).toBeUndefined();
    expect(parseArg([], "--dpi")).toBeUndefined();
  });
});
