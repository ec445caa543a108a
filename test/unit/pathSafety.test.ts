import { resolve } from "node:path";
import { describe, expect, it } from "vitest";
import { ensureInsideRoot, sanitizePluginFolder } from "../../src/utils/pathSafety.js";

describe("path safety", () => {
  it("resolves paths inside the root", () => {
    expect(ensureInsideRoot("/work", "docs/seed.json")).toBe(resolve("/work/docs/seed.json"));
    expect(ensureInsideRoot("/work", "/work/plugins/Hello")).toBe(resolve("/work/plugins/Hello"));
  });

  it("rejects paths that leave the root", () => {
    expect(() => ensureInsideRoot("/work", "../etc/passwd")).toThrow("Path escapes root: ../etc/passwd");
    expect(() => ensureInsideRoot("/work/plugins", "/work/other")).toThrow("Path escapes root: /work/other");
  });

  it("accepts plain plugin folder names only", () => {
    expect(sanitizePluginFolder("Color Cycle_2.0")).toBe("Color Cycle_2.0");
    expect(() => sanitizePluginFolder(".hidden")).toThrow("Invalid plugin folder name");
    expect(() => sanitizePluginFolder("a/b")).toThrow("Invalid plugin folder name");
  });
});
