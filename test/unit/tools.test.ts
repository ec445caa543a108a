import { describe, expect, it } from "vitest";
import { createHarness, warnings } from "../helpers/harness.js";

describe("getToolInfo", () => {
  it("describes the active tool", () => {
    const harness = createHarness();

    expect(harness.app.getToolInfo("active")).toEqual({
      type: "pen",
      size: { name: "medium", value: 1.41 },
      color: 0x3333cc,
      fillOpacity: 128,
      drawingType: "default",
      lineStyle: "plain"
    });
  });

  it("describes pen and highlighter", () => {
    const harness = createHarness();
    harness.control.getToolHandler().getTool("highlighter").configure({ fill: true, size: "thick" });

    expect(harness.app.getToolInfo("pen")).toEqual({
      size: { name: "medium", value: 1.41 },
      color: 0x3333cc,
      drawingType: "default",
      lineStyle: "plain",
      filled: false,
      fillOpacity: 128
    });
    expect(harness.app.getToolInfo("highlighter")).toEqual({
      size: { name: "thick", value: 19.84 },
      color: 0xffff00,
      drawingType: "default",
      filled: true,
      fillOpacity: 128
    });
  });

  it("describes eraser and text", () => {
    const harness = createHarness({}, { font: { name: "Serif", size: 14 } });
    harness.control.getToolHandler().setEraserType("whiteout");

    expect(harness.app.getToolInfo("eraser")).toEqual({ type: "whiteout", size: { name: "medium", value: 8.5 } });
    expect(harness.app.getToolInfo("text")).toEqual({ font: { name: "Serif", size: 14 }, color: 0 });
  });

  it("reads unknown modes and a missing tool as empty", () => {
    expect(createHarness().app.getToolInfo("brush")).toEqual({});
    expect(createHarness({}, { activeTool: null }).app.getToolInfo("active")).toEqual({});
  });

  it("needs a mode", () => {
    expect(() => createHarness().app.getToolInfo()).toThrow("Missing argument #1 'mode' (string expected)");
  });
});

describe("changeToolColor", () => {
  it("recolors the active tool", () => {
    const harness = createHarness();
    harness.app.changeToolColor({ color: 0xff0000 });

    expect(harness.control.getToolHandler().getTool("pen").getColor()).toBe(0xff0000);
    expect(harness.control.events).toEqual([{ type: "toolColorChanged", tool: "pen", color: 0xff0000 }]);
  });

  it("recolors the selection on request", () => {
    const harness = createHarness();
    harness.app.changeToolColor({ color: 0x00ff00, selection: true });

    expect(harness.control.events).toEqual([
      { type: "toolColorChanged", tool: "pen", color: 0x00ff00 },
      { type: "selectionRecolored", color: 0x00ff00 }
    ]);
  });

  it("recolors a named tool regardless of case", () => {
    const harness = createHarness();
    harness.app.changeToolColor({ color: 0x00ff00, tool: "HIGHLIGHTER" });

    expect(harness.control.getToolHandler().getTool("highlighter").getColor()).toBe(0x00ff00);
    expect(harness.control.getToolHandler().getTool("pen").getColor()).toBe(0x3333cc);
  });

  it("keeps the current color when none is given", () => {
    const harness = createHarness();
    harness.app.changeToolColor({ color: "red" });

    expect(harness.control.getToolHandler().getTool("pen").getColor()).toBe(0x3333cc);
    expect(harness.control.events).toEqual([{ type: "toolColorChanged", tool: "pen", color: 0x3333cc }]);
    expect(warnings(harness)).toEqual(["[test] WARN VALIDATION: Ignoring field 'color': unexpected string value\n"]);
  });

  it("warns and does nothing for unknown or missing tools", () => {
    const harness = createHarness();
    harness.app.changeToolColor({ color: 0xff0000, tool: "brush" });

    const idle = createHarness({}, { activeTool: null });
    idle.app.changeToolColor({ color: 0xff0000 });

    expect(harness.control.events).toEqual([]);
    expect(warnings(harness)).toEqual([
      '[test] WARN DOMAIN: tool "brush" is not valid or no tool has been selected\n'
    ]);
    expect(idle.control.events).toEqual([]);
    expect(warnings(idle)).toEqual(['[test] WARN DOMAIN: tool "none" is not valid or no tool has been selected\n']);
  });

  it("warns for tools without a color", () => {
    const harness = createHarness();
    harness.app.changeToolColor({ color: 0xff0000, tool: "eraser" });

    expect(harness.control.events).toEqual([]);
    expect(warnings(harness)).toEqual(['[test] WARN CAPABILITY: tool "eraser" has no color capability\n']);
  });

  it("warns for colors outside RGB and keeps the old one", () => {
    const harness = createHarness();
    harness.app.changeToolColor({ color: 0x1000000 });

    expect(harness.control.getToolHandler().getTool("pen").getColor()).toBe(0x3333cc);
    expect(harness.control.events).toEqual([]);
    expect(warnings(harness)).toEqual(["[test] WARN DOMAIN: Color 0x1000000 is no valid RGB color\n"]);
  });

  it("needs a table", () => {
    expect(() => createHarness().app.changeToolColor(0xff0000)).toThrow(
      "Bad argument #1 to 'changeToolColor' (table expected, got number)"
    );
  });
});
