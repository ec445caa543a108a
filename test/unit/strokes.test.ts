import { describe, expect, it } from "vitest";
import { rasterizeSegment, segmentsFromCoordinates } from "../../src/bridge/spline.js";
import { MemoryControl, MemoryDocument, MemorySettings, MemoryToolHandler, ScriptedDialogs } from "../../src/host/memory/index.js";
import { DEFAULT_FONT } from "../../src/host/memory/memoryDocument.js";
import type { HostElement, StrokeElement } from "../../src/host/types.js";
import { NO_FILL, NO_PRESSURE } from "../../src/types/contracts.js";
import { StateError, ValidationError } from "../../src/utils/errors.js";
import { createHarness, warnings, type Harness } from "../helpers/harness.js";

function strokesOf(harness: Harness): StrokeElement[] {
  const page = harness.control.getCurrentPage();
  const elements: readonly HostElement[] = page ? page.getSelectedLayer().getElements() : [];
  return elements.filter((element): element is StrokeElement => element.kind === "stroke");
}

function onlyStroke(harness: Harness): StrokeElement {
  const strokes = strokesOf(harness);
  expect(strokes).toHaveLength(1);
  return strokes[0];
}

describe("addStroke", () => {
  it("commits one stroke with the supplied pressures", () => {
    const harness = createHarness();
    harness.app.addStroke({ x: [1, 2, 3], y: [4, 5, 6], pressure: [0.5, 0.6, 0.7] });

    const stroke = onlyStroke(harness);
    expect(stroke.points).toEqual([
      { x: 1, y: 4, pressure: 0.5 },
      { x: 2, y: 5, pressure: 0.6 },
      { x: 3, y: 6, pressure: 0.7 }
    ]);
    expect(stroke).toMatchObject({ toolType: "pen", width: 1.41, color: 0x3333cc, fill: NO_FILL, lineStyle: "plain" });
  });

  it("accepts 1-based tables written as objects", () => {
    const harness = createHarness();
    harness.app.addStroke({ x: { 1: 10, 2: 20 }, y: { 1: 30, 2: 40 }, pressure: { 1: 1, 2: 1 } });

    expect(onlyStroke(harness).points).toEqual([
      { x: 10, y: 30, pressure: 1 },
      { x: 20, y: 40, pressure: 1 }
    ]);
  });

  it("assumes no pressure when the pressure table is missing", () => {
    const harness = createHarness();
    harness.app.addStroke({ x: [0, 5], y: [0, 5] });

    expect(onlyStroke(harness).points.map((point) => point.pressure)).toEqual([NO_PRESSURE, NO_PRESSURE]);
    expect(warnings(harness)).toEqual(["[test] WARN Missing pressure table. Assuming NO_PRESSURE.\n"]);
  });

  it("rejects coordinate tables of different length without touching the layer", () => {
    const harness = createHarness();

    expect(() => harness.app.addStroke({ x: [1, 2, 3], y: [1, 2] })).toThrow("X and Y vectors are not equal length!");
    expect(() => harness.app.addStroke({ x: [1, 2], y: [1, 2], pressure: [1] })).toThrow(
      "Pressure vector is not equal length!"
    );
    expect(() => harness.app.addStroke({ x: [1, 2] })).toThrow("Missing Y-Coordinate table!");
    expect(() => harness.app.addStroke({ y: [1, 2] })).toThrow("Missing X-Coordinate table!");
    expect(() => harness.app.addStroke("stroke")).toThrow(ValidationError);
    expect(strokesOf(harness)).toHaveLength(0);
  });

  it("rejects coordinate tables with holes", () => {
    const harness = createHarness();

    expect(() => harness.app.addStroke({ x: [1, , 3], y: [1, 2, 3] })).toThrow(ValidationError);
    expect(() => harness.app.addStroke({ x: [1, , 3], y: [1, 2, 3] })).toThrow(
      "Bad 'x' entry 1 (number expected, got undefined)"
    );
    expect(strokesOf(harness)).toHaveLength(0);
  });

  it("discards strokes with fewer than two points", () => {
    const harness = createHarness();
    harness.app.addStroke({ x: [1], y: [1], pressure: [1] });

    expect(strokesOf(harness)).toHaveLength(0);
    expect(warnings(harness)).toEqual(["[test] WARN Stroke has 1 points, at least 2 needed. Discarding.\n"]);
  });

  it("takes unset attributes from the tool at call time", () => {
    const harness = createHarness();
    harness.control.getToolHandler().getTool("pen").setColor(0x123456);

    harness.app.addStroke({ x: [0, 1], y: [0, 1], pressure: [1, 1], width: 5 });

    expect(onlyStroke(harness)).toMatchObject({ width: 5, color: 0x123456 });
  });

  it("resolves highlighter attributes from the highlighter", () => {
    const harness = createHarness();
    harness.app.addStroke({ x: [0, 1], y: [0, 1], pressure: [1, 1], tool: "highlighter" });

    expect(onlyStroke(harness)).toMatchObject({ toolType: "highlighter", width: 8.5, color: 0xffff00, fill: NO_FILL, lineStyle: "plain" });
  });

  it("uses the fill opacity of a tool with fill enabled", () => {
    const harness = createHarness();
    harness.control.getToolHandler().getTool("pen").configure({ fill: true });

    harness.app.addStroke({ x: [0, 1], y: [0, 1], pressure: [1, 1] });
    harness.app.addStroke({ x: [0, 1], y: [0, 1], pressure: [1, 1], fill: 200 });

    expect(strokesOf(harness).map((stroke) => stroke.fill)).toEqual([128, 200]);
  });

  it("parses line styles and falls back to plain", () => {
    const harness = createHarness();
    harness.app.addStroke({ x: [0, 1], y: [0, 1], pressure: [1, 1], lineStyle: "dashed" });
    harness.app.addStroke({ x: [0, 1], y: [0, 1], pressure: [1, 1], lineStyle: "wavy" });

    expect(strokesOf(harness).map((stroke) => stroke.lineStyle)).toEqual(["dash", "plain"]);
  });

  it("degrades bad attributes to warnings", () => {
    const harness = createHarness();
    harness.app.addStroke({ x: [0, 1], y: [0, 1], pressure: [1, 1], tool: "brush", color: 0x1000000 });
    harness.app.addStroke({ x: [0, 1], y: [0, 1], pressure: [1, 1], color: "0xff0000" });

    expect(strokesOf(harness).map((stroke) => [stroke.toolType, stroke.color])).toEqual([
      ["pen", 0x3333cc],
      ["pen", 0x3333cc]
    ]);
    expect(warnings(harness)).toEqual([
      '[test] WARN DOMAIN: Unknown stroke type: "brush", defaulting to pen\n',
      "[test] WARN DOMAIN: Color 0x1000000 is no valid RGB color\n",
      "[test] WARN VALIDATION: Ignoring field 'color': unexpected string value\n"
    ]);
  });

  it("needs a current page", () => {
    const empty = new MemoryControl({
      document: new MemoryDocument([]),
      currentPage: 0,
      toolHandler: new MemoryToolHandler(),
      dialogs: new ScriptedDialogs(),
      settings: new MemorySettings(72, DEFAULT_FONT)
    });
    const harness = createHarness({}, {}, empty);

    expect(() => harness.app.addStroke({ x: [0, 1], y: [0, 1] })).toThrow(StateError);
    expect(() => harness.app.addStroke({ x: [0, 1], y: [0, 1] })).toThrow("No page!");
    expect(warnings(harness)).toEqual([]);
  });
});

describe("addSpline", () => {
  it("commits one stroke through all segments", () => {
    const harness = createHarness();
    harness.app.addSpline({ splines: [0, 0, 1, 0, 2, 0, 3, 0, 3, 0, 4, 0, 5, 0, 6, 0], width: 2.26 });

    const stroke = onlyStroke(harness);
    expect(stroke.points).toEqual([
      { x: 0, y: 0, pressure: NO_PRESSURE },
      { x: 3, y: 0, pressure: NO_PRESSURE },
      { x: 3, y: 0, pressure: NO_PRESSURE },
      { x: 6, y: 0, pressure: NO_PRESSURE }
    ]);
    expect(stroke.width).toBe(2.26);
  });

  it("holds as many points as the rasterized segments", () => {
    const coordinates = [0, 0, 0, 10, 10, 10, 10, 0];
    const harness = createHarness();
    harness.app.addSpline({ splines: coordinates });

    const expected = segmentsFromCoordinates(coordinates).flatMap((segment) => rasterizeSegment(segment));
    expect(onlyStroke(harness).points).toEqual(expected);
  });

  it("rejects incomplete and missing spline tables", () => {
    const harness = createHarness();

    expect(() => harness.app.addSpline({ splines: [0, 0, 1, 1, 2, 2, 3, 3, 4] })).toThrow("Spline table incomplete!");
    expect(() => harness.app.addSpline({ width: 1 })).toThrow("Missing Spline table!");
    expect(strokesOf(harness)).toHaveLength(0);
  });
});
