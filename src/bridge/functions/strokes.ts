import { NO_PRESSURE, type Point } from "../../types/contracts.js";
import { ValidationError } from "../../utils/errors.js";
import { isAbsent } from "../coercion.js";
import { decodeSequence, requireTable, type ScriptTable } from "../tableMarshaler.js";
import { defineEntryPoints, requireCurrentPage } from "../entryPoint.js";
import { rasterizeSegment, segmentsFromCoordinates } from "../spline.js";
import { MIN_STROKE_POINTS, StrokeDraft, resolveStrokeAttributes } from "../strokeDraft.js";
import type { PluginContext } from "../context.js";

function requireSequence(table: ScriptTable, field: string, missingMessage: string): number[] {
  if (isAbsent(table[field])) {
    throw new ValidationError(missingMessage, { field });
  }
  return decodeSequence(table[field], field, "number");
}

function samplePoints(context: PluginContext, table: ScriptTable): Point[] {
  const xs = requireSequence(table, "x", "Missing X-Coordinate table!");
  const ys = requireSequence(table, "y", "Missing Y-Coordinate table!");
  if (xs.length !== ys.length) {
    throw new ValidationError("X and Y vectors are not equal length!", { x: xs.length, y: ys.length });
  }

  let pressures: number[] | undefined;
  if (isAbsent(table.pressure)) {
    context.logger.warn("Missing pressure table. Assuming NO_PRESSURE.");
  } else {
    pressures = decodeSequence(table.pressure, "pressure", "number");
    if (pressures.length !== xs.length) {
      throw new ValidationError("Pressure vector is not equal length!", {
        points: xs.length,
        pressure: pressures.length
      });
    }
  }

  return xs.map((x, index) => ({ x, y: ys[index], pressure: pressures?.[index] ?? NO_PRESSURE }));
}

/**
 * Decodes everything first and touches the layer last, so a failing call
 * leaves the page as it was.
 */
function commitDraft(context: PluginContext, table: ScriptTable, points: () => Point[]): void {
  const page = requireCurrentPage(context);
  const draft = new StrokeDraft();
  draft.addPoints(points());

  if (!draft.isCommittable) {
    context.logger.warn(`Stroke has ${draft.pointCount} points, at least ${MIN_STROKE_POINTS} needed. Discarding.`);
    return;
  }

  const attributes = resolveStrokeAttributes(table, context.control.getToolHandler(), context.warnSink);
  const stroke = draft.commit(page, attributes);
  context.logger.debug(`Added ${stroke.toolType} stroke ${stroke.id} with ${stroke.points.length} points`);
}

export const strokeEntryPoints = defineEntryPoints("stroke", {
  addStroke: {
    usage: 'app.addStroke({ x: [110, 120, 130], y: [200, 190, 200], pressure: [1, 1, 1], tool: "pen" })',
    body: (context, args) => {
      const table = requireTable(args[0], "argument #1 to 'addStroke'");
      commitDraft(context, table, () => samplePoints(context, table));
      return undefined;
    }
  },

  addSpline: {
    usage: "app.addSpline({ splines: [x0, y0, c1x, c1y, c2x, c2y, x1, y1], width: 2.26 })",
    body: (context, args) => {
      const table = requireTable(args[0], "argument #1 to 'addSpline'");
      commitDraft(context, table, () => {
        const coordinates = requireSequence(table, "splines", "Missing Spline table!");
        return segmentsFromCoordinates(coordinates).flatMap(rasterizeSegment);
      });
      return undefined;
    }
  }
});
