import {
  LINE_STYLES,
  NO_FILL,
  strokeAttributesTableSchema,
  type DrawingType,
  type LineStyle,
  type Point,
  type StrokeToolType,
  type ToolSize,
  type ToolType
} from "../types/contracts.js";
import type { HostPage, HostTool, NewStroke, StrokeElement, ToolHandler } from "../host/types.js";
import { DomainError } from "../utils/errors.js";
import { checkColor, type WarningSink } from "./coercion.js";
import { decodeRecord, type ScriptTable } from "./tableMarshaler.js";

export const MIN_STROKE_POINTS = 2;

/** What a tool looked like when attribute resolution started. */
export interface ToolAttributeSnapshot {
  toolType: ToolType;
  sizeName: ToolSize;
  thickness: number;
  color: number;
  filled: boolean;
  fillOpacity: number;
  drawingType: DrawingType;
  lineStyle: LineStyle;
}

export function snapshotTool(tool: HostTool): ToolAttributeSnapshot {
  const sizeName = tool.getSize();
  return {
    toolType: tool.type,
    sizeName,
    thickness: tool.getThickness(sizeName),
    color: tool.getColor(),
    filled: tool.isFillEnabled(),
    fillOpacity: tool.getFillOpacity(),
    drawingType: tool.getDrawingType(),
    lineStyle: tool.getLineStyle()
  };
}

const LINE_STYLE_ALIASES: Record<string, LineStyle> = {
  default: "plain",
  solid: "plain",
  dashed: "dash",
  dotted: "dot"
};

function isLineStyle(value: string): value is LineStyle {
  return LINE_STYLES.some((style) => style === value);
}

/** Unknown names fall back to a plain line, as the renderer does. */
export function parseLineStyle(value: string): LineStyle {
  const normalized = value.trim().toLowerCase();
  if (isLineStyle(normalized)) {
    return normalized;
  }
  return LINE_STYLE_ALIASES[normalized] ?? "plain";
}

export type StrokeAttributes = Omit<NewStroke, "points">;

/**
 * Resolves width, color, fill and line style field by field: a value given
 * in the table wins, otherwise the live setting of the selected tool applies.
 */
export function resolveStrokeAttributes(
  table: ScriptTable,
  toolHandler: ToolHandler,
  warn: WarningSink
): StrokeAttributes {
  const fields = decodeRecord(table, strokeAttributesTableSchema, warn);

  let toolType: StrokeToolType = "pen";
  if (fields.tool === "highlighter") {
    toolType = "highlighter";
  } else if (fields.tool !== undefined && fields.tool !== "pen") {
    warn(new DomainError(`Unknown stroke type: "${fields.tool}", defaulting to pen`, { tool: fields.tool }));
  }

  const snapshot = snapshotTool(toolHandler.getTool(toolType));

  let color = snapshot.color;
  if (fields.color !== undefined) {
    try {
      color = checkColor(fields.color);
    } catch (error) {
      if (!(error instanceof DomainError)) {
        throw error;
      }
      warn(error);
    }
  }

  let fill = snapshot.filled ? snapshot.fillOpacity : NO_FILL;
  if (fields.fill !== undefined) {
    fill = fields.fill;
  }

  return {
    toolType,
    width: fields.width ?? snapshot.thickness,
    color,
    fill,
    // highlighters keep their own line style too
    lineStyle: fields.lineStyle !== undefined ? parseLineStyle(fields.lineStyle) : snapshot.lineStyle
  };
}

/**
 * Points of one stroke under construction. The draft reaches the document
 * only through `commit`, and only as a whole.
 */
export class StrokeDraft {
  private readonly points: Point[] = [];

  addPoint(point: Point): void {
    this.points.push(point);
  }

  addPoints(points: Iterable<Point>): void {
    for (const point of points) {
      this.points.push(point);
    }
  }

  get pointCount(): number {
    return this.points.length;
  }

  get isCommittable(): boolean {
    return this.points.length >= MIN_STROKE_POINTS;
  }

  commit(page: HostPage, attributes: StrokeAttributes): StrokeElement {
    return page.getSelectedLayer().addStroke({ ...attributes, points: [...this.points] });
  }
}
