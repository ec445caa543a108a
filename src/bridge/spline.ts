import { NO_PRESSURE, type Point } from "../types/contracts.js";
import { ValidationError } from "../utils/errors.js";

export interface Knot {
  x: number;
  y: number;
}

/** Cubic Bézier segment: start, two control points, end. */
export interface SplineSegment {
  start: Knot;
  ctrl1: Knot;
  ctrl2: Knot;
  end: Knot;
}

export const COORDINATES_PER_SEGMENT = 8;

/** Maximum distance, in pt, between the curve and its polyline approximation. */
const FLATNESS_TOLERANCE = 0.5;
const MAX_SUBDIVISION_DEPTH = 10;

export function segmentsFromCoordinates(coordinates: readonly number[]): SplineSegment[] {
  if (coordinates.length % COORDINATES_PER_SEGMENT !== 0) {
    throw new ValidationError("Spline table incomplete!", {
      length: coordinates.length,
      expectedMultipleOf: COORDINATES_PER_SEGMENT
    });
  }

  const segments: SplineSegment[] = [];
  for (let i = 0; i < coordinates.length; i += COORDINATES_PER_SEGMENT) {
    const [sx, sy, c1x, c1y, c2x, c2y, ex, ey] = coordinates.slice(i, i + COORDINATES_PER_SEGMENT);
    segments.push({
      start: { x: sx, y: sy },
      ctrl1: { x: c1x, y: c1y },
      ctrl2: { x: c2x, y: c2y },
      end: { x: ex, y: ey }
    });
  }
  return segments;
}

function midpoint(a: Knot, b: Knot): Knot {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2 };
}

function distanceToChord(point: Knot, from: Knot, to: Knot): number {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const length = Math.hypot(dx, dy);
  if (length === 0) {
    return Math.hypot(point.x - from.x, point.y - from.y);
  }
  return Math.abs(dy * point.x - dx * point.y + to.x * from.y - to.y * from.x) / length;
}

function isFlat(segment: SplineSegment): boolean {
  return (
    distanceToChord(segment.ctrl1, segment.start, segment.end) <= FLATNESS_TOLERANCE &&
    distanceToChord(segment.ctrl2, segment.start, segment.end) <= FLATNESS_TOLERANCE
  );
}

function subdivide(segment: SplineSegment): [SplineSegment, SplineSegment] {
  const ab = midpoint(segment.start, segment.ctrl1);
  const bc = midpoint(segment.ctrl1, segment.ctrl2);
  const cd = midpoint(segment.ctrl2, segment.end);
  const abc = midpoint(ab, bc);
  const bcd = midpoint(bc, cd);
  const middle = midpoint(abc, bcd);

  return [
    { start: segment.start, ctrl1: ab, ctrl2: abc, end: middle },
    { start: middle, ctrl1: bcd, ctrl2: cd, end: segment.end }
  ];
}

function appendEndpoints(segment: SplineSegment, depth: number, out: Knot[]): void {
  if (depth >= MAX_SUBDIVISION_DEPTH || isFlat(segment)) {
    out.push(segment.end);
    return;
  }

  const [left, right] = subdivide(segment);
  appendEndpoints(left, depth + 1, out);
  appendEndpoints(right, depth + 1, out);
}

/**
 * Polyline through the segment: its start point, then the end of every flat
 * piece of an adaptive de Casteljau subdivision. Pure; equal inputs always
 * give equal point lists.
 */
export function rasterizeSegment(segment: SplineSegment): Point[] {
  const knots: Knot[] = [segment.start];
  appendEndpoints(segment, 0, knots);
  return knots.map((knot) => ({ x: knot.x, y: knot.y, pressure: NO_PRESSURE }));
}
