// Capture Guidance - Geometry and binning utilities
// Pure functions shared by the marker adapter and both guidance trackers.
// No state.

import type { HeightBin, LateralBin, Point } from "./types.js";

/** Number of cells in the coverage grid (3×3, row-major). */
export const GRID_CELLS = 9;

/** Normalized x/y below this is the left/top third for lateral and height bins. */
const BIN_LOW_EDGE = 0.33;
/** Normalized x/y above this is the right/bottom third for lateral and height bins. */
const BIN_HIGH_EDGE = 0.66;

/** Half-open grid boundaries: [0, 1/3) → 0, [1/3, 2/3) → 1, [2/3, 1] → 2. */
const GRID_FIRST_EDGE = 0.333333;
const GRID_SECOND_EDGE = 0.666666;

export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** Map a pixel coordinate to [0,1]. Returns 0 for a non-positive extent. */
export function normalize(value: number, extent: number): number {
  if (extent <= 0) return 0;
  return clamp01(value / extent);
}

export function lateralBin(xNorm: number): LateralBin {
  if (xNorm < BIN_LOW_EDGE) return "LEFT";
  if (xNorm > BIN_HIGH_EDGE) return "RIGHT";
  return "CENTER";
}

/**
 * Height bin from normalized y. Image y grows downwards, so the top third of
 * the frame is LOW and the bottom third is HIGH.
 */
export function heightBin(yNorm: number): HeightBin {
  if (yNorm < BIN_LOW_EDGE) return "LOW";
  if (yNorm > BIN_HIGH_EDGE) return "HIGH";
  return "MID";
}

function gridBand(value: number): number {
  if (value < GRID_FIRST_EDGE) return 0;
  if (value < GRID_SECOND_EDGE) return 1;
  return 2;
}

/** 3×3 cell index 0..8 for a normalized point. */
export function gridIndex3x3(xNorm: number, yNorm: number): number {
  return gridBand(yNorm) * 3 + gridBand(xNorm);
}

export function filledGridCells(counts: readonly number[]): number {
  let filled = 0;
  for (const c of counts) if (c > 0) filled++;
  return filled;
}

export function firstEmptyGridCell(counts: readonly number[]): number | null {
  for (let i = 0; i < GRID_CELLS; i++) {
    if ((counts[i] ?? 0) <= 0) return i;
  }
  return null;
}

const ROW_NAMES = ["top", "mid", "bottom"] as const;
const COLUMN_NAMES = ["left", "center", "right"] as const;

/** Human-readable cell name, e.g. 0 → "top-left", 5 → "mid-right". */
export function cellName(index: number): string {
  const row = ROW_NAMES[Math.min(2, Math.max(0, Math.floor(index / 3)))];
  const col = COLUMN_NAMES[Math.min(2, Math.max(0, index % 3))];
  return `${row}-${col}`;
}

/** Mean of the given centers, or null for an empty list. */
export function meanCenter(centers: ReadonlyArray<{ centerX: number; centerY: number }>): Point | null {
  if (centers.length === 0) return null;
  let sx = 0;
  let sy = 0;
  for (const c of centers) {
    sx += c.centerX;
    sy += c.centerY;
  }
  return { x: sx / centers.length, y: sy / centers.length };
}

/** Horizontal extent of the detection centers as a fraction of the frame width. */
export function spreadXNorm(
  centers: ReadonlyArray<{ centerX: number }>,
  frameWidth: number,
): number {
  if (centers.length === 0 || frameWidth <= 0) return 0;
  let minX = Infinity;
  let maxX = -Infinity;
  for (const c of centers) {
    minX = Math.min(minX, c.centerX);
    maxX = Math.max(maxX, c.centerX);
  }
  return clamp01((maxX - minX) / frameWidth);
}

/** True when some center lies in the left third and some in the right third. */
export function hasBothSides(
  centers: ReadonlyArray<{ centerX: number }>,
  frameWidth: number,
): boolean {
  if (centers.length === 0 || frameWidth <= 0) return false;
  let left = false;
  let right = false;
  for (const c of centers) {
    const x = clamp01(c.centerX / frameWidth);
    if (x < BIN_LOW_EDGE) left = true;
    if (x > BIN_HIGH_EDGE) right = true;
  }
  return left && right;
}

/**
 * Pick the `n` most frequently seen identities from a tally.
 * Ordered by descending count, then ascending identity.
 */
export function chooseStableIdentities(
  tally: ReadonlyMap<number, number>,
  n: number,
): number[] {
  const entries = [...tally.entries()];
  entries.sort((a, b) => (b[1] - a[1]) || (a[0] - b[0]));
  return entries.slice(0, Math.max(0, n)).map(([id]) => id);
}

/** Shoelace polygon area (absolute value). Fewer than 3 points → 0. */
export function polygonArea(points: readonly Point[]): number {
  if (points.length < 3) return 0;
  let twice = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    twice += a.x * b.y - b.x * a.y;
  }
  return Math.abs(twice) / 2;
}

/**
 * Framing check for a set of detections: every corner (or the center when a
 * detection has no corners) must be inside the edge margin. No detections → true.
 */
export function detectionsWithinMargin(
  detections: ReadonlyArray<{ centerX: number; centerY: number; corners?: readonly Point[] }>,
  frameWidth: number,
  frameHeight: number,
  marginFraction: number,
): boolean {
  for (const d of detections) {
    const points =
      d.corners && d.corners.length > 0 ? d.corners : [{ x: d.centerX, y: d.centerY }];
    if (!withinEdgeMargin(points, frameWidth, frameHeight, marginFraction)) return false;
  }
  return true;
}

/**
 * True when every point lies inside the frame shrunk by `marginFraction` of
 * its width/height on each side. Boundary points count as inside.
 */
export function withinEdgeMargin(
  points: readonly Point[],
  frameWidth: number,
  frameHeight: number,
  marginFraction: number,
): boolean {
  const mx = frameWidth * marginFraction;
  const my = frameHeight * marginFraction;
  for (const p of points) {
    if (p.x < mx || p.x > frameWidth - mx || p.y < my || p.y > frameHeight - my) {
      return false;
    }
  }
  return true;
}
