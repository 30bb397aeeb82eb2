// Capture Guidance - Helpers shared by the capture and calibration trackers

import {
  gridIndex3x3,
  hasBothSides,
  heightBin,
  lateralBin,
  meanCenter,
  normalize,
  spreadXNorm,
  detectionsWithinMargin,
} from "./geometry.js";
import type {
  FrozenMarkerSnapshot,
  GridCounts,
  HeightBin,
  LateralBin,
  SidecarDetection,
} from "./types.js";

export const STABLE_IDS_N_DEFAULT = 8;

/** Fraction of the frame width the detections must span to count as cross-arch. */
export const CROSS_ARCH_MIN_SPREAD = 0.65;

export const SUMMARY_VERSION = 1;

/** Unknown distance passes; known distance must lie in [min, max]. */
export function distanceInRange(distanceCm: number | null, minCm: number, maxCm: number): boolean {
  if (distanceCm === null) return true;
  return distanceCm >= minCm && distanceCm <= maxCm;
}

/**
 * Framing recomputed from the snapshot's own detections. Falls back to the
 * adapter's flag when the frame size is unknown.
 */
export function snapshotFramingOk(snapshot: FrozenMarkerSnapshot, edgeMarginFraction: number): boolean {
  const { frameWidth: w, frameHeight: h } = snapshot;
  if (w <= 0 || h <= 0) return snapshot.framingOk;
  return detectionsWithinMargin(snapshot.detections, w, h, edgeMarginFraction);
}

export interface Placement {
  xNorm: number;
  yNorm: number;
  gridCell: number;
  lateral: LateralBin;
  height: HeightBin;
  crossArch: boolean;
}

/** Where the mean detection center falls; null without detections or frame size. */
export function classifyPlacement(
  snapshot: FrozenMarkerSnapshot,
  crossArchMinSpread: number = CROSS_ARCH_MIN_SPREAD,
): Placement | null {
  const { frameWidth: w, frameHeight: h, detections } = snapshot;
  if (w <= 0 || h <= 0) return null;
  const center = meanCenter(detections);
  if (!center) return null;

  const xNorm = normalize(center.x, w);
  const yNorm = normalize(center.y, h);
  return {
    xNorm,
    yNorm,
    gridCell: gridIndex3x3(xNorm, yNorm),
    lateral: lateralBin(xNorm),
    height: heightBin(yNorm),
    crossArch: spreadXNorm(detections, w) >= crossArchMinSpread && hasBothSides(detections, w),
  };
}

/** Detections ordered by id, then x, then y, in sidecar shape. */
export function sidecarDetections(snapshot: FrozenMarkerSnapshot): SidecarDetection[] {
  const { frameWidth: w, frameHeight: h } = snapshot;
  return [...snapshot.detections]
    .sort((a, b) => (a.id - b.id) || (a.centerX - b.centerX) || (a.centerY - b.centerY))
    .map((d): SidecarDetection => ({
      id: d.id,
      centerPx: [d.centerX, d.centerY],
      centerNorm: w > 0 && h > 0 ? [d.centerX / w, d.centerY / h] : null,
      cornersPx: d.corners.map((c): [number, number] => [c.x, c.y]),
      quality: d.quality,
    }));
}

export function gridCountsRecord(counts: readonly number[]): GridCounts {
  const out: GridCounts = {};
  counts.forEach((c, i) => {
    out[String(i)] = c;
  });
  return out;
}

// ─── Stable identity lock ───────────────────────────────────────────────────────

export type StableIdentityLock =
  | { state: "unlocked" }
  | { state: "locked"; ids: readonly number[] };

export const UNLOCKED: StableIdentityLock = Object.freeze({ state: "unlocked" });
