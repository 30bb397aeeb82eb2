// Capture Guidance - Raw luma frame helpers

import type { RawFrame, RegionOfInterest } from "./types.js";

/**
 * A frame is usable when its pixels are channel-adjacent (pixelStride 1),
 * rows are at least `width` bytes apart, and the buffer covers the last row.
 */
export function isSupportedLumaLayout(frame: RawFrame): boolean {
  if (!Number.isInteger(frame.width) || !Number.isInteger(frame.height)) return false;
  if (frame.width <= 0 || frame.height <= 0) return false;
  if (frame.pixelStride !== 1) return false;
  if (frame.rowStride < frame.width) return false;
  return frame.luma.length >= requiredLumaBytes(frame.width, frame.height, frame.rowStride);
}

/** Minimum buffer length for a packed luma plane with the given geometry. */
export function requiredLumaBytes(width: number, height: number, rowStride: number): number {
  if (width <= 0 || height <= 0) return 0;
  return rowStride * (height - 1) + width;
}

/**
 * Centered region covering `fraction` of each side, at least `minSide`
 * pixels and never more than the frame itself.
 */
export function centerRoi(
  width: number,
  height: number,
  fraction: number,
  minSide: number,
): RegionOfInterest {
  const roiW = Math.min(width, Math.max(minSide, Math.floor(width * fraction)));
  const roiH = Math.min(height, Math.max(minSide, Math.floor(height * fraction)));
  return {
    x: Math.max(0, Math.floor((width - roiW) / 2)),
    y: Math.max(0, Math.floor((height - roiH) / 2)),
    width: roiW,
    height: roiH,
  };
}

/** Build a packed luma frame; used by the wire codec and tests. */
export function createLumaFrame(
  width: number,
  height: number,
  luma: Uint8Array,
  timestampNs: number,
  rowStride: number = width,
): RawFrame {
  return { width, height, rowStride, pixelStride: 1, luma, timestampNs };
}
