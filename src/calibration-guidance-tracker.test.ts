/**
 * Unit tests for calibration-guidance-tracker.ts
 */

import { describe, it, expect } from "vitest";
import { CalibrationGuidanceTracker } from "./calibration-guidance-tracker.js";
import { freezeMarkerStatus } from "./snapshot.js";
import { MarkerMode, QualityStatus } from "./types.js";
import type { FrozenMarkerSnapshot, FrozenQualitySnapshot, MarkerStatus, QualityResult } from "./types.js";

const FRAME = 1000;

function status(tags: Array<[number, number, number]>): MarkerStatus {
  return {
    timestampNs: 0,
    mode: MarkerMode.WARN,
    frameWidth: FRAME,
    frameHeight: FRAME,
    detections: tags.map(([id, x, y]) => ({ id, centerX: x, centerY: y })),
    detectedIds: [...new Set(tags.map(([id]) => id))].sort((a, b) => a - b),
    requiredIds: [],
    missingRequiredIds: [],
    allRequiredVisible: true,
    framingOk: true,
    guidanceText: "",
    displayText: "",
  };
}

function snap(tags: Array<[number, number, number]>): FrozenMarkerSnapshot {
  return freezeMarkerStatus(status(tags));
}

function quality(distanceCm: number | null = 25, q: QualityStatus = QualityStatus.OK): FrozenQualitySnapshot {
  return { status: q, blurScore: 400, exposureFlags: [], distanceCm };
}

function liveQuality(distanceCm: number | null): QualityResult {
  return {
    status: QualityStatus.OK,
    blurScore: 400,
    overFraction: 0,
    underFraction: 0,
    specularClusterCount: 0,
    largestSpecularCluster: 0,
    distanceCm,
    timestampNs: 0,
  };
}

// cell 0 (top-left) and cell 4 (mid-center)
const TOP_LEFT: Array<[number, number, number]> = [[0, 200, 200]];
const MID_CENTER: Array<[number, number, number]> = [[0, 500, 500]];

describe("CalibrationGuidanceTracker", () => {
  it("becomes enough once both targets are met", () => {
    const tracker = new CalibrationGuidanceTracker({ goodCapturesTarget: 2, gridTargetFilled: 2 });

    expect(tracker.onCaptureSaved(snap(TOP_LEFT), quality())).toBe(true);
    expect(tracker.evaluateSufficiency()).toEqual({
      enough: false,
      reasons: ["Need more good shots: 1/2", "Coverage: 1/2"],
    });

    expect(tracker.onCaptureSaved(snap(MID_CENTER), quality())).toBe(true);
    expect(tracker.evaluateSufficiency()).toEqual({ enough: true, reasons: [] });

    expect(tracker.onCaptureSaved(snap(TOP_LEFT), quality())).toBe(true);
    expect(tracker.goodCaptureCount()).toBe(3);
    expect(tracker.gridCountsSnapshot()).toEqual([2, 0, 0, 0, 1, 0, 0, 0, 0]);
    expect(tracker.buildManifestSummary().coverageGridFilled).toBe(2);
  });

  it.each([
    ["non-OK quality", snap(MID_CENTER), quality(25, QualityStatus.UNDER)],
    ["distance out of range", snap(MID_CENTER), quality(31)],
    ["board at the edge", snap([[0, 980, 500]]), quality()],
    ["no detections", snap([]), quality()],
  ])("rejects a capture with %s", (_label, marker, q) => {
    const tracker = new CalibrationGuidanceTracker();
    expect(tracker.onCaptureSaved(marker, q)).toBe(false);
    expect(tracker.goodCaptureCount()).toBe(0);
    expect(tracker.gridCountsSnapshot()).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  describe("buildLiveGuidance", () => {
    it("asks for the board first", () => {
      const g = new CalibrationGuidanceTracker().buildLiveGuidance(status([]), null);
      expect(g).toEqual({
        message: "No markers: bring board/flags into view",
        progress: "Calib shots: 0/25",
        coverageText: "Coverage: 0/9",
        enough: false,
      });
    });

    it("asks to reframe, then to fix distance", () => {
      const tracker = new CalibrationGuidanceTracker();
      expect(tracker.buildLiveGuidance(status([[0, 20, 500]]), liveQuality(50)).message).toBe(
        "Reframe: keep board away from edges",
      );
      expect(tracker.buildLiveGuidance(status(MID_CENTER), liveQuality(12)).message).toBe(
        "Move farther (target ~25 cm)",
      );
      expect(tracker.buildLiveGuidance(status(MID_CENTER), liveQuality(50)).message).toBe(
        "Move closer (target ~25 cm)",
      );
    });

    it("points at the first empty cell", () => {
      const tracker = new CalibrationGuidanceTracker();
      tracker.onCaptureSaved(snap(TOP_LEFT), quality());
      expect(tracker.buildLiveGuidance(status(MID_CENTER), liveQuality(25)).message).toBe("Move board to top-center");
    });

    it("keeps going until the shot target is reached", () => {
      const tracker = new CalibrationGuidanceTracker({ goodCapturesTarget: 3, gridTargetFilled: 1 });
      tracker.onCaptureSaved(snap(MID_CENTER), quality());
      expect(tracker.buildLiveGuidance(status(MID_CENTER), null).message).toBe("Keep going");

      tracker.onCaptureSaved(snap(MID_CENTER), quality());
      tracker.onCaptureSaved(snap(MID_CENTER), quality());
      const g = tracker.buildLiveGuidance(status(MID_CENTER), null);
      expect(g.message).toBe("Calibration enough");
      expect(g.progress).toBe("Calib shots: 3/3");
      expect(g.enough).toBe(true);
    });
  });

  it("builds the manifest summary", () => {
    const tracker = new CalibrationGuidanceTracker();
    tracker.onCaptureSaved(snap(MID_CENTER), quality());
    expect(tracker.buildManifestSummary()).toEqual({
      version: 1,
      distanceTargetCm: 25,
      distanceRangeCm: [20, 30],
      edgeMarginFrac: 0.1,
      goodCaptures: 1,
      targets: { goodCaptures: 25, gridFilled: 8 },
      coverageGridCounts: { "0": 0, "1": 0, "2": 0, "3": 0, "4": 1, "5": 0, "6": 0, "7": 0, "8": 0 },
      coverageGridFilled: 1,
      enough: false,
      reasonsIfNotEnough: ["Need more good shots: 1/25", "Coverage: 1/8"],
    });
  });

  it("builds a sidecar summary", () => {
    const tracker = new CalibrationGuidanceTracker({ dictionary: "APRILTAG_36h11" });
    expect(tracker.buildSidecarSummary(snap(MID_CENTER), quality(null))).toEqual({
      mode: MarkerMode.WARN,
      dictionary: "APRILTAG_36h11",
      frameSize: [1000, 1000],
      framingOk: true,
      distanceCm: null,
      distanceOk: true,
      detections: [{ id: 0, centerPx: [500, 500], centerNorm: [0.5, 0.5], cornersPx: [], quality: null }],
    });
  });

  it("clears counters on reset", () => {
    const tracker = new CalibrationGuidanceTracker();
    tracker.onCaptureSaved(snap(MID_CENTER), quality());
    tracker.resetForNewSession();
    expect(tracker.goodCaptureCount()).toBe(0);
    expect(tracker.gridCountsSnapshot()).toEqual([0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });
});
