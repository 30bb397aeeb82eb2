import { describe, it, expect } from "vitest";
import { exposureFlagsFor, freezeMarkerStatus, freezeQualityResult } from "./snapshot.js";
import { MarkerMode, QualityStatus } from "./types.js";
import type { MarkerStatus, QualityResult } from "./types.js";

function liveStatus(): MarkerStatus {
  return {
    timestampNs: 11,
    mode: MarkerMode.BLOCK,
    frameWidth: 640,
    frameHeight: 480,
    detections: [
      { id: 4, centerX: 10, centerY: 20, corners: [{ x: 1, y: 2 }], quality: 0.5 },
      { id: 6, centerX: 30, centerY: 40 },
    ],
    detectedIds: [4, 6],
    requiredIds: [4],
    missingRequiredIds: [],
    allRequiredVisible: true,
    framingOk: true,
    guidanceText: "Markers OK",
    displayText: "Markers: 2 (required 1/1)",
  };
}

describe("freezeMarkerStatus", () => {
  it("copies every field and fills missing corners and quality", () => {
    const frozen = freezeMarkerStatus(liveStatus());
    expect(frozen).toEqual({
      timestampNs: 11,
      mode: MarkerMode.BLOCK,
      frameWidth: 640,
      frameHeight: 480,
      requiredIds: [4],
      detectedIds: [4, 6],
      missingRequiredIds: [],
      allRequiredVisible: true,
      framingOk: true,
      detections: [
        { id: 4, centerX: 10, centerY: 20, corners: [{ x: 1, y: 2 }], quality: 0.5 },
        { id: 6, centerX: 30, centerY: 40, corners: [], quality: null },
      ],
    });
  });

  it("is deep-frozen and detached from the live value", () => {
    const live = liveStatus();
    const frozen = freezeMarkerStatus(live);
    live.detectedIds.push(99);
    live.detections[0].centerX = 500;

    expect(frozen.detectedIds).toEqual([4, 6]);
    expect(frozen.detections[0].centerX).toBe(10);
    expect(Object.isFrozen(frozen.detections)).toBe(true);
    expect(Object.isFrozen(frozen.detections[0].corners[0])).toBe(true);
  });
});

describe("freezeQualityResult", () => {
  it("derives exposure flags from the status", () => {
    const result: QualityResult = {
      status: QualityStatus.SPECULAR,
      blurScore: 321,
      overFraction: 0.03,
      underFraction: 0,
      specularClusterCount: 2,
      largestSpecularCluster: 15,
      distanceCm: 25,
      timestampNs: 3,
    };
    expect(freezeQualityResult(result)).toEqual({
      status: QualityStatus.SPECULAR,
      blurScore: 321,
      exposureFlags: ["SPECULAR"],
      distanceCm: 25,
    });
  });

  it("freezes a missing result as UNKNOWN", () => {
    expect(freezeQualityResult(null)).toEqual({
      status: QualityStatus.UNKNOWN,
      blurScore: 0,
      exposureFlags: [],
      distanceCm: null,
    });
  });

  it("maps statuses to flags", () => {
    expect(exposureFlagsFor(QualityStatus.OVER)).toEqual(["OVER"]);
    expect(exposureFlagsFor(QualityStatus.UNDER)).toEqual(["UNDER"]);
    expect(exposureFlagsFor(QualityStatus.OK)).toEqual([]);
    expect(exposureFlagsFor(QualityStatus.BLUR)).toEqual([]);
  });
});
