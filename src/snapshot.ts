// Capture Guidance - Frozen capture snapshots
// Deep, immutable copies of the live marker status and quality result, taken
// at the moment a capture is committed. Tracker updates only ever see these.

import { QualityStatus } from "./types.js";
import type {
  ExposureFlag,
  FrozenMarkerSnapshot,
  FrozenQualitySnapshot,
  FrozenTag,
  MarkerStatus,
  QualityResult,
} from "./types.js";

export function freezeMarkerStatus(status: MarkerStatus): FrozenMarkerSnapshot {
  const detections: FrozenTag[] = status.detections.map((d) =>
    Object.freeze({
      id: d.id,
      centerX: d.centerX,
      centerY: d.centerY,
      corners: Object.freeze((d.corners ?? []).map((c) => Object.freeze({ x: c.x, y: c.y }))),
      quality: d.quality ?? null,
    }),
  );

  return Object.freeze({
    timestampNs: status.timestampNs,
    mode: status.mode,
    frameWidth: status.frameWidth,
    frameHeight: status.frameHeight,
    requiredIds: Object.freeze([...status.requiredIds]),
    detectedIds: Object.freeze([...status.detectedIds]),
    missingRequiredIds: Object.freeze([...status.missingRequiredIds]),
    allRequiredVisible: status.allRequiredVisible,
    framingOk: status.framingOk,
    detections: Object.freeze(detections),
  });
}

export function exposureFlagsFor(status: QualityStatus): ExposureFlag[] {
  switch (status) {
    case QualityStatus.OVER:
      return ["OVER"];
    case QualityStatus.UNDER:
      return ["UNDER"];
    case QualityStatus.SPECULAR:
      return ["SPECULAR"];
    default:
      return [];
  }
}

/** A missing result freezes as UNKNOWN, which never passes a capture gate. */
export function freezeQualityResult(result: QualityResult | null): FrozenQualitySnapshot {
  if (!result) {
    return Object.freeze({
      status: QualityStatus.UNKNOWN,
      blurScore: 0,
      exposureFlags: Object.freeze([]),
      distanceCm: null,
    });
  }
  return Object.freeze({
    status: result.status,
    blurScore: result.blurScore,
    exposureFlags: Object.freeze(exposureFlagsFor(result.status)),
    distanceCm: result.distanceCm,
  });
}
