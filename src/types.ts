// Capture Guidance - Shared TypeScript interfaces and types
// Frame analysis results, marker status, frozen capture snapshots, session
// summaries and the WebSocket protocol.

// ─── Enums ──────────────────────────────────────────────────────────────────────

export enum QualityStatus {
  OK = "OK",
  BLUR = "BLUR",
  OVER = "OVER",
  UNDER = "UNDER",
  SPECULAR = "SPECULAR",
  UNKNOWN = "UNKNOWN",
}

export enum MarkerMode {
  OFF = "OFF",
  WARN = "WARN",
  BLOCK = "BLOCK",
}

/** Capture phases, strictly ordered. The current phase is derived from counters. */
export enum CapturePhase {
  ANCHOR = "ANCHOR",
  LEFT_SWEEP = "LEFT_SWEEP",
  RIGHT_SWEEP = "RIGHT_SWEEP",
  CROSS_ARCH = "CROSS_ARCH",
  CLEANUP = "CLEANUP",
}

export type LateralBin = "LEFT" | "CENTER" | "RIGHT";
export type HeightBin = "LOW" | "MID" | "HIGH";

export type SessionKind = "capture" | "calibration";

// ─── Frames ─────────────────────────────────────────────────────────────────────

/**
 * View over a single-channel luma buffer. Owned by the frame source; analyzers
 * must not keep references to `luma` past one call.
 */
export interface RawFrame {
  width: number;
  height: number;
  rowStride: number; // bytes between row starts
  pixelStride: number; // bytes between adjacent pixels; 1 for packed luma
  luma: Uint8Array;
  timestampNs: number; // monotonic
}

export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle in full-frame pixel space. */
export interface RegionOfInterest {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ─── Quality ────────────────────────────────────────────────────────────────────

export interface QualityResult {
  status: QualityStatus;
  blurScore: number; // Laplacian variance over the ROI
  overFraction: number; // clipped highlights, 0..1
  underFraction: number; // clipped shadows, 0..1
  specularClusterCount: number;
  largestSpecularCluster: number; // sampled pixels
  distanceCm: number | null; // best effort; null when no focus distance is known
  timestampNs: number;
}

// ─── Markers ────────────────────────────────────────────────────────────────────

export interface TagDetection {
  id: number;
  centerX: number;
  centerY: number;
  corners?: Point[];
  quality?: number;
}

export interface MarkerStatus {
  timestampNs: number;
  mode: MarkerMode;
  frameWidth: number;
  frameHeight: number;
  detections: TagDetection[];
  detectedIds: number[];
  requiredIds: number[];
  missingRequiredIds: number[];
  allRequiredVisible: boolean;
  framingOk: boolean;
  guidanceText: string;
  displayText: string;
}

export interface MarkerSessionSummary {
  framesProcessed: number;
  /** Frames where every required identity was visible at once. */
  framesAllRequiredVisible: number;
  /** Identity → number of processed frames in which it was visible. */
  perTagCount: ReadonlyMap<number, number>;
}

// ─── Frozen Snapshots ───────────────────────────────────────────────────────────

export interface FrozenTag {
  readonly id: number;
  readonly centerX: number;
  readonly centerY: number;
  readonly corners: readonly Point[];
  readonly quality: number | null;
}

export interface FrozenMarkerSnapshot {
  readonly timestampNs: number;
  readonly mode: MarkerMode;
  readonly frameWidth: number;
  readonly frameHeight: number;
  readonly requiredIds: readonly number[];
  readonly detectedIds: readonly number[];
  readonly missingRequiredIds: readonly number[];
  readonly allRequiredVisible: boolean;
  readonly framingOk: boolean;
  readonly detections: readonly FrozenTag[];
}

export type ExposureFlag = "OVER" | "UNDER" | "SPECULAR";

export interface FrozenQualitySnapshot {
  readonly status: QualityStatus;
  readonly blurScore: number;
  readonly exposureFlags: readonly ExposureFlag[];
  readonly distanceCm: number | null;
}

// ─── Live Guidance ──────────────────────────────────────────────────────────────

export type BlockReason = "Missing required" | "Framing" | "Distance";

export interface LiveGuidance {
  message: string;
  phase: CapturePhase;
  phaseProgress: string;
  coverageText: string;
  enough: boolean;
  blockReason: BlockReason | null;
}

export interface CalibrationLiveGuidance {
  message: string;
  progress: string;
  coverageText: string;
  enough: boolean;
}

export interface Sufficiency {
  enough: boolean;
  reasons: string[];
}

// ─── Summaries ──────────────────────────────────────────────────────────────────

/** Keys "0".."8", row-major (row = index / 3, column = index % 3). */
export type GridCounts = Record<string, number>;

export interface PhaseProgressSummary {
  phaseA: { centerMid: number; leftMid: number; rightMid: number; highAny: number; lowAny: number };
  phaseB_left: { leftMid: number; leftHigh: number; leftLow: number };
  phaseC_right: { rightMid: number; rightHigh: number; rightLow: number };
  phaseD_crossArch: { total: number; high: number; low: number };
}

export interface CaptureManifestSummary {
  version: number;
  stableIdsN: number;
  trackedIds: number[];
  distanceRangeCm: [number, number];
  edgeMarginFrac: number;
  goodCaptures: number;
  targets: {
    goodCaptures: number;
    perTag: number;
    gridFilled: number;
    crossArchRequired: boolean;
  };
  coverageGridCounts: GridCounts;
  coverageGridFilled: number;
  perTagCaptureCount: Record<string, number>;
  phaseProgress: PhaseProgressSummary;
  enough: boolean;
  reasonsIfNotEnough: string[];
}

export interface CalibrationManifestSummary {
  version: number;
  distanceTargetCm: number;
  distanceRangeCm: [number, number];
  edgeMarginFrac: number;
  goodCaptures: number;
  targets: {
    goodCaptures: number;
    gridFilled: number;
  };
  coverageGridCounts: GridCounts;
  coverageGridFilled: number;
  enough: boolean;
  reasonsIfNotEnough: string[];
}

export interface SidecarDetection {
  id: number;
  centerPx: [number, number];
  centerNorm: [number, number] | null;
  cornersPx: Array<[number, number]>;
  quality: number | null;
}

export interface CalibrationSidecarSummary {
  mode: MarkerMode;
  dictionary: string;
  frameSize: [number, number];
  framingOk: boolean;
  distanceCm: number | null;
  distanceOk: boolean;
  detections: SidecarDetection[];
}

export interface CaptureSidecarSummary extends CalibrationSidecarSummary {
  requiredIds: number[];
  trackedIds: number[];
  missingRequiredIds: number[];
  detectedIds: number[];
  allRequiredVisible: boolean;
  phase: CapturePhase;
  gridCell: number | null;
  lateralBin: LateralBin | null;
  heightBin: HeightBin | null;
  crossArch: boolean;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

/** Header of a binary luma frame on the wire. */
export interface LumaFrameHeader {
  timestampNs: number;
  seq: number;
  width: number;
  height: number;
  rowStride: number;
  focusDiopters?: number;
}

// Client → Server messages
export type ClientMessage =
  | { type: "start_session"; kind: SessionKind }
  | { type: "set_mode"; mode: MarkerMode }
  | { type: "set_required_ids"; ids: number[] }
  | { type: "set_focus_distance"; diopters: number | null }
  | { type: "capture" }
  | { type: "reset_session" }
  | { type: "request_manifest" };

export interface CaptureOutcome {
  captureSeq: number;
  saved: boolean;
  counted: boolean;
  blockReason: string | null;
  sidecar: CaptureSidecarSummary | CalibrationSidecarSummary | null;
}

// Server → Client messages
export type ServerMessage =
  | { type: "session_started"; sessionId: string; kind: SessionKind }
  | {
      type: "frame_status";
      marker: MarkerStatus;
      quality: QualityResult | null;
      guidance: LiveGuidance | CalibrationLiveGuidance;
    }
  | ({ type: "capture_result" } & CaptureOutcome)
  | { type: "manifest"; manifest: CaptureManifestSummary | CalibrationManifestSummary }
  | { type: "error"; message: string; recoverable: boolean };
