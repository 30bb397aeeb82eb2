/**
 * Marker detection adapter. Turns raw luma frames into MarkerStatus values.
 *
 * Two variants behind one capability surface:
 *  - DisabledMarkerDetector: keeps the pipeline observable, never detects.
 *  - FiducialMarkerDetector: crops a centered ROI, downsamples it into an
 *    owned working buffer, runs a FiducialDetector backend, and remaps the
 *    detections to full-frame coordinates.
 *
 * Each processed frame publishes a new frozen MarkerStatus; readers holding
 * the previous one keep a complete value.
 */

import {
  clamp01,
  detectionsWithinMargin,
  meanCenter,
  polygonArea,
} from "./geometry.js";
import { centerRoi, isSupportedLumaLayout } from "./luma-frame.js";
import { MarkerMode } from "./types.js";
import type {
  MarkerSessionSummary,
  MarkerStatus,
  Point,
  RawFrame,
  RegionOfInterest,
  TagDetection,
} from "./types.js";
import type { FiducialDetector, GrayImage, RawFiducial } from "./fiducial-detector.js";

// ─── Capability Surface ─────────────────────────────────────────────────────────

export interface MarkerDetector {
  readonly dictionary: string;
  setMode(mode: MarkerMode): void;
  setRequiredIdentities(ids: readonly number[]): void;
  reset(): void;
  process(frame: RawFrame): void;
  latest(): MarkerStatus;
  sessionSummary(): MarkerSessionSummary;
}

// ─── Config ─────────────────────────────────────────────────────────────────────

export interface MarkerDetectorConfig {
  roiFraction: number;
  roiMinSide: number;
  downsampleStep: number;
  edgeMarginFraction: number;
}

export const DEFAULT_MARKER_CONFIG: MarkerDetectorConfig = {
  roiFraction: 0.6,
  roiMinSide: 160,
  downsampleStep: 2,
  edgeMarginFraction: 0.1,
};

export const UNSUPPORTED_FORMAT_TEXT = "Unsupported frame format";

// ─── Pure helpers ───────────────────────────────────────────────────────────────

/** De-duplicate, drop non-integers, sort ascending. */
export function normalizeRequiredIds(ids: readonly number[]): number[] {
  return [...new Set(ids.filter((id) => Number.isSafeInteger(id)))].sort((a, b) => a - b);
}

/** Required identities not present in `detectedIds`, in required-list order. */
export function computeMissingRequired(
  requiredIds: readonly number[],
  detectedIds: readonly number[],
): number[] {
  const present = new Set(detectedIds);
  return requiredIds.filter((id) => !present.has(id));
}

export interface MarkerTexts {
  guidanceText: string;
  displayText: string;
}

/** Guidance and display strings; depends only on its four inputs. */
export function describeMarkers(
  totalDetections: number,
  requiredIds: readonly number[],
  missingIds: readonly number[],
  framingOk: boolean,
): MarkerTexts {
  const required = requiredIds.length;
  const displayText =
    required > 0
      ? `Markers: ${totalDetections} (required ${required - missingIds.length}/${required})`
      : `Markers: ${totalDetections}`;

  let guidanceText: string;
  if (totalDetections === 0) {
    guidanceText = "No markers: move closer / improve lighting";
  } else if (missingIds.length > 0) {
    guidanceText = `Missing required: ${missingIds.join(",")}`;
  } else if (!framingOk) {
    guidanceText = "Reframe: keep tags away from edges";
  } else {
    guidanceText = "Markers OK";
  }

  return { guidanceText, displayText };
}

/**
 * Map a detection from the reduced ROI buffer back to full-frame pixels:
 * full = roiOrigin + reduced × step. Quality is the remapped polygon
 * area over the ROI area, clamped to [0,1].
 */
export function remapFiducial(
  raw: RawFiducial,
  roi: RegionOfInterest,
  step: number,
): TagDetection {
  const toFrame = (p: Point): Point => ({ x: roi.x + p.x * step, y: roi.y + p.y * step });
  const corners = raw.corners.map(toFrame);

  let center: Point;
  if (raw.center) {
    center = toFrame(raw.center);
  } else {
    center = meanCenter(corners.map((c) => ({ centerX: c.x, centerY: c.y }))) ?? { x: roi.x, y: roi.y };
  }

  const detection: TagDetection = { id: raw.id, centerX: center.x, centerY: center.y };
  if (corners.length > 0) detection.corners = corners;
  const roiArea = roi.width * roi.height;
  if (corners.length >= 3 && roiArea > 0) {
    detection.quality = clamp01(polygonArea(corners) / roiArea);
  }
  return detection;
}

function uniqueSorted(ids: readonly number[]): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

function makeStatus(
  timestampNs: number,
  mode: MarkerMode,
  frameWidth: number,
  frameHeight: number,
  detections: TagDetection[],
  requiredIds: readonly number[],
  framingOk: boolean,
  texts: MarkerTexts,
): MarkerStatus {
  const detectedIds = uniqueSorted(detections.map((d) => d.id));
  const missingRequiredIds = computeMissingRequired(requiredIds, detectedIds);
  return Object.freeze({
    timestampNs,
    mode,
    frameWidth,
    frameHeight,
    detections,
    detectedIds,
    requiredIds: [...requiredIds],
    missingRequiredIds,
    allRequiredVisible: missingRequiredIds.length === 0,
    framingOk,
    guidanceText: texts.guidanceText,
    displayText: texts.displayText,
  });
}

// ─── DisabledMarkerDetector ─────────────────────────────────────────────────────

const DISABLED_TEXTS: MarkerTexts = {
  guidanceText: "Marker detection disabled",
  displayText: "Markers detected: N/A",
};

export class DisabledMarkerDetector implements MarkerDetector {
  readonly dictionary = "NONE";
  private mode: MarkerMode = MarkerMode.OFF;
  private requiredIds: number[] = [];
  private framesProcessed = 0;
  private status: MarkerStatus = makeStatus(0, MarkerMode.OFF, 0, 0, [], [], true, DISABLED_TEXTS);

  setMode(mode: MarkerMode): void {
    this.mode = mode;
  }

  setRequiredIdentities(ids: readonly number[]): void {
    this.requiredIds = normalizeRequiredIds(ids);
  }

  reset(): void {
    this.framesProcessed = 0;
    this.status = makeStatus(0, this.mode, 0, 0, [], this.requiredIds, true, DISABLED_TEXTS);
  }

  process(frame: RawFrame): void {
    this.framesProcessed++;
    this.status = makeStatus(
      frame.timestampNs,
      this.mode,
      frame.width,
      frame.height,
      [],
      this.requiredIds,
      true,
      DISABLED_TEXTS,
    );
  }

  latest(): MarkerStatus {
    return this.status;
  }

  sessionSummary(): MarkerSessionSummary {
    return { framesProcessed: this.framesProcessed, framesAllRequiredVisible: 0, perTagCount: new Map() };
  }
}

// ─── FiducialMarkerDetector ─────────────────────────────────────────────────────

export class FiducialMarkerDetector implements MarkerDetector {
  private readonly config: MarkerDetectorConfig;
  private readonly backend: FiducialDetector;
  private mode: MarkerMode;
  private requiredIds: number[];
  private status: MarkerStatus;

  // Session counters
  private framesProcessed: number;
  private framesAllRequiredVisible: number;
  private perTagCount: Map<number, number>;

  // Working buffer for the reduced ROI, reused across frames
  private work: Uint8Array;
  private unsupportedWarned: boolean;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [MarkerDetector] ${msg}`);
  }

  constructor(backend: FiducialDetector, config: Partial<MarkerDetectorConfig> = {}, mode = MarkerMode.WARN) {
    this.config = { ...DEFAULT_MARKER_CONFIG, ...config };
    this.config.downsampleStep = Math.max(1, Math.floor(this.config.downsampleStep));
    this.backend = backend;
    this.mode = mode;
    this.requiredIds = [];
    this.framesProcessed = 0;
    this.framesAllRequiredVisible = 0;
    this.perTagCount = new Map();
    this.work = new Uint8Array(0);
    this.unsupportedWarned = false;
    this.status = this.lightweightStatus(0, 0, 0);
  }

  get dictionary(): string {
    return this.backend.dictionary;
  }

  setMode(mode: MarkerMode): void {
    if (mode !== this.mode) this.log("INFO", `Mode ${this.mode} → ${mode}`);
    this.mode = mode;
  }

  setRequiredIdentities(ids: readonly number[]): void {
    this.requiredIds = normalizeRequiredIds(ids);
    this.log("INFO", `Required identities: [${this.requiredIds.join(",")}]`);
  }

  reset(): void {
    this.framesProcessed = 0;
    this.framesAllRequiredVisible = 0;
    this.perTagCount = new Map();
    this.status = this.lightweightStatus(0, 0, 0);
  }

  latest(): MarkerStatus {
    return this.status;
  }

  sessionSummary(): MarkerSessionSummary {
    return {
      framesProcessed: this.framesProcessed,
      framesAllRequiredVisible: this.framesAllRequiredVisible,
      perTagCount: new Map(this.perTagCount),
    };
  }

  process(frame: RawFrame): void {
    if (this.mode === MarkerMode.OFF) {
      this.status = this.lightweightStatus(frame.timestampNs, frame.width, frame.height);
      return;
    }

    if (!isSupportedLumaLayout(frame)) {
      if (!this.unsupportedWarned) {
        this.log("WARN", `Unsupported frame layout (pixelStride=${frame.pixelStride}); frames skipped`);
        this.unsupportedWarned = true;
      }
      this.status = makeStatus(
        frame.timestampNs,
        this.mode,
        frame.width,
        frame.height,
        [],
        this.requiredIds,
        true,
        { guidanceText: UNSUPPORTED_FORMAT_TEXT, displayText: "Markers: N/A" },
      );
      return;
    }

    const { roiFraction, roiMinSide, downsampleStep, edgeMarginFraction } = this.config;
    const roi = centerRoi(frame.width, frame.height, roiFraction, roiMinSide);
    const reduced = this.extractReduced(frame, roi, downsampleStep);

    let raw: RawFiducial[];
    try {
      raw = this.backend.detect(reduced);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log("WARN", `Detection failed, treating frame as empty: ${message}`);
      raw = [];
    }

    const detections = raw
      .filter((r) => Number.isSafeInteger(r.id))
      .map((r) => remapFiducial(r, roi, downsampleStep));

    this.framesProcessed++;
    const seen = uniqueSorted(detections.map((d) => d.id));
    for (const id of seen) {
      this.perTagCount.set(id, (this.perTagCount.get(id) ?? 0) + 1);
    }

    const framingOk = detectionsWithinMargin(detections, frame.width, frame.height, edgeMarginFraction);
    const missing = computeMissingRequired(this.requiredIds, seen);
    if (this.requiredIds.length > 0 && missing.length === 0) {
      this.framesAllRequiredVisible++;
    }

    this.status = makeStatus(
      frame.timestampNs,
      this.mode,
      frame.width,
      frame.height,
      detections,
      this.requiredIds,
      framingOk,
      describeMarkers(detections.length, this.requiredIds, missing, framingOk),
    );
  }

  /** Sub-sample every `step`-th row and column of the ROI into the working buffer. */
  private extractReduced(frame: RawFrame, roi: RegionOfInterest, step: number): GrayImage {
    const width = Math.ceil(roi.width / step);
    const height = Math.ceil(roi.height / step);
    if (this.work.length !== width * height) {
      this.work = new Uint8Array(width * height);
    }
    const { luma, rowStride } = frame;
    let i = 0;
    for (let ry = 0; ry < height; ry++) {
      const base = (roi.y + ry * step) * rowStride + roi.x;
      for (let rx = 0; rx < width; rx++) {
        this.work[i++] = luma[base + rx * step];
      }
    }
    return { width, height, data: this.work };
  }

  private lightweightStatus(timestampNs: number, width: number, height: number): MarkerStatus {
    const off = this.mode === MarkerMode.OFF;
    return makeStatus(timestampNs, this.mode, width, height, [], this.requiredIds, true, {
      guidanceText: off ? "Marker detection off" : "Waiting for frames",
      displayText: off ? "Markers: off" : "Markers: 0",
    });
  }
}
