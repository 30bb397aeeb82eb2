// Capture Guidance - Calibration session tracker
// Single-phase counterpart of CaptureGuidanceTracker: good captures and 3×3
// board coverage only. Counters change only in onCaptureSaved().

import { GRID_CELLS, cellName, filledGridCells, firstEmptyGridCell } from "./geometry.js";
import {
  SUMMARY_VERSION,
  classifyPlacement,
  distanceInRange,
  gridCountsRecord,
  sidecarDetections,
  snapshotFramingOk,
} from "./guidance-common.js";
import { freezeMarkerStatus } from "./snapshot.js";
import { QualityStatus } from "./types.js";
import type {
  CalibrationLiveGuidance,
  CalibrationManifestSummary,
  CalibrationSidecarSummary,
  FrozenMarkerSnapshot,
  FrozenQualitySnapshot,
  MarkerStatus,
  QualityResult,
  Sufficiency,
} from "./types.js";

export interface CalibrationGuidanceConfig {
  distanceTargetCm: number;
  distanceMinCm: number;
  distanceMaxCm: number;
  edgeMarginFraction: number;
  goodCapturesTarget: number;
  gridTargetFilled: number;
  dictionary: string;
}

export const DEFAULT_CALIBRATION_GUIDANCE_CONFIG: CalibrationGuidanceConfig = {
  distanceTargetCm: 25,
  distanceMinCm: 20,
  distanceMaxCm: 30,
  edgeMarginFraction: 0.1,
  goodCapturesTarget: 25,
  gridTargetFilled: 8,
  dictionary: "APRILTAG_36h11",
};

export class CalibrationGuidanceTracker {
  private readonly config: CalibrationGuidanceConfig;
  private goodCaptures: number;
  private gridCounts: number[];

  constructor(config: Partial<CalibrationGuidanceConfig> = {}) {
    this.config = { ...DEFAULT_CALIBRATION_GUIDANCE_CONFIG, ...config };
    this.goodCaptures = 0;
    this.gridCounts = new Array<number>(GRID_CELLS).fill(0);
  }

  resetForNewSession(): void {
    this.goodCaptures = 0;
    this.gridCounts = new Array<number>(GRID_CELLS).fill(0);
  }

  goodCaptureCount(): number {
    return this.goodCaptures;
  }

  gridCountsSnapshot(): number[] {
    return [...this.gridCounts];
  }

  isGoodCapture(marker: FrozenMarkerSnapshot, quality: FrozenQualitySnapshot): boolean {
    const cfg = this.config;
    return (
      quality.status === QualityStatus.OK &&
      distanceInRange(quality.distanceCm, cfg.distanceMinCm, cfg.distanceMaxCm) &&
      snapshotFramingOk(marker, cfg.edgeMarginFraction) &&
      marker.detections.length > 0
    );
  }

  /** Returns false, changing nothing, when the capture fails the gate. */
  onCaptureSaved(marker: FrozenMarkerSnapshot, quality: FrozenQualitySnapshot): boolean {
    if (!this.isGoodCapture(marker, quality)) return false;
    this.goodCaptures += 1;
    const placement = classifyPlacement(marker);
    if (placement) this.gridCounts[placement.gridCell] += 1;
    return true;
  }

  evaluateSufficiency(): Sufficiency {
    const cfg = this.config;
    const reasons: string[] = [];
    if (this.goodCaptures < cfg.goodCapturesTarget) {
      reasons.push(`Need more good shots: ${this.goodCaptures}/${cfg.goodCapturesTarget}`);
    }
    const filled = filledGridCells(this.gridCounts);
    if (filled < cfg.gridTargetFilled) {
      reasons.push(`Coverage: ${filled}/${cfg.gridTargetFilled}`);
    }
    return { enough: reasons.length === 0, reasons };
  }

  buildLiveGuidance(markerStatus: MarkerStatus, quality: QualityResult | null): CalibrationLiveGuidance {
    const cfg = this.config;
    const distance = quality?.distanceCm ?? null;
    const framingOk = snapshotFramingOk(freezeMarkerStatus(markerStatus), cfg.edgeMarginFraction);
    const filled = filledGridCells(this.gridCounts);
    const { enough } = this.evaluateSufficiency();

    let message: string;
    if (markerStatus.detections.length === 0) {
      message = "No markers: bring board/flags into view";
    } else if (!framingOk) {
      message = "Reframe: keep board away from edges";
    } else if (!distanceInRange(distance, cfg.distanceMinCm, cfg.distanceMaxCm)) {
      message =
        distance !== null && distance < cfg.distanceMinCm
          ? `Move farther (target ~${cfg.distanceTargetCm} cm)`
          : `Move closer (target ~${cfg.distanceTargetCm} cm)`;
    } else {
      const empty = firstEmptyGridCell(this.gridCounts);
      if (filled < cfg.gridTargetFilled && empty !== null) {
        message = `Move board to ${cellName(empty)}`;
      } else {
        message = enough ? "Calibration enough" : "Keep going";
      }
    }

    return {
      message,
      progress: `Calib shots: ${this.goodCaptures}/${cfg.goodCapturesTarget}`,
      coverageText: `Coverage: ${filled}/${GRID_CELLS}`,
      enough,
    };
  }

  buildManifestSummary(): CalibrationManifestSummary {
    const cfg = this.config;
    const { enough, reasons } = this.evaluateSufficiency();
    return {
      version: SUMMARY_VERSION,
      distanceTargetCm: cfg.distanceTargetCm,
      distanceRangeCm: [cfg.distanceMinCm, cfg.distanceMaxCm],
      edgeMarginFrac: cfg.edgeMarginFraction,
      goodCaptures: this.goodCaptures,
      targets: { goodCaptures: cfg.goodCapturesTarget, gridFilled: cfg.gridTargetFilled },
      coverageGridCounts: gridCountsRecord(this.gridCounts),
      coverageGridFilled: filledGridCells(this.gridCounts),
      enough,
      reasonsIfNotEnough: reasons,
    };
  }

  buildSidecarSummary(marker: FrozenMarkerSnapshot, quality: FrozenQualitySnapshot): CalibrationSidecarSummary {
    const cfg = this.config;
    return {
      mode: marker.mode,
      dictionary: cfg.dictionary,
      frameSize: [marker.frameWidth, marker.frameHeight],
      framingOk: snapshotFramingOk(marker, cfg.edgeMarginFraction),
      distanceCm: quality.distanceCm,
      distanceOk: distanceInRange(quality.distanceCm, cfg.distanceMinCm, cfg.distanceMaxCm),
      detections: sidecarDetections(marker),
    };
  }
}
