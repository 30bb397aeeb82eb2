/**
 * CaptureGuidanceTracker: deterministic phase guidance and sufficiency for
 * capture sessions.
 *
 * Counters change only in onCaptureSaved(), and only for captures that pass
 * the good-capture gate. Every other method reads. The current phase is not
 * stored; it is the first phase whose completion predicate is still false.
 *
 * All methods are synchronous, so each call runs to completion before any
 * other call on the same instance can start: a capture update can never
 * interleave with a live-guidance read.
 */

import {
  GRID_CELLS,
  cellName,
  chooseStableIdentities,
  filledGridCells,
  firstEmptyGridCell,
} from "./geometry.js";
import {
  CROSS_ARCH_MIN_SPREAD,
  STABLE_IDS_N_DEFAULT,
  SUMMARY_VERSION,
  UNLOCKED,
  classifyPlacement,
  distanceInRange,
  gridCountsRecord,
  sidecarDetections,
  snapshotFramingOk,
  type StableIdentityLock,
} from "./guidance-common.js";
import { normalizeRequiredIds } from "./marker-detector.js";
import { freezeMarkerStatus } from "./snapshot.js";
import { CapturePhase, MarkerMode, QualityStatus } from "./types.js";
import type {
  BlockReason,
  CaptureManifestSummary,
  CaptureSidecarSummary,
  FrozenMarkerSnapshot,
  FrozenQualitySnapshot,
  LiveGuidance,
  MarkerSessionSummary,
  MarkerStatus,
  QualityResult,
  Sufficiency,
} from "./types.js";

// ─── Config ─────────────────────────────────────────────────────────────────────

export interface PhaseTargets {
  /** Anchor: center/left/right mid-height hits, each. */
  anchorMid: number;
  /** Anchor: high-any and low-any hits, each. */
  anchorHeight: number;
  /** Sweeps: mid-height hits on the sweep side. */
  sweepMid: number;
  /** Sweeps: high and low hits on the sweep side, each. */
  sweepHeight: number;
  crossArchTotal: number;
  /** Cross-arch: high and low captures among the cross-arch ones, each. */
  crossArchHeight: number;
}

export interface CaptureGuidanceConfig {
  stableIdsN: number;
  distanceMinCm: number;
  distanceMaxCm: number;
  edgeMarginFraction: number;
  goodCapturesTarget: number;
  perTagTarget: number;
  gridTargetFilled: number;
  crossArchRequired: boolean;
  crossArchMinSpread: number;
  dictionary: string;
  phaseTargets: PhaseTargets;
}

export const DEFAULT_PHASE_TARGETS: PhaseTargets = {
  anchorMid: 2,
  anchorHeight: 2,
  sweepMid: 5,
  sweepHeight: 3,
  crossArchTotal: 6,
  crossArchHeight: 2,
};

export const DEFAULT_CAPTURE_GUIDANCE_CONFIG: CaptureGuidanceConfig = {
  stableIdsN: STABLE_IDS_N_DEFAULT,
  distanceMinCm: 20,
  distanceMaxCm: 30,
  edgeMarginFraction: 0.1,
  goodCapturesTarget: 60,
  perTagTarget: 10,
  gridTargetFilled: 7,
  crossArchRequired: true,
  crossArchMinSpread: CROSS_ARCH_MIN_SPREAD,
  dictionary: "APRILTAG_36h11",
  phaseTargets: DEFAULT_PHASE_TARGETS,
};

// ─── Counters ───────────────────────────────────────────────────────────────────

export interface CaptureCounters {
  goodCaptures: number;
  gridCounts: number[];
  /** Insertion-ordered identity → good captures containing it. */
  perTagCaptureCount: Map<number, number>;
  anchor: { centerMid: number; leftMid: number; rightMid: number; highAny: number; lowAny: number };
  left: { mid: number; high: number; low: number };
  right: { mid: number; high: number; low: number };
  crossArch: { total: number; high: number; low: number };
}

function freshCounters(): CaptureCounters {
  return {
    goodCaptures: 0,
    gridCounts: new Array<number>(GRID_CELLS).fill(0),
    perTagCaptureCount: new Map(),
    anchor: { centerMid: 0, leftMid: 0, rightMid: 0, highAny: 0, lowAny: 0 },
    left: { mid: 0, high: 0, low: 0 },
    right: { mid: 0, high: 0, low: 0 },
    crossArch: { total: 0, high: 0, low: 0 },
  };
}

function copyCounters(c: CaptureCounters): CaptureCounters {
  return {
    goodCaptures: c.goodCaptures,
    gridCounts: [...c.gridCounts],
    perTagCaptureCount: new Map(c.perTagCaptureCount),
    anchor: { ...c.anchor },
    left: { ...c.left },
    right: { ...c.right },
    crossArch: { ...c.crossArch },
  };
}

const PHASE_ORDER: readonly CapturePhase[] = [
  CapturePhase.ANCHOR,
  CapturePhase.LEFT_SWEEP,
  CapturePhase.RIGHT_SWEEP,
  CapturePhase.CROSS_ARCH,
];

// ─── CaptureGuidanceTracker Class ───────────────────────────────────────────────

export class CaptureGuidanceTracker {
  private readonly config: CaptureGuidanceConfig;
  private counters: CaptureCounters;
  private stableLock: StableIdentityLock;
  private requiredIdsActive: number[];

  private log(level: string, msg: string): void {
    console.log(`[${level}] [CaptureGuidance] ${msg}`);
  }

  constructor(config: Partial<CaptureGuidanceConfig> = {}) {
    this.config = {
      ...DEFAULT_CAPTURE_GUIDANCE_CONFIG,
      ...config,
      phaseTargets: { ...DEFAULT_PHASE_TARGETS, ...config.phaseTargets },
    };
    this.counters = freshCounters();
    this.stableLock = UNLOCKED;
    this.requiredIdsActive = [];
  }

  // ─── Session control ────────────────────────────────────────────────────────

  resetForNewSession(): void {
    this.counters = freshCounters();
    this.stableLock = UNLOCKED;
    this.requiredIdsActive = [];
  }

  /**
   * Statistics gathered under a different required set are not comparable,
   * so changing it starts the counters over.
   */
  onRequiredIdentitiesChanged(ids: readonly number[]): void {
    this.requiredIdsActive = normalizeRequiredIds(ids);
    this.counters = freshCounters();
    this.stableLock =
      this.requiredIdsActive.length > 0 ? { state: "locked", ids: [...this.requiredIdsActive] } : UNLOCKED;
    this.log("INFO", `Required identities changed to [${this.requiredIdsActive.join(",")}]; statistics reset`);
  }

  // ─── Phases ─────────────────────────────────────────────────────────────────

  isPhaseComplete(phase: CapturePhase): boolean {
    const t = this.config.phaseTargets;
    const c = this.counters;
    switch (phase) {
      case CapturePhase.ANCHOR:
        return (
          c.anchor.centerMid >= t.anchorMid &&
          c.anchor.leftMid >= t.anchorMid &&
          c.anchor.rightMid >= t.anchorMid &&
          c.anchor.highAny >= t.anchorHeight &&
          c.anchor.lowAny >= t.anchorHeight
        );
      case CapturePhase.LEFT_SWEEP:
        return c.left.mid >= t.sweepMid && c.left.high >= t.sweepHeight && c.left.low >= t.sweepHeight;
      case CapturePhase.RIGHT_SWEEP:
        return c.right.mid >= t.sweepMid && c.right.high >= t.sweepHeight && c.right.low >= t.sweepHeight;
      case CapturePhase.CROSS_ARCH:
        return (
          c.crossArch.total >= t.crossArchTotal &&
          c.crossArch.high >= t.crossArchHeight &&
          c.crossArch.low >= t.crossArchHeight
        );
      case CapturePhase.CLEANUP:
        return this.evaluateSufficiency().enough;
    }
  }

  currentPhase(): CapturePhase {
    for (const phase of PHASE_ORDER) {
      if (!this.isPhaseComplete(phase)) return phase;
    }
    return CapturePhase.CLEANUP;
  }

  private phaseProgressText(phase: CapturePhase): string {
    const t = this.config.phaseTargets;
    const c = this.counters;
    const capped = (value: number, target: number) => Math.min(value, target);
    switch (phase) {
      case CapturePhase.ANCHOR: {
        const done =
          capped(c.anchor.centerMid, t.anchorMid) +
          capped(c.anchor.leftMid, t.anchorMid) +
          capped(c.anchor.rightMid, t.anchorMid) +
          capped(c.anchor.highAny, t.anchorHeight) +
          capped(c.anchor.lowAny, t.anchorHeight);
        return `Phase A (Anchor): ${done}/${3 * t.anchorMid + 2 * t.anchorHeight}`;
      }
      case CapturePhase.LEFT_SWEEP: {
        const done = capped(c.left.mid, t.sweepMid) + capped(c.left.high, t.sweepHeight) + capped(c.left.low, t.sweepHeight);
        return `Phase B (Left sweep): ${done}/${t.sweepMid + 2 * t.sweepHeight}`;
      }
      case CapturePhase.RIGHT_SWEEP: {
        const done = capped(c.right.mid, t.sweepMid) + capped(c.right.high, t.sweepHeight) + capped(c.right.low, t.sweepHeight);
        return `Phase C (Right sweep): ${done}/${t.sweepMid + 2 * t.sweepHeight}`;
      }
      case CapturePhase.CROSS_ARCH:
        return `Phase D (Cross-arch): ${c.crossArch.total}/${t.crossArchTotal} (H:${c.crossArch.high} L:${c.crossArch.low})`;
      case CapturePhase.CLEANUP:
        return "Phase E (Cleanup)";
    }
  }

  // ─── Tracked identities ─────────────────────────────────────────────────────

  /** Read-only resolution: required, else the locked set, else current top candidates. */
  private resolveTrackedIds(required: readonly number[], summary: MarkerSessionSummary): number[] {
    if (required.length > 0) return [...required];
    if (this.stableLock.state === "locked") return [...this.stableLock.ids];
    return chooseStableIdentities(summary.perTagCount, this.config.stableIdsN);
  }

  /** Unlocked → Locked happens once, when N distinct candidates exist. */
  private lockStableIdsIfPossible(required: readonly number[], summary: MarkerSessionSummary): void {
    if (this.stableLock.state === "locked") return;
    if (required.length > 0) {
      this.stableLock = { state: "locked", ids: [...required] };
      return;
    }
    const n = this.config.stableIdsN;
    const candidates = chooseStableIdentities(summary.perTagCount, n);
    if (n > 0 && candidates.length >= n) {
      this.stableLock = { state: "locked", ids: candidates };
      this.log("INFO", `Stable identities locked: [${candidates.join(",")}]`);
    }
  }

  trackedIds(summary: MarkerSessionSummary): number[] {
    return this.resolveTrackedIds(this.requiredIdsActive, summary);
  }

  // ─── Gates ──────────────────────────────────────────────────────────────────

  /** Good capture: quality OK, distance in range, framing OK, at least one detection. */
  isGoodCapture(marker: FrozenMarkerSnapshot, quality: FrozenQualitySnapshot): boolean {
    const cfg = this.config;
    return (
      quality.status === QualityStatus.OK &&
      distanceInRange(quality.distanceCm, cfg.distanceMinCm, cfg.distanceMaxCm) &&
      snapshotFramingOk(marker, cfg.edgeMarginFraction) &&
      marker.detections.length > 0
    );
  }

  // ─── Mutator ────────────────────────────────────────────────────────────────

  /**
   * Record a committed capture. Returns false, changing nothing, when the
   * capture fails the good-capture gate.
   */
  onCaptureSaved(
    marker: FrozenMarkerSnapshot,
    quality: FrozenQualitySnapshot,
    markerSummary: MarkerSessionSummary,
  ): boolean {
    if (!this.isGoodCapture(marker, quality)) return false;

    const c = this.counters;
    c.goodCaptures += 1;

    const placement = classifyPlacement(marker, this.config.crossArchMinSpread);
    if (placement) {
      const { lateral, height } = placement;
      c.gridCounts[placement.gridCell] += 1;

      if (height === "MID") {
        if (lateral === "CENTER") c.anchor.centerMid += 1;
        if (lateral === "LEFT") c.anchor.leftMid += 1;
        if (lateral === "RIGHT") c.anchor.rightMid += 1;
      }
      if (height === "HIGH") c.anchor.highAny += 1;
      if (height === "LOW") c.anchor.lowAny += 1;

      const side = lateral === "LEFT" ? c.left : lateral === "RIGHT" ? c.right : null;
      if (side) {
        if (height === "MID") side.mid += 1;
        if (height === "HIGH") side.high += 1;
        if (height === "LOW") side.low += 1;
      }

      if (placement.crossArch) {
        c.crossArch.total += 1;
        if (height === "HIGH") c.crossArch.high += 1;
        if (height === "LOW") c.crossArch.low += 1;
      }
    }

    // The snapshot may predate the latest setRequiredIds; the tracker's set wins.
    this.lockStableIdsIfPossible(this.requiredIdsActive, markerSummary);
    const tracked = this.resolveTrackedIds(this.requiredIdsActive, markerSummary);
    const present = new Set(marker.detectedIds);
    for (const id of tracked) {
      const prev = c.perTagCaptureCount.get(id) ?? 0;
      c.perTagCaptureCount.set(id, present.has(id) ? prev + 1 : prev);
    }

    return true;
  }

  // ─── Reads ──────────────────────────────────────────────────────────────────

  /** Reasons in fixed order: good captures, coverage, cross-arch, per identity. */
  evaluateSufficiency(trackedIds: readonly number[] = this.currentTrackedIds()): Sufficiency {
    const cfg = this.config;
    const c = this.counters;
    const reasons: string[] = [];

    if (c.goodCaptures < cfg.goodCapturesTarget) {
      reasons.push(`Need more good shots: ${c.goodCaptures}/${cfg.goodCapturesTarget}`);
    }
    const filled = filledGridCells(c.gridCounts);
    if (filled < cfg.gridTargetFilled) {
      reasons.push(`Coverage: ${filled}/${cfg.gridTargetFilled}`);
    }
    if (cfg.crossArchRequired && !this.isPhaseComplete(CapturePhase.CROSS_ARCH)) {
      reasons.push("Cross-arch obliques missing");
    }
    for (const id of trackedIds) {
      const count = c.perTagCaptureCount.get(id) ?? 0;
      if (count < cfg.perTagTarget) reasons.push(`Tag ${id}: ${count}/${cfg.perTagTarget}`);
    }

    return { enough: reasons.length === 0, reasons };
  }

  /** Tracked identities as known to the tracker alone (no fresh candidates). */
  private currentTrackedIds(): number[] {
    if (this.requiredIdsActive.length > 0) return [...this.requiredIdsActive];
    if (this.stableLock.state === "locked") return [...this.stableLock.ids];
    return [...this.counters.perTagCaptureCount.keys()];
  }

  /** Operator-facing guidance for the current frame. Never mutates counters. */
  buildLiveGuidance(
    markerStatus: MarkerStatus,
    quality: QualityResult | null,
    markerSummary: MarkerSessionSummary,
  ): LiveGuidance {
    const cfg = this.config;
    const frozen = freezeMarkerStatus(markerStatus);
    const distance = quality?.distanceCm ?? null;
    const distOk = distanceInRange(distance, cfg.distanceMinCm, cfg.distanceMaxCm);
    const framingOk = snapshotFramingOk(frozen, cfg.edgeMarginFraction);

    const required = markerStatus.requiredIds;
    const missing = markerStatus.missingRequiredIds;
    const tracked = this.resolveTrackedIds(required, markerSummary);

    const phase = this.currentPhase();
    const { enough, reasons } = this.evaluateSufficiency(tracked);
    const filled = filledGridCells(this.counters.gridCounts);
    const range = `${cfg.distanceMinCm}-${cfg.distanceMaxCm} cm`;

    let message: string;
    if (markerStatus.detections.length === 0) {
      message = "No markers: move closer / improve lighting";
    } else if (required.length > 0 && missing.length > 0) {
      message = `Missing: ${missing.join(",")}`;
    } else if (!framingOk) {
      message = "Reframe: keep tags away from edges";
    } else if (!distOk) {
      message =
        distance !== null && distance < cfg.distanceMinCm
          ? `Move farther (target ${range})`
          : `Move closer (target ${range})`;
    } else {
      message = this.phaseHint(phase, tracked, enough, reasons);
    }

    let blockReason: BlockReason | null = null;
    if (markerStatus.mode === MarkerMode.BLOCK) {
      if (required.length > 0 && missing.length > 0) blockReason = "Missing required";
      else if (!framingOk) blockReason = "Framing";
      else if (!distOk) blockReason = "Distance";
    }

    return {
      message,
      phase,
      phaseProgress: this.phaseProgressText(phase),
      coverageText: `Coverage: ${filled}/${GRID_CELLS}`,
      enough,
      blockReason,
    };
  }

  private phaseHint(
    phase: CapturePhase,
    tracked: readonly number[],
    enough: boolean,
    reasons: readonly string[],
  ): string {
    switch (phase) {
      case CapturePhase.ANCHOR:
        return "Next: anchor ring (front/left/right + high/low)";
      case CapturePhase.LEFT_SWEEP:
        return "Next: sweep LEFT side (upper + lower rail)";
      case CapturePhase.RIGHT_SWEEP:
        return "Next: sweep RIGHT side (upper + lower rail)";
      case CapturePhase.CROSS_ARCH:
        return "Next: cross-arch obliques (high + low)";
      case CapturePhase.CLEANUP: {
        const target = this.config.perTagTarget;
        const weak = tracked.filter((id) => (this.counters.perTagCaptureCount.get(id) ?? 0) < target);
        if (weak.length > 0) return `Cleanup: weak tags ${weak.join(",")} (need ${target} each)`;
        if (!enough) {
          const firstGap = reasons[0] ?? "Keep going";
          const empty = firstEmptyGridCell(this.counters.gridCounts);
          return empty !== null && firstGap.startsWith("Coverage") ? `${firstGap}: try ${cellName(empty)}` : firstGap;
        }
        return "Enough";
      }
    }
  }

  // ─── Summaries ──────────────────────────────────────────────────────────────

  buildManifestSummary(markerSummary: MarkerSessionSummary): CaptureManifestSummary {
    const cfg = this.config;
    const c = this.counters;
    const tracked = this.resolveTrackedIds(this.requiredIdsActive, markerSummary);
    const { enough, reasons } = this.evaluateSufficiency(tracked);

    const perTag: Record<string, number> = {};
    for (const id of [...tracked].sort((a, b) => a - b)) {
      perTag[String(id)] = c.perTagCaptureCount.get(id) ?? 0;
    }

    return {
      version: SUMMARY_VERSION,
      stableIdsN: cfg.stableIdsN,
      trackedIds: tracked,
      distanceRangeCm: [cfg.distanceMinCm, cfg.distanceMaxCm],
      edgeMarginFrac: cfg.edgeMarginFraction,
      goodCaptures: c.goodCaptures,
      targets: {
        goodCaptures: cfg.goodCapturesTarget,
        perTag: cfg.perTagTarget,
        gridFilled: cfg.gridTargetFilled,
        crossArchRequired: cfg.crossArchRequired,
      },
      coverageGridCounts: gridCountsRecord(c.gridCounts),
      coverageGridFilled: filledGridCells(c.gridCounts),
      perTagCaptureCount: perTag,
      phaseProgress: {
        phaseA: { ...c.anchor },
        phaseB_left: { leftMid: c.left.mid, leftHigh: c.left.high, leftLow: c.left.low },
        phaseC_right: { rightMid: c.right.mid, rightHigh: c.right.high, rightLow: c.right.low },
        phaseD_crossArch: { ...c.crossArch },
      },
      enough,
      reasonsIfNotEnough: reasons,
    };
  }

  buildSidecarSummary(
    marker: FrozenMarkerSnapshot,
    quality: FrozenQualitySnapshot,
    markerSummary: MarkerSessionSummary,
  ): CaptureSidecarSummary {
    const cfg = this.config;
    const placement = marker.detections.length > 0 ? classifyPlacement(marker, cfg.crossArchMinSpread) : null;

    return {
      mode: marker.mode,
      dictionary: cfg.dictionary,
      frameSize: [marker.frameWidth, marker.frameHeight],
      requiredIds: [...marker.requiredIds],
      trackedIds: this.resolveTrackedIds(this.requiredIdsActive, markerSummary),
      missingRequiredIds: [...marker.missingRequiredIds],
      detectedIds: [...marker.detectedIds].sort((a, b) => a - b),
      allRequiredVisible: marker.allRequiredVisible,
      framingOk: snapshotFramingOk(marker, cfg.edgeMarginFraction),
      distanceCm: quality.distanceCm,
      distanceOk: distanceInRange(quality.distanceCm, cfg.distanceMinCm, cfg.distanceMaxCm),
      phase: this.currentPhase(),
      gridCell: placement?.gridCell ?? null,
      lateralBin: placement?.lateral ?? null,
      heightBin: placement?.height ?? null,
      crossArch: placement?.crossArch ?? false,
      detections: sidecarDetections(marker),
    };
  }

  /** Copy of the session counters. */
  counterSnapshot(): CaptureCounters {
    return copyCounters(this.counters);
  }
}
