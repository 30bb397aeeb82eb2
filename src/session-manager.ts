// Capture Guidance - Session Manager
// Registry of capture and calibration sessions. Each session owns one
// CapturePipeline (frame analysis) and one guidance tracker (counters).
// Trackers of different sessions share nothing.

import { v4 as uuidv4 } from "uuid";
import { CalibrationGuidanceTracker, type CalibrationGuidanceConfig } from "./calibration-guidance-tracker.js";
import { CaptureGuidanceTracker, type CaptureGuidanceConfig } from "./capture-guidance-tracker.js";
import { CapturePipeline, type FrameUpdate } from "./capture-pipeline.js";
import { DisabledMarkerDetector, normalizeRequiredIds, type MarkerDetector } from "./marker-detector.js";
import type { QualityConfig } from "./quality-analyzer.js";
import { MarkerMode, QualityStatus } from "./types.js";
import type {
  CalibrationLiveGuidance,
  CalibrationManifestSummary,
  CaptureManifestSummary,
  CaptureOutcome,
  LiveGuidance,
  RawFrame,
  SessionKind,
} from "./types.js";

// ─── Sessions ───────────────────────────────────────────────────────────────────

interface SessionBase {
  id: string;
  createdAt: number;
  pipeline: CapturePipeline;
  requiredIds: number[];
  captureSeq: number;
}

export interface CaptureSession extends SessionBase {
  kind: "capture";
  tracker: CaptureGuidanceTracker;
}

export interface CalibrationSession extends SessionBase {
  kind: "calibration";
  tracker: CalibrationGuidanceTracker;
}

export type Session = CaptureSession | CalibrationSession;

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionManagerDeps {
  /** One detector per session. Defaults to DisabledMarkerDetector. */
  markerDetectorFactory?: () => MarkerDetector;
  qualityConfig?: Partial<QualityConfig>;
  captureGuidance?: Partial<CaptureGuidanceConfig>;
  calibrationGuidance?: Partial<CalibrationGuidanceConfig>;
  /** Called after each frame a session's pipeline processes. */
  onFrameProcessed?: (sessionId: string, update: FrameUpdate) => void;
  /** Start each session's drain loop on creation. Off by default. */
  autoStart?: boolean;
}

export class SessionManager {
  private sessions: Map<string, Session> = new Map();
  private readonly deps: SessionManagerDeps;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [SessionManager] ${msg}`);
  }

  constructor(deps: SessionManagerDeps = {}) {
    this.deps = deps;
    this.log(
      "INIT",
      `Marker detection: ${deps.markerDetectorFactory ? "enabled (factory provided)" : "disabled (no factory)"}`,
    );
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  createSession(kind: SessionKind): Session {
    const id = uuidv4();
    const markerDetector = this.deps.markerDetectorFactory?.() ?? new DisabledMarkerDetector();
    const onFrameProcessed = this.deps.onFrameProcessed;
    const pipeline = new CapturePipeline({
      markerDetector,
      qualityConfig: this.deps.qualityConfig,
      onFrameProcessed: onFrameProcessed ? (update) => onFrameProcessed(id, update) : undefined,
    });

    const base: SessionBase = { id, createdAt: Date.now(), pipeline, requiredIds: [], captureSeq: 0 };
    const session: Session =
      kind === "capture"
        ? {
            ...base,
            kind,
            tracker: new CaptureGuidanceTracker({
              ...this.deps.captureGuidance,
              dictionary: markerDetector.dictionary,
            }),
          }
        : {
            ...base,
            kind,
            tracker: new CalibrationGuidanceTracker({
              ...this.deps.calibrationGuidance,
              dictionary: markerDetector.dictionary,
            }),
          };

    this.sessions.set(id, session);
    if (this.deps.autoStart) pipeline.start();
    this.log("INFO", `Created ${kind} session ${id}`);
    return session;
  }

  getSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Session not found: ${sessionId}`);
    }
    return session;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Stop the session's drain loop and forget it. */
  async closeSession(sessionId: string): Promise<void> {
    const session = this.getSession(sessionId);
    this.sessions.delete(sessionId);
    await session.pipeline.stop();
    this.log("INFO", `Closed session ${sessionId} after ${session.captureSeq} capture(s)`);
  }

  async closeAll(): Promise<void> {
    const ids = [...this.sessions.keys()];
    await Promise.all(ids.map((id) => this.closeSession(id)));
  }

  /** Clear analysis state and counters. Mode and required identities stay. */
  resetSession(sessionId: string): void {
    const session = this.getSession(sessionId);
    session.pipeline.reset();
    session.tracker.resetForNewSession();
    if (session.kind === "capture" && session.requiredIds.length > 0) {
      session.tracker.onRequiredIdentitiesChanged(session.requiredIds);
    }
    session.captureSeq = 0;
    this.log("INFO", `Reset session ${sessionId}`);
  }

  // ─── Inputs ─────────────────────────────────────────────────────────────────

  submitFrame(sessionId: string, frame: RawFrame, focusDiopters?: number): void {
    const session = this.getSession(sessionId);
    if (focusDiopters !== undefined) session.pipeline.setFocusDistance(focusDiopters);
    session.pipeline.submit(frame);
  }

  setMode(sessionId: string, mode: MarkerMode): void {
    this.getSession(sessionId).pipeline.markerDetector.setMode(mode);
  }

  /** Returns the normalized identity list now in effect. */
  setRequiredIds(sessionId: string, ids: readonly number[]): number[] {
    const session = this.getSession(sessionId);
    const normalized = normalizeRequiredIds(ids);
    session.requiredIds = normalized;
    session.pipeline.markerDetector.setRequiredIdentities(normalized);
    if (session.kind === "capture") {
      session.tracker.onRequiredIdentitiesChanged(normalized);
    }
    return normalized;
  }

  setFocusDistance(sessionId: string, diopters: number | null): void {
    this.getSession(sessionId).pipeline.setFocusDistance(diopters);
  }

  // ─── Reads ──────────────────────────────────────────────────────────────────

  liveGuidance(sessionId: string): LiveGuidance | CalibrationLiveGuidance {
    const session = this.getSession(sessionId);
    const { pipeline } = session;
    if (session.kind === "capture") {
      return session.tracker.buildLiveGuidance(
        pipeline.latestMarker(),
        pipeline.latestQuality(),
        pipeline.markerDetector.sessionSummary(),
      );
    }
    return session.tracker.buildLiveGuidance(pipeline.latestMarker(), pipeline.latestQuality());
  }

  manifest(sessionId: string): CaptureManifestSummary | CalibrationManifestSummary {
    const session = this.getSession(sessionId);
    if (session.kind === "capture") {
      return session.tracker.buildManifestSummary(session.pipeline.markerDetector.sessionSummary());
    }
    return session.tracker.buildManifestSummary();
  }

  // ─── Capture ────────────────────────────────────────────────────────────────

  /**
   * Commit a capture against the latest analyzed frame. In BLOCK mode a
   * capture with a block reason or a non-OK quality status is refused and
   * nothing is counted.
   */
  commitCapture(sessionId: string): CaptureOutcome {
    const session = this.getSession(sessionId);
    const { pipeline } = session;
    if (!pipeline.hasResults) {
      throw new Error(`No analyzed frame yet for session ${sessionId}`);
    }

    session.captureSeq += 1;
    const captureSeq = session.captureSeq;
    const { marker, quality } = pipeline.freezeForCapture();

    if (marker.mode === MarkerMode.BLOCK) {
      let blockReason: string | null =
        session.kind === "capture" ? this.captureBlockReason(session) : null;
      if (!blockReason && quality.status !== QualityStatus.OK) {
        blockReason = `Quality ${quality.status}`;
      }
      if (blockReason) {
        this.log("INFO", `Capture ${captureSeq} blocked in session ${sessionId}: ${blockReason}`);
        return { captureSeq, saved: false, counted: false, blockReason, sidecar: null };
      }
    }

    if (session.kind === "capture") {
      const summary = pipeline.markerDetector.sessionSummary();
      const counted = session.tracker.onCaptureSaved(marker, quality, summary);
      const sidecar = session.tracker.buildSidecarSummary(marker, quality, summary);
      return { captureSeq, saved: true, counted, blockReason: null, sidecar };
    }

    const counted = session.tracker.onCaptureSaved(marker, quality);
    const sidecar = session.tracker.buildSidecarSummary(marker, quality);
    return { captureSeq, saved: true, counted, blockReason: null, sidecar };
  }

  private captureBlockReason(session: CaptureSession): string | null {
    const { pipeline } = session;
    return session.tracker.buildLiveGuidance(
      pipeline.latestMarker(),
      pipeline.latestQuality(),
      pipeline.markerDetector.sessionSummary(),
    ).blockReason;
  }
}
