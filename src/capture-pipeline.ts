/**
 * CapturePipeline: per-session frame analysis.
 * Holds the newest pending frame in a LatestFrameSlot, drains it through the
 * QualityAnalyzer and the MarkerDetector one frame at a time, and exposes the
 * latest results plus frozen copies for capture commits.
 *
 * The drain loop yields to the event loop after every frame, so control
 * messages (mode changes, captures) wait at most one frame.
 */

import { LatestFrameSlot } from "./frame-slot.js";
import { QualityAnalyzer, type QualityConfig } from "./quality-analyzer.js";
import { freezeMarkerStatus, freezeQualityResult } from "./snapshot.js";
import type { MarkerDetector } from "./marker-detector.js";
import type {
  FrozenMarkerSnapshot,
  FrozenQualitySnapshot,
  MarkerStatus,
  QualityResult,
  RawFrame,
} from "./types.js";

// ─── Types ──────────────────────────────────────────────────────────────────────

export interface FrameUpdate {
  marker: MarkerStatus;
  quality: QualityResult | null;
}

export interface CaptureFreeze {
  marker: FrozenMarkerSnapshot;
  quality: FrozenQualitySnapshot;
}

export interface PipelineStats {
  framesReceived: number;
  framesProcessed: number;
  framesDropped: number;
  framesErrored: number;
}

export interface CapturePipelineDeps {
  markerDetector: MarkerDetector;
  qualityConfig?: Partial<QualityConfig>;
  /** Called after each processed frame with the published results. */
  onFrameProcessed?: (update: FrameUpdate) => void;
  /** Drain loop sleep when no frame is pending. */
  idleMs?: number;
}

const DEFAULT_IDLE_MS = 10;

// ─── CapturePipeline Class ──────────────────────────────────────────────────────

export class CapturePipeline {
  readonly markerDetector: MarkerDetector;
  private readonly qualityAnalyzer: QualityAnalyzer;
  private readonly slot: LatestFrameSlot<RawFrame>;
  private readonly onFrameProcessed?: (update: FrameUpdate) => void;
  private readonly idleMs: number;

  private focusDiopters: number | null;
  private running: boolean;
  private loopDone: Promise<void> | null;

  private framesReceived: number;
  private framesProcessed: number;
  private framesErrored: number;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [CapturePipeline] ${msg}`);
  }

  constructor(deps: CapturePipelineDeps) {
    this.markerDetector = deps.markerDetector;
    this.qualityAnalyzer = new QualityAnalyzer(deps.qualityConfig, {
      focusDistance: () => this.focusDiopters,
    });
    this.slot = new LatestFrameSlot<RawFrame>();
    this.onFrameProcessed = deps.onFrameProcessed;
    this.idleMs = deps.idleMs ?? DEFAULT_IDLE_MS;
    this.focusDiopters = null;
    this.running = false;
    this.loopDone = null;
    this.framesReceived = 0;
    this.framesProcessed = 0;
    this.framesErrored = 0;
  }

  // ─── Input ──────────────────────────────────────────────────────────────────

  /** Offer a frame; any frame still pending is dropped. */
  submit(frame: RawFrame): void {
    this.framesReceived++;
    this.slot.offer(frame);
  }

  /** Latest lens focus distance in diopters; null when unknown. */
  setFocusDistance(diopters: number | null): void {
    this.focusDiopters = diopters !== null && Number.isFinite(diopters) ? diopters : null;
  }

  // ─── Processing ─────────────────────────────────────────────────────────────

  /** Analyze the pending frame, if any. Returns true when a frame was taken. */
  processPending(): boolean {
    const frame = this.slot.take();
    if (!frame) return false;

    try {
      this.qualityAnalyzer.analyze(frame);
      this.markerDetector.process(frame);
      this.framesProcessed++;
    } catch (err) {
      this.framesErrored++;
      const message = err instanceof Error ? err.message : String(err);
      this.log("WARN", `Frame ${frame.timestampNs} failed: ${message}`);
      return true;
    }

    this.onFrameProcessed?.({
      marker: this.markerDetector.latest(),
      quality: this.qualityAnalyzer.latest(),
    });
    return true;
  }

  /** Start the async drain loop. No-op when already running. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.loopDone = this.drainLoop().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      this.log("ERROR", `Drain loop stopped: ${message}`);
      this.running = false;
    });
  }

  /** Stop the drain loop and wait for the current frame to finish. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.loopDone) {
      await this.loopDone;
      this.loopDone = null;
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  private async drainLoop(): Promise<void> {
    while (this.running) {
      const processed = this.processPending();
      await new Promise((resolve) => setTimeout(resolve, processed ? 0 : this.idleMs));
    }
  }

  // ─── Reads ──────────────────────────────────────────────────────────────────

  latestMarker(): MarkerStatus {
    return this.markerDetector.latest();
  }

  latestQuality(): QualityResult | null {
    return this.qualityAnalyzer.latest();
  }

  /** True once at least one frame has been analyzed since the last reset. */
  get hasResults(): boolean {
    return this.framesProcessed > 0;
  }

  /** Deep frozen copies of the latest marker status and quality result. */
  freezeForCapture(): CaptureFreeze {
    return {
      marker: freezeMarkerStatus(this.markerDetector.latest()),
      quality: freezeQualityResult(this.qualityAnalyzer.latest()),
    };
  }

  stats(): PipelineStats {
    return {
      framesReceived: this.framesReceived,
      framesProcessed: this.framesProcessed,
      framesDropped: this.slot.framesDropped,
      framesErrored: this.framesErrored,
    };
  }

  /** Drop pending work and analysis state. Mode and required identities stay. */
  reset(): void {
    this.slot.clear();
    this.qualityAnalyzer.reset();
    this.markerDetector.reset();
    this.framesProcessed = 0;
  }
}
