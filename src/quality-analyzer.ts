/**
 * QualityAnalyzer: per-frame image-quality scoring on raw luma buffers.
 * Self-throttles to a target frequency, then measures sharpness (Laplacian
 * variance), highlight/shadow clipping and specular-highlight clusters over a
 * centered region, and classifies the frame.
 *
 * The only state kept across calls is the sampler's last timestamp and the
 * last published result.
 */

import { FrameSampler } from "./frame-sampler.js";
import { centerRoi, isSupportedLumaLayout } from "./luma-frame.js";
import { QualityStatus } from "./types.js";
import type { QualityResult, RawFrame, RegionOfInterest } from "./types.js";

// ─── Config ─────────────────────────────────────────────────────────────────────

export interface QualityConfig {
  targetHz: number;
  roiFraction: number;
  roiMinSide: number;
  /** Sampling stride for both the Laplacian and the exposure pass. */
  sampleStep: number;
  blurThreshold: number;
  clipHigh: number;
  clipLow: number;
  overThreshold: number;
  underThreshold: number;
  /** Over-exposure with at most this many clusters may still be specular. */
  specularMaxClusters: number;
  /** ...and with no cluster larger than this (sampled pixels). */
  specularMaxClusterSize: number;
}

export const DEFAULT_QUALITY_CONFIG: QualityConfig = {
  targetHz: 12,
  roiFraction: 0.4,
  roiMinSide: 64,
  sampleStep: 2,
  blurThreshold: 150,
  clipHigh: 245,
  clipLow: 10,
  overThreshold: 0.02,
  underThreshold: 0.02,
  specularMaxClusters: 5,
  specularMaxClusterSize: 100,
};

/** Supplies the latest lens focus distance in diopters, or null. */
export type FocusDistanceSource = () => number | null;

export interface QualityAnalyzerDeps {
  focusDistance?: FocusDistanceSource;
}

// ─── Metrics ────────────────────────────────────────────────────────────────────

export interface LaplacianStats {
  variance: number;
  samples: number;
}

/**
 * Population variance of the 4-neighbour Laplacian
 * (up + down + left + right − 4·center) over the ROI interior, sampled every
 * `step` pixels in both directions.
 */
export function computeLaplacianVariance(
  frame: RawFrame,
  roi: RegionOfInterest,
  step: number,
): LaplacianStats {
  const { luma, rowStride } = frame;
  const stride = Math.max(1, Math.floor(step));
  let sum = 0;
  let sumSq = 0;
  let count = 0;

  for (let y = roi.y + 1; y < roi.y + roi.height - 1; y += stride) {
    const base = y * rowStride;
    const up = base - rowStride;
    const down = base + rowStride;
    for (let x = roi.x + 1; x < roi.x + roi.width - 1; x += stride) {
      const lap =
        luma[up + x] + luma[down + x] + luma[base + x - 1] + luma[base + x + 1] - 4 * luma[base + x];
      sum += lap;
      sumSq += lap * lap;
      count++;
    }
  }

  if (count === 0) return { variance: 0, samples: 0 };
  const mean = sum / count;
  return { variance: sumSq / count - mean * mean, samples: count };
}

export interface ExposureStats {
  overFraction: number;
  underFraction: number;
  samples: number;
  /** Over-threshold samples as [column, row] in sample-grid coordinates. */
  clipped: Array<[number, number]>;
}

export function measureExposure(
  frame: RawFrame,
  roi: RegionOfInterest,
  step: number,
  clipHigh: number,
  clipLow: number,
): ExposureStats {
  const { luma, rowStride } = frame;
  const stride = Math.max(1, Math.floor(step));
  const clipped: Array<[number, number]> = [];
  let high = 0;
  let low = 0;
  let total = 0;

  for (let y = roi.y, row = 0; y < roi.y + roi.height; y += stride, row++) {
    const base = y * rowStride;
    for (let x = roi.x, col = 0; x < roi.x + roi.width; x += stride, col++) {
      const v = luma[base + x];
      if (v >= clipHigh) {
        high++;
        clipped.push([col, row]);
      }
      if (v <= clipLow) low++;
      total++;
    }
  }

  return {
    overFraction: total > 0 ? high / total : 0,
    underFraction: total > 0 ? low / total : 0,
    samples: total,
    clipped,
  };
}

export interface ClusterStats {
  count: number;
  largest: number;
}

const CLUSTER_KEY_BASE = 1 << 20;

function clusterKey(col: number, row: number): number {
  return row * CLUSTER_KEY_BASE + col;
}

/**
 * 8-connected component labeling over a set of grid coordinates.
 * Stack-based flood fill; visited coordinates are removed from the working set.
 */
export function labelSpecularClusters(points: ReadonlyArray<readonly [number, number]>): ClusterStats {
  const remaining = new Set<number>();
  for (const [col, row] of points) remaining.add(clusterKey(col, row));

  let count = 0;
  let largest = 0;

  for (const [col, row] of points) {
    const seed = clusterKey(col, row);
    if (!remaining.delete(seed)) continue;

    count++;
    let size = 0;
    const stack: Array<[number, number]> = [[col, row]];
    while (stack.length > 0) {
      const next = stack.pop();
      if (!next) break;
      const [cx, cy] = next;
      size++;
      for (let dy = -1; dy <= 1; dy++) {
        for (let dx = -1; dx <= 1; dx++) {
          if (dx === 0 && dy === 0) continue;
          const nx = cx + dx;
          const ny = cy + dy;
          if (nx < 0 || ny < 0) continue;
          if (remaining.delete(clusterKey(nx, ny))) stack.push([nx, ny]);
        }
      }
    }
    largest = Math.max(largest, size);
  }

  return { count, largest };
}

/** Convert a focus distance in diopters (1/m) to centimetres. */
export function distanceFromDiopters(diopters: number | null | undefined): number | null {
  if (diopters === null || diopters === undefined || !Number.isFinite(diopters) || diopters <= 0) {
    return null;
  }
  return 100 / diopters;
}

export interface QualityMetrics {
  blurScore: number;
  overFraction: number;
  underFraction: number;
  specularClusterCount: number;
  largestSpecularCluster: number;
}

/**
 * Classification in priority order: BLUR → OVER/SPECULAR → UNDER → OK.
 * Over-exposure made of a few small clusters is SPECULAR rather than OVER.
 */
export function classifyQuality(
  metrics: QualityMetrics,
  config: QualityConfig = DEFAULT_QUALITY_CONFIG,
): QualityStatus {
  if (metrics.blurScore < config.blurThreshold) return QualityStatus.BLUR;
  if (metrics.overFraction > config.overThreshold) {
    const fewSmall =
      metrics.specularClusterCount <= config.specularMaxClusters &&
      metrics.largestSpecularCluster <= config.specularMaxClusterSize;
    return fewSmall ? QualityStatus.SPECULAR : QualityStatus.OVER;
  }
  if (metrics.underFraction > config.underThreshold) return QualityStatus.UNDER;
  return QualityStatus.OK;
}

// ─── QualityAnalyzer Class ──────────────────────────────────────────────────────

export class QualityAnalyzer {
  private readonly config: QualityConfig;
  private readonly deps: QualityAnalyzerDeps;
  private readonly sampler: FrameSampler;
  private latestResult: QualityResult | null;
  private unsupportedWarned: boolean;

  private log(level: string, msg: string): void {
    console.log(`[${level}] [QualityAnalyzer] ${msg}`);
  }

  constructor(config: Partial<QualityConfig> = {}, deps: QualityAnalyzerDeps = {}) {
    this.config = { ...DEFAULT_QUALITY_CONFIG, ...config };
    this.deps = deps;
    this.sampler = new FrameSampler(this.config.targetHz);
    this.latestResult = null;
    this.unsupportedWarned = false;
  }

  /**
   * Analyze one frame. Returns null when the frame is dropped by the rate
   * limiter or has an unsupported layout; the previous result stays published.
   */
  analyze(frame: RawFrame): QualityResult | null {
    if (!this.sampler.shouldSample(frame.timestampNs)) return null;

    if (!isSupportedLumaLayout(frame)) {
      if (!this.unsupportedWarned) {
        this.log(
          "WARN",
          `Unsupported frame layout ${frame.width}x${frame.height} ` +
            `(rowStride=${frame.rowStride}, pixelStride=${frame.pixelStride}); skipping`,
        );
        this.unsupportedWarned = true;
      }
      return null;
    }

    const cfg = this.config;
    const roi = centerRoi(frame.width, frame.height, cfg.roiFraction, cfg.roiMinSide);
    const lap = computeLaplacianVariance(frame, roi, cfg.sampleStep);
    const exposure = measureExposure(frame, roi, cfg.sampleStep, cfg.clipHigh, cfg.clipLow);
    const clusters = labelSpecularClusters(exposure.clipped);

    const metrics: QualityMetrics = {
      blurScore: lap.variance,
      overFraction: exposure.overFraction,
      underFraction: exposure.underFraction,
      specularClusterCount: clusters.count,
      largestSpecularCluster: clusters.largest,
    };

    const status = lap.samples === 0 ? QualityStatus.UNKNOWN : classifyQuality(metrics, cfg);
    const result: QualityResult = Object.freeze({
      status,
      ...metrics,
      distanceCm: distanceFromDiopters(this.deps.focusDistance?.()),
      timestampNs: frame.timestampNs,
    });

    this.latestResult = result;
    return result;
  }

  /** Last published result, or null before the first analyzed frame. */
  latest(): QualityResult | null {
    return this.latestResult;
  }

  reset(): void {
    this.sampler.reset();
    this.latestResult = null;
  }
}
