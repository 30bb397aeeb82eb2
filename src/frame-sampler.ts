/**
 * Frame sampler that throttles analysis to a target frequency.
 * Accepts the first frame in each sampling interval and drops the rest;
 * nothing is queued, so the caller is never more than one interval behind.
 *
 * Timestamps are monotonic nanoseconds.
 */

const NANOS_PER_SECOND = 1_000_000_000;

export class FrameSampler {
  private readonly intervalNs: number; // 1e9 / targetHz
  private lastSampledNs: number;

  constructor(targetHz: number) {
    this.intervalNs = NANOS_PER_SECOND / Math.max(1, targetHz);
    this.lastSampledNs = -Infinity;
  }

  /**
   * Returns true if this frame should be processed.
   * The first frame is always sampled (lastSampledNs starts at -Infinity).
   */
  shouldSample(timestampNs: number): boolean {
    if (timestampNs - this.lastSampledNs >= this.intervalNs) {
      this.lastSampledNs = timestampNs;
      return true;
    }
    return false;
  }

  /** Reset state for a new session. */
  reset(): void {
    this.lastSampledNs = -Infinity;
  }
}
