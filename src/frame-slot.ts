/**
 * Single-slot frame buffer with keep-latest backpressure.
 * Offering while a frame is pending replaces it; the replaced frame is
 * counted as dropped. The analysis loop never falls more than one frame
 * behind the source.
 */

export class LatestFrameSlot<T> {
  private pending: T | null;
  private dropped: number;

  constructor() {
    this.pending = null;
    this.dropped = 0;
  }

  /** Store a frame, replacing (and counting) any frame not yet taken. */
  offer(frame: T): void {
    if (this.pending !== null) {
      this.dropped++;
    }
    this.pending = frame;
  }

  /** Take the pending frame, or null if none. */
  take(): T | null {
    const frame = this.pending;
    this.pending = null;
    return frame;
  }

  get hasPending(): boolean {
    return this.pending !== null;
  }

  /** Frames replaced before they were taken. */
  get framesDropped(): number {
    return this.dropped;
  }

  clear(): void {
    this.pending = null;
  }
}
