// Capture Guidance - Fiducial detection backends
// A backend sees only the reduced grayscale working buffer and reports
// detections in that buffer's coordinate space; remapping to full-frame
// coordinates is the marker adapter's job.

import aruco from "js-aruco2";
import "js-aruco2/src/dictionaries/apriltag_36h11.js";
import type { Point } from "./types.js";

export const APRILTAG_DICTIONARY = "APRILTAG_36h11";

/** Packed 8-bit grayscale image (stride = width). */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export interface RawFiducial {
  id: number;
  /** Corner points, clockwise from the marker's top-left. */
  corners: Point[];
  /** Center if the backend reports one; otherwise derived from corners. */
  center?: Point;
}

export interface FiducialDetector {
  /** Dictionary identifier recorded in capture sidecars. */
  readonly dictionary: string;
  detect(image: GrayImage): RawFiducial[];
}

export interface ArucoDetectorOptions {
  dictionaryName?: string;
  maxHammingDistance?: number;
}

/**
 * js-aruco2 backend. The library reads RGBA, so the grayscale buffer is
 * expanded into an RGBA buffer owned by this instance and reused across frames.
 */
export class ArucoFiducialDetector implements FiducialDetector {
  readonly dictionary: string;
  private readonly detector: InstanceType<typeof aruco.AR.Detector>;
  private rgba: Uint8ClampedArray;

  constructor(options: ArucoDetectorOptions = {}) {
    this.dictionary = options.dictionaryName ?? APRILTAG_DICTIONARY;
    this.detector = new aruco.AR.Detector(
      options.maxHammingDistance === undefined
        ? { dictionaryName: this.dictionary }
        : { dictionaryName: this.dictionary, maxHammingDistance: options.maxHammingDistance },
    );
    this.rgba = new Uint8ClampedArray(0);
  }

  detect(image: GrayImage): RawFiducial[] {
    const pixels = image.width * image.height;
    if (this.rgba.length !== pixels * 4) {
      this.rgba = new Uint8ClampedArray(pixels * 4);
    }
    const rgba = this.rgba;
    for (let i = 0, j = 0; i < pixels; i++, j += 4) {
      const v = image.data[i];
      rgba[j] = v;
      rgba[j + 1] = v;
      rgba[j + 2] = v;
      rgba[j + 3] = 255;
    }

    const markers = this.detector.detect({ width: image.width, height: image.height, data: rgba });
    return markers.map((m) => ({
      id: m.id,
      corners: m.corners.map((c) => ({ x: c.x, y: c.y })),
    }));
  }
}
