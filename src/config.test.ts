import { describe, it, expect, vi } from "vitest";
import { DEFAULT_PORT, loadAppConfig } from "./config.js";
import { DEFAULT_CAPTURE_GUIDANCE_CONFIG } from "./capture-guidance-tracker.js";
import { DEFAULT_CALIBRATION_GUIDANCE_CONFIG } from "./calibration-guidance-tracker.js";
import { DEFAULT_MARKER_CONFIG } from "./marker-detector.js";
import { DEFAULT_QUALITY_CONFIG } from "./quality-analyzer.js";

describe("loadAppConfig", () => {
  it("uses defaults for an empty environment", () => {
    const warn = vi.fn();
    const config = loadAppConfig({}, warn);

    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.markerDetection).toBe("fiducial");
    expect(config.quality).toEqual(DEFAULT_QUALITY_CONFIG);
    expect(config.marker).toEqual(DEFAULT_MARKER_CONFIG);
    expect(config.captureGuidance).toEqual(DEFAULT_CAPTURE_GUIDANCE_CONFIG);
    expect(config.calibrationGuidance).toEqual(DEFAULT_CALIBRATION_GUIDANCE_CONFIG);
    expect(warn).not.toHaveBeenCalled();
  });

  it("reads overrides", () => {
    const config = loadAppConfig(
      {
        PORT: "8080",
        MARKER_DETECTION: " OFF ",
        QUALITY_TARGET_HZ: "8",
        MARKER_ROI_FRACTION: "0.5",
        DISTANCE_MIN_CM: "18",
        DISTANCE_MAX_CM: "28",
        STABLE_IDS_N: "0",
        GRID_TARGET_FILLED: "9",
        CALIBRATION_GOOD_CAPTURES_TARGET: "12",
      },
      vi.fn(),
    );

    expect(config.port).toBe(8080);
    expect(config.markerDetection).toBe("off");
    expect(config.quality.targetHz).toBe(8);
    expect(config.marker.roiFraction).toBe(0.5);
    expect(config.captureGuidance.distanceMinCm).toBe(18);
    expect(config.captureGuidance.distanceMaxCm).toBe(28);
    expect(config.captureGuidance.stableIdsN).toBe(0);
    expect(config.captureGuidance.gridTargetFilled).toBe(9);
    expect(config.calibrationGuidance.goodCapturesTarget).toBe(12);
  });

  it("falls back and warns on invalid values", () => {
    const warn = vi.fn();
    const config = loadAppConfig(
      { PORT: "http", GRID_TARGET_FILLED: "10", STABLE_IDS_N: "2.5", MARKER_DETECTION: "gpu" },
      warn,
    );

    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.captureGuidance.gridTargetFilled).toBe(7);
    expect(config.captureGuidance.stableIdsN).toBe(8);
    expect(config.markerDetection).toBe("fiducial");
    expect(warn.mock.calls.map(([msg]) => msg)).toEqual([
      'PORT="http" is invalid; using 3000',
      'GRID_TARGET_FILLED="10" is invalid; using 7',
      'STABLE_IDS_N="2.5" is invalid; using 8',
      'MARKER_DETECTION="gpu" is invalid; using fiducial',
    ]);
  });

  it("restores the default distance range when min exceeds max", () => {
    const warn = vi.fn();
    const config = loadAppConfig({ DISTANCE_MIN_CM: "35", DISTANCE_MAX_CM: "25" }, warn);

    expect(config.captureGuidance.distanceMinCm).toBe(20);
    expect(config.captureGuidance.distanceMaxCm).toBe(30);
    expect(warn).toHaveBeenCalledWith("DISTANCE_MIN_CM (35) exceeds DISTANCE_MAX_CM (25); using defaults");
  });

  it("ignores blank values", () => {
    const warn = vi.fn();
    expect(loadAppConfig({ PORT: "  " }, warn).port).toBe(DEFAULT_PORT);
    expect(warn).not.toHaveBeenCalled();
  });
});
