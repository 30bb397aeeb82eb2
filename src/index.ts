// Capture Guidance - Public API
// Importing this module has no side effects; src/main.ts starts the server.

export const APP_NAME = "Capture Guidance";
export const APP_VERSION = "0.1.0";

export * from "./types.js";
export * from "./geometry.js";
export { createLumaFrame, isSupportedLumaLayout, centerRoi } from "./luma-frame.js";
export { FrameSampler } from "./frame-sampler.js";
export { QualityAnalyzer, DEFAULT_QUALITY_CONFIG, classifyQuality } from "./quality-analyzer.js";
export type { QualityConfig, FocusDistanceSource } from "./quality-analyzer.js";
export type { FiducialDetector, GrayImage, RawFiducial } from "./fiducial-detector.js";
export {
  DisabledMarkerDetector,
  FiducialMarkerDetector,
  DEFAULT_MARKER_CONFIG,
  describeMarkers,
} from "./marker-detector.js";
export type { MarkerDetector, MarkerDetectorConfig } from "./marker-detector.js";
export { freezeMarkerStatus, freezeQualityResult } from "./snapshot.js";
export { CaptureGuidanceTracker, DEFAULT_CAPTURE_GUIDANCE_CONFIG } from "./capture-guidance-tracker.js";
export type { CaptureGuidanceConfig, PhaseTargets } from "./capture-guidance-tracker.js";
export { CalibrationGuidanceTracker, DEFAULT_CALIBRATION_GUIDANCE_CONFIG } from "./calibration-guidance-tracker.js";
export type { CalibrationGuidanceConfig } from "./calibration-guidance-tracker.js";
export { formatSummaryJson } from "./summary-writer.js";
export { CapturePipeline } from "./capture-pipeline.js";
export { SessionManager } from "./session-manager.js";
export { encodeLumaFrame, decodeLumaFrame } from "./luma-frame-codec.js";
export { createAppServer } from "./server.js";
export { loadAppConfig } from "./config.js";
