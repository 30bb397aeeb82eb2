// Capture Guidance - Environment configuration
// Reads process environment variables (after dotenv has loaded .env) into
// typed config objects. An invalid value falls back to its default with a
// WARN line; nothing here throws.

import {
  DEFAULT_CALIBRATION_GUIDANCE_CONFIG,
  type CalibrationGuidanceConfig,
} from "./calibration-guidance-tracker.js";
import {
  DEFAULT_CAPTURE_GUIDANCE_CONFIG,
  type CaptureGuidanceConfig,
} from "./capture-guidance-tracker.js";
import { DEFAULT_MARKER_CONFIG, type MarkerDetectorConfig } from "./marker-detector.js";
import { DEFAULT_QUALITY_CONFIG, type QualityConfig } from "./quality-analyzer.js";

export type MarkerDetectionBackend = "fiducial" | "off";

export interface AppConfig {
  port: number;
  markerDetection: MarkerDetectionBackend;
  quality: QualityConfig;
  marker: MarkerDetectorConfig;
  captureGuidance: CaptureGuidanceConfig;
  calibrationGuidance: CalibrationGuidanceConfig;
}

export const DEFAULT_PORT = 3000;

type Env = Record<string, string | undefined>;
type Warn = (msg: string) => void;

const defaultWarn: Warn = (msg) => console.warn(`[WARN] [Config] ${msg}`);

// ─── Parsers ────────────────────────────────────────────────────────────────────

function readNumber(
  env: Env,
  name: string,
  fallback: number,
  valid: (n: number) => boolean,
  warn: Warn,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !valid(value)) {
    warn(`${name}="${raw}" is invalid; using ${fallback}`);
    return fallback;
  }
  return value;
}

const positive = (n: number) => n > 0;
const positiveInt = (n: number) => Number.isInteger(n) && n > 0;
const nonNegativeInt = (n: number) => Number.isInteger(n) && n >= 0;
const fraction = (n: number) => n > 0 && n <= 1;

function readBackend(env: Env, warn: Warn): MarkerDetectionBackend {
  const raw = env.MARKER_DETECTION?.trim().toLowerCase();
  if (raw === undefined || raw === "") return "fiducial";
  if (raw === "fiducial" || raw === "off") return raw;
  warn(`MARKER_DETECTION="${env.MARKER_DETECTION}" is invalid; using fiducial`);
  return "fiducial";
}

// ─── Loader ─────────────────────────────────────────────────────────────────────

export function loadAppConfig(env: Env = process.env, warn: Warn = defaultWarn): AppConfig {
  const port = readNumber(env, "PORT", DEFAULT_PORT, (n) => nonNegativeInt(n) && n <= 65535, warn);

  const quality: QualityConfig = {
    ...DEFAULT_QUALITY_CONFIG,
    targetHz: readNumber(env, "QUALITY_TARGET_HZ", DEFAULT_QUALITY_CONFIG.targetHz, positive, warn),
    blurThreshold: readNumber(env, "QUALITY_BLUR_THRESHOLD", DEFAULT_QUALITY_CONFIG.blurThreshold, positive, warn),
  };

  const marker: MarkerDetectorConfig = {
    ...DEFAULT_MARKER_CONFIG,
    roiFraction: readNumber(env, "MARKER_ROI_FRACTION", DEFAULT_MARKER_CONFIG.roiFraction, fraction, warn),
    downsampleStep: readNumber(env, "MARKER_DOWNSAMPLE_STEP", DEFAULT_MARKER_CONFIG.downsampleStep, positiveInt, warn),
  };

  const capture = DEFAULT_CAPTURE_GUIDANCE_CONFIG;
  let distanceMinCm = readNumber(env, "DISTANCE_MIN_CM", capture.distanceMinCm, positive, warn);
  let distanceMaxCm = readNumber(env, "DISTANCE_MAX_CM", capture.distanceMaxCm, positive, warn);
  if (distanceMinCm > distanceMaxCm) {
    warn(`DISTANCE_MIN_CM (${distanceMinCm}) exceeds DISTANCE_MAX_CM (${distanceMaxCm}); using defaults`);
    distanceMinCm = capture.distanceMinCm;
    distanceMaxCm = capture.distanceMaxCm;
  }

  const captureGuidance: CaptureGuidanceConfig = {
    ...capture,
    distanceMinCm,
    distanceMaxCm,
    goodCapturesTarget: readNumber(env, "GOOD_CAPTURES_TARGET", capture.goodCapturesTarget, positiveInt, warn),
    gridTargetFilled: readNumber(
      env,
      "GRID_TARGET_FILLED",
      capture.gridTargetFilled,
      (n) => positiveInt(n) && n <= 9,
      warn,
    ),
    perTagTarget: readNumber(env, "PER_TAG_TARGET", capture.perTagTarget, positiveInt, warn),
    stableIdsN: readNumber(env, "STABLE_IDS_N", capture.stableIdsN, nonNegativeInt, warn),
  };

  const calibration = DEFAULT_CALIBRATION_GUIDANCE_CONFIG;
  const calibrationGuidance: CalibrationGuidanceConfig = {
    ...calibration,
    goodCapturesTarget: readNumber(
      env,
      "CALIBRATION_GOOD_CAPTURES_TARGET",
      calibration.goodCapturesTarget,
      positiveInt,
      warn,
    ),
    gridTargetFilled: readNumber(
      env,
      "CALIBRATION_GRID_TARGET_FILLED",
      calibration.gridTargetFilled,
      (n) => positiveInt(n) && n <= 9,
      warn,
    ),
  };

  return {
    port,
    markerDetection: readBackend(env, warn),
    quality,
    marker,
    captureGuidance,
    calibrationGuidance,
  };
}
