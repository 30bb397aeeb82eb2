// Capture Guidance - Entry point
// Loads configuration, picks the marker detection backend, and starts the server.

import "dotenv/config";
import { loadAppConfig } from "./config.js";
import { APRILTAG_DICTIONARY, ArucoFiducialDetector } from "./fiducial-detector.js";
import { APP_NAME, APP_VERSION } from "./index.js";
import { DisabledMarkerDetector, FiducialMarkerDetector, type MarkerDetector } from "./marker-detector.js";
import { createAppServer } from "./server.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const config = loadAppConfig(process.env);
logInit(`Configuration loaded (port ${config.port}, marker detection ${config.markerDetection})`);

// ─── Marker detection backend ───────────────────────────────────────────────────

const markerDetectorFactory: () => MarkerDetector =
  config.markerDetection === "fiducial"
    ? () => new FiducialMarkerDetector(new ArucoFiducialDetector(), config.marker)
    : () => new DisabledMarkerDetector();

logInit(
  config.markerDetection === "fiducial"
    ? `Marker detection: js-aruco2 (${APRILTAG_DICTIONARY})`
    : "Marker detection: disabled",
);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  sessionDeps: {
    markerDetectorFactory,
    qualityConfig: config.quality,
    captureGuidance: config.captureGuidance,
    calibrationGuidance: config.calibrationGuidance,
  },
});

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${server.port()}`);
    logInit("Pipeline: luma frames → quality + markers → guidance trackers");
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Server failed to start: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logFatal(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
