// Capture Guidance - WebSocket Handler and Express Server
// Binary WebSocket messages carry CG-prefixed luma frames; JSON messages
// control the session. Session data lives in server memory only.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { decodeLumaFrame, toRawFrame } from "./luma-frame-codec.js";
import { SessionManager, type SessionManagerDeps } from "./session-manager.js";
import { formatSummaryJson } from "./summary-writer.js";
import { MarkerMode } from "./types.js";
import type { ClientMessage, ServerMessage, SessionKind } from "./types.js";
import type { FrameUpdate } from "./capture-pipeline.js";

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionState {
  sessionId: string | null;
  framesReceived: number;
  framesRejected: number;
}

// ─── Logging ────────────────────────────────────────────────────────────────────

export interface ServerLogger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const defaultLogger: ServerLogger = {
  info: (msg, ...args) => console.log(`[INFO] ${msg}`, ...args),
  warn: (msg, ...args) => console.warn(`[WARN] ${msg}`, ...args),
  error: (msg, ...args) => console.error(`[ERROR] ${msg}`, ...args),
};

// ─── Client Message Validation ──────────────────────────────────────────────────

const MARKER_MODES: ReadonlySet<string> = new Set(Object.values(MarkerMode));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMarkerMode(value: unknown): value is MarkerMode {
  return typeof value === "string" && MARKER_MODES.has(value);
}

function isSessionKind(value: unknown): value is SessionKind {
  return value === "capture" || value === "calibration";
}

/**
 * Validate a parsed JSON value as a ClientMessage.
 * Returns null for unknown types or malformed fields.
 */
export function parseClientMessage(value: unknown): ClientMessage | null {
  if (!isRecord(value)) return null;

  switch (value.type) {
    case "start_session":
      return isSessionKind(value.kind) ? { type: "start_session", kind: value.kind } : null;
    case "set_mode":
      return isMarkerMode(value.mode) ? { type: "set_mode", mode: value.mode } : null;
    case "set_required_ids": {
      const ids = value.ids;
      if (!Array.isArray(ids)) return null;
      const numbers: number[] = [];
      for (const id of ids) {
        if (typeof id !== "number" || !Number.isSafeInteger(id)) return null;
        numbers.push(id);
      }
      return { type: "set_required_ids", ids: numbers };
    }
    case "set_focus_distance": {
      const d = value.diopters;
      if (d === null) return { type: "set_focus_distance", diopters: null };
      if (typeof d !== "number" || !Number.isFinite(d) || d < 0) return null;
      return { type: "set_focus_distance", diopters: d };
    }
    case "capture":
      return { type: "capture" };
    case "reset_session":
      return { type: "reset_session" };
    case "request_manifest":
      return { type: "request_manifest" };
    default:
      return null;
  }
}

function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Custom logger. Defaults to console-based logger. */
  logger?: ServerLogger;
  /** Detector factory and config handed to the SessionManager. */
  sessionDeps?: Omit<SessionManagerDeps, "onFrameProcessed" | "autoStart">;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  sessionManager: SessionManager;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Port actually bound (useful after listen(0)). */
  port(): number;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const { logger = defaultLogger, sessionDeps = {} } = options;

  // Session id → socket that owns it, for frame_status pushes
  const sockets = new Map<string, WebSocket>();

  const sessionManager = new SessionManager({
    ...sessionDeps,
    autoStart: true,
    onFrameProcessed: (sessionId: string, update: FrameUpdate) => {
      const ws = sockets.get(sessionId);
      if (!ws) return;
      sendMessage(ws, {
        type: "frame_status",
        marker: update.marker,
        quality: update.quality,
        guidance: sessionManager.liveGuidance(sessionId),
      });
    },
  });

  const app = express();
  const httpServer = createServer(app);

  // Health check endpoint
  app.get("/health", (_req, res) => {
    res.json({ status: "ok", sessions: sessionManager.sessionCount });
  });

  // Deterministic manifest summary for a live session
  app.get("/sessions/:id/manifest", (req, res) => {
    const id = req.params.id;
    if (!sessionManager.hasSession(id)) {
      res.status(404).json({ error: `Session not found: ${id}` });
      return;
    }
    res.type("application/json").send(formatSummaryJson(sessionManager.manifest(id)));
  });

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, sessionManager, sockets, logger);
  });

  const boundPort = (): number => {
    const address = httpServer.address();
    return address !== null && typeof address === "object" ? address.port : 0;
  };

  return {
    app,
    httpServer,
    wss,
    sessionManager,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${boundPort()}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    port: boundPort,
    async close(): Promise<void> {
      await new Promise<void>((resolve, reject) => {
        // Close all WebSocket connections
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
      await sessionManager.closeAll();
    },
  };
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  sessionManager: SessionManager,
  sockets: Map<string, WebSocket>,
  logger: ServerLogger,
): void {
  const connState: ConnectionState = { sessionId: null, framesReceived: 0, framesRejected: 0 };

  logger.info("New WebSocket connection");

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, rawDataToBuffer(data), connState, sessionManager, logger);
      } else {
        const message = parseClientMessage(JSON.parse(rawDataToBuffer(data).toString("utf-8")));
        if (!message) {
          sendMessage(ws, { type: "error", message: "Invalid client message", recoverable: true });
          return;
        }
        handleClientMessage(ws, message, connState, sessionManager, sockets, logger);
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message for session ${connState.sessionId ?? "-"}: ${errorMessage}`);
      sendMessage(ws, {
        type: "error",
        message: errorMessage,
        recoverable: true,
      });
    }
  });

  ws.on("close", () => {
    logger.info(
      `WebSocket closed, session ${connState.sessionId ?? "-"} ` +
        `(${connState.framesReceived} frames, ${connState.framesRejected} rejected)`,
    );
    endSession(connState, sessionManager, sockets, logger);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for session ${connState.sessionId ?? "-"}: ${err.message}`);
  });
}

// ─── Binary Message Handler (Luma Frames) ───────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  connState: ConnectionState,
  sessionManager: SessionManager,
  logger: ServerLogger,
): void {
  if (!connState.sessionId) {
    sendMessage(ws, {
      type: "error",
      message: "No active session: send start_session before frames.",
      recoverable: true,
    });
    return;
  }

  const decoded = decodeLumaFrame(data);
  if (!decoded) {
    connState.framesRejected++;
    logger.warn(`Malformed luma frame (${data.length} bytes) for session ${connState.sessionId}`);
    sendMessage(ws, { type: "error", message: "Malformed luma frame", recoverable: true });
    return;
  }

  connState.framesReceived++;
  sessionManager.submitFrame(connState.sessionId, toRawFrame(decoded), decoded.header.focusDiopters);
}

// ─── JSON Client Message Handler ────────────────────────────────────────────────

function handleClientMessage(
  ws: WebSocket,
  message: ClientMessage,
  connState: ConnectionState,
  sessionManager: SessionManager,
  sockets: Map<string, WebSocket>,
  logger: ServerLogger,
): void {
  if (message.type === "start_session") {
    endSession(connState, sessionManager, sockets, logger);
    const session = sessionManager.createSession(message.kind);
    connState.sessionId = session.id;
    sockets.set(session.id, ws);
    logger.info(`Started ${session.kind} session ${session.id}`);
    sendMessage(ws, { type: "session_started", sessionId: session.id, kind: session.kind });
    return;
  }

  const sessionId = connState.sessionId;
  if (!sessionId) {
    sendMessage(ws, { type: "error", message: "No active session: send start_session first.", recoverable: true });
    return;
  }

  switch (message.type) {
    case "set_mode":
      sessionManager.setMode(sessionId, message.mode);
      break;

    case "set_required_ids":
      sessionManager.setRequiredIds(sessionId, message.ids);
      break;

    case "set_focus_distance":
      sessionManager.setFocusDistance(sessionId, message.diopters);
      break;

    case "capture": {
      const outcome = sessionManager.commitCapture(sessionId);
      sendMessage(ws, { type: "capture_result", ...outcome });
      break;
    }

    case "reset_session":
      sessionManager.resetSession(sessionId);
      break;

    case "request_manifest":
      sendMessage(ws, { type: "manifest", manifest: sessionManager.manifest(sessionId) });
      break;

    default: {
      const exhaustiveCheck: never = message;
      sendMessage(ws, {
        type: "error",
        message: `Unknown message type: ${JSON.stringify(exhaustiveCheck)}`,
        recoverable: true,
      });
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function endSession(
  connState: ConnectionState,
  sessionManager: SessionManager,
  sockets: Map<string, WebSocket>,
  logger: ServerLogger,
): void {
  const sessionId = connState.sessionId;
  if (!sessionId) return;
  connState.sessionId = null;
  sockets.delete(sessionId);
  if (!sessionManager.hasSession(sessionId)) return;
  sessionManager.closeSession(sessionId).catch((err: unknown) => {
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error(`Failed to close session ${sessionId}: ${errorMessage}`);
  });
}
