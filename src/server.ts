// Audio Frame Integrity Gateway - WebSocket Handler and Express Server
//
// Binary WebSocket messages are audio frames; each one goes through the
// integrity gate before verified audio reaches the recognition sink.
// Text messages are JSON control commands.
//
// Privacy: audio is in-memory only, never written to disk.

import express, { type Express } from "express";
import { createServer, type IncomingMessage, type Server as HttpServer } from "node:http";
import { v4 as uuidv4 } from "uuid";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import { ConnectionTracker } from "./connection-tracker.js";
import { processFrame } from "./integrity-gate.js";
import { defaultLogger, type ServerLogger } from "./logger.js";
import { DEFAULT_POLICY, describePolicy } from "./policy-config.js";
import type { AudioSink, ClientMessage, ControlMethod, PolicyConfig, ServerMessage, TranscriptEvent } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** WebSocket close code for a connection rejected by the integrity policy */
const POLICY_VIOLATION_CLOSE_CODE = 1008;

const REJECTION_CLOSE_REASON = "data_corruption";

const CONTROL_METHODS: readonly ControlMethod[] = ["stop", "clear_audio_queue"];

// ─── Per-Connection State ───────────────────────────────────────────────────────

interface ConnectionContext {
  connectionId: string;
  tracker: ConnectionTracker;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Recognition sink that receives verified audio. */
  audioSink: AudioSink;
  /** Integrity policy shared by every connection. Defaults to DEFAULT_POLICY. */
  policy?: PolicyConfig;
  /** Custom logger. Defaults to console-based logger. */
  logger?: ServerLogger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  policy: PolicyConfig;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { audioSink, policy = DEFAULT_POLICY, logger = defaultLogger } = options;

  const app = express();
  const httpServer = createServer(app);

  // WebSocket server attached to the HTTP server
  const wss = new WebSocketServer({ server: httpServer });

  // ws re-emits HTTP server errors (EADDRINUSE etc.) here; listen() rejects on the original
  wss.on("error", (err) => {
    logger.error(`WebSocket server error: ${err.message}`);
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", connections: wss.clients.size, policy });
  });

  wss.on("connection", (ws: WebSocket, req: IncomingMessage) => {
    handleConnection(ws, clientIdOf(req), policy, audioSink, logger);
  });

  return {
    app,
    httpServer,
    wss,
    policy,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          httpServer.off("error", reject);
          logger.info(`Server listening on port ${port} (${describePolicy(policy)})`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      return new Promise((resolve, reject) => {
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
    },
  };
}

function clientIdOf(req: IncomingMessage): string {
  const { remoteAddress, remotePort } = req.socket;
  return `${remoteAddress ?? "unknown"}:${remotePort ?? 0}`;
}

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(
  ws: WebSocket,
  clientId: string,
  policy: PolicyConfig,
  audioSink: AudioSink,
  logger: ServerLogger,
): void {
  const ctx: ConnectionContext = {
    connectionId: uuidv4(),
    tracker: new ConnectionTracker(clientId, policy),
  };

  logger.info(`New WebSocket connection from ${clientId} (connection ${ctx.connectionId})`);

  audioSink.open(ctx.connectionId, (event) => relayTranscript(ws, event));

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleBinaryMessage(ws, toBuffer(data), ctx, audioSink, logger);
      } else {
        handleTextMessage(ws, toBuffer(data).toString("utf-8"), ctx, audioSink, logger);
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message from ${clientId}: ${errorMessage}`);
    }
  });

  ws.on("close", () => {
    logger.info(
      `WebSocket closed for ${clientId} (status ${ctx.tracker.status}, ` +
        `${ctx.tracker.failureCount} failed verification(s), ${ctx.tracker.framesAccepted} frame(s) accepted)`,
    );
    cleanupConnection(ctx, audioSink);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error for ${clientId}: ${err.message}`);
    cleanupConnection(ctx, audioSink);
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Binary Message Handler (Audio Frames) ──────────────────────────────────────

function handleBinaryMessage(
  ws: WebSocket,
  data: Buffer,
  ctx: ConnectionContext,
  audioSink: AudioSink,
  logger: ServerLogger,
): void {
  // Frames still in flight after a rejection are discarded
  if (!ctx.tracker.isActive) {
    return;
  }

  const outcome = processFrame(data, ctx.tracker, logger);

  switch (outcome.kind) {
    case "drop":
      sendMessage(ws, { type: "frame_error", code: outcome.error.code, message: outcome.error.message });
      break;

    case "forward":
      if (outcome.action === "accept_with_warning") {
        sendMessage(ws, {
          type: "integrity_warning",
          failureCount: ctx.tracker.failureCount,
          message: "Audio frame failed integrity verification but was accepted.",
        });
      }
      audioSink.write(ctx.connectionId, outcome.frame.payload, outcome.frame.metadata);
      break;

    case "reject":
      sendMessage(ws, outcome.notice);
      ws.close(POLICY_VIOLATION_CLOSE_CODE, REJECTION_CLOSE_REASON);
      audioSink.close(ctx.connectionId);
      break;

    default: {
      const exhaustiveCheck: never = outcome;
      throw new Error(`Unhandled frame outcome: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── JSON Control Message Handler ───────────────────────────────────────────────

function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;
  if (!("command" in parsed) || parsed.command !== "call_method" || !("method" in parsed)) return null;
  const { method } = parsed;
  const known = CONTROL_METHODS.find((m) => m === method);
  return known ? { command: "call_method", method: known } : null;
}

function handleTextMessage(
  ws: WebSocket,
  text: string,
  ctx: ConnectionContext,
  audioSink: AudioSink,
  logger: ServerLogger,
): void {
  if (!ctx.tracker.isActive) {
    return;
  }

  const message = parseClientMessage(text);
  if (!message) {
    sendMessage(ws, {
      type: "error",
      error: "invalid_command",
      message: `Unsupported control message. Expected {"command":"call_method","method":"${CONTROL_METHODS.join('"|"')}"}.`,
    });
    return;
  }

  switch (message.method) {
    case "stop":
      audioSink.stop(ctx.connectionId);
      logger.info(`Recognition stopped for ${ctx.tracker.clientId}`);
      sendMessage(ws, { type: "control_result", method: "stop", status: "success" });
      break;

    case "clear_audio_queue": {
      const dropped = audioSink.clearQueue(ctx.connectionId);
      logger.info(`Cleared ${dropped} queued chunk(s) for ${ctx.tracker.clientId}`);
      sendMessage(ws, { type: "control_result", method: "clear_audio_queue", status: "success", dropped });
      break;
    }

    default: {
      const exhaustiveCheck: never = message.method;
      throw new Error(`Unhandled control method: ${String(exhaustiveCheck)}`);
    }
  }
}

// ─── Transcript Relay ───────────────────────────────────────────────────────────

/** Interim results go out as `realtime`, final ones as `fullSentence`. */
export function relayTranscript(ws: WebSocket, event: TranscriptEvent): void {
  sendMessage(ws, event.isFinal ? { type: "fullSentence", text: event.text } : { type: "realtime", text: event.text });
}

// ─── Message Sending ────────────────────────────────────────────────────────────

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(ctx: ConnectionContext, audioSink: AudioSink): void {
  ctx.tracker.disconnect();
  audioSink.close(ctx.connectionId);
}

// ─── Exports for Testing ────────────────────────────────────────────────────────

export { POLICY_VIOLATION_CLOSE_CODE, REJECTION_CLOSE_REASON };
