// Audio Frame Integrity Gateway - Server Unit Tests
// WebSocket handler and Express server, exercised over a real loopback socket.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket from "ws";
import { createAppServer, type AppServer } from "./server.js";
import { createFrameMetadata, encodeFrame } from "./frame-codec.js";
import { createPolicyConfig } from "./policy-config.js";
import type { AudioSink, FrameMetadata, PolicyConfig, TranscriptEvent } from "./types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

/** Silent logger for tests */
function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** In-memory AudioSink that records every call. */
class RecordingSink implements AudioSink {
  readonly listeners = new Map<string, (event: TranscriptEvent) => void>();
  readonly writes: Array<{ connectionId: string; payload: Buffer; metadata: FrameMetadata }> = [];
  readonly stopped: string[] = [];
  readonly closed: string[] = [];
  queuedChunks = 0;

  open(connectionId: string, onTranscript: (event: TranscriptEvent) => void): void {
    this.listeners.set(connectionId, onTranscript);
  }

  write(connectionId: string, payload: Buffer, metadata: FrameMetadata): void {
    this.writes.push({ connectionId, payload: Buffer.from(payload), metadata });
  }

  stop(connectionId: string): void {
    this.stopped.push(connectionId);
  }

  clearQueue(_connectionId: string): number {
    const dropped = this.queuedChunks;
    this.queuedChunks = 0;
    return dropped;
  }

  close(connectionId: string): void {
    this.closed.push(connectionId);
  }

  /** Delivers a transcript to every open connection. */
  emitTranscript(event: TranscriptEvent): void {
    for (const listener of this.listeners.values()) listener(event);
  }
}

interface ReceivedMessage {
  type: string;
  [key: string]: unknown;
}

function isReceivedMessage(value: unknown): value is ReceivedMessage {
  return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}

/**
 * A test WebSocket client that queues all incoming messages.
 * Messages are buffered so none are lost to race conditions.
 */
class TestClient {
  ws: WebSocket;
  readonly closed: Promise<{ code: number; reason: string }>;
  private messageQueue: ReceivedMessage[] = [];
  private waiters: Array<(msg: ReceivedMessage) => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.closed = new Promise((resolve) => {
      this.ws.on("close", (code: number, reason: Buffer) => resolve({ code, reason: reason.toString("utf-8") }));
    });
    this.ws.on("message", (data: WebSocket.RawData) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (!isReceivedMessage(parsed)) {
        throw new Error(`Server sent a message without a type: ${data.toString()}`);
      }
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(parsed);
      } else {
        this.messageQueue.push(parsed);
      }
    });
  }

  /** Wait for the WebSocket to open */
  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on("open", resolve);
      this.ws.on("error", reject);
    });
  }

  /** Get the next message (from queue or wait for one) */
  nextMessage(timeoutMs = 3000): Promise<ReceivedMessage> {
    const queued = this.messageQueue.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiterFn);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      const waiterFn = (msg: ReceivedMessage) => {
        clearTimeout(timer);
        resolve(msg);
      };
      this.waiters.push(waiterFn);
    });
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  sendBinary(data: Buffer): void {
    this.ws.send(data, { binary: true });
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

function getServerPort(server: AppServer): number {
  const addr = server.httpServer.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Unexpected server address format");
  }
  return addr.port;
}

function pcm(samples: number[]): Buffer {
  const buf = Buffer.alloc(samples.length * 2);
  samples.forEach((s, i) => buf.writeInt16LE(s, i * 2));
  return buf;
}

/** A frame whose metadata matches its payload. */
function goodFrame(samples: number[]): Buffer {
  const payload = pcm(samples);
  return encodeFrame(createFrameMetadata(payload, 16000, 1_700_000_000_000), payload);
}

/** A frame declaring the checksum of [1,2,3,4] (10) but carrying [1,2,3,5] (11). */
function corruptedFrame(): Buffer {
  return encodeFrame(
    { sampleRate: 16000, dataLength: 4, checksum: 10, timestamp: 1_700_000_000_000, verificationRequested: true },
    pcm([1, 2, 3, 5]),
  );
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("Server", () => {
  let server: AppServer;
  let sink: RecordingSink;
  let logger: ReturnType<typeof createSilentLogger>;
  let clients: TestClient[];

  async function startServer(policy: Partial<PolicyConfig>): Promise<void> {
    server = createAppServer({ audioSink: sink, policy: createPolicyConfig(policy), logger });
    await server.listen(0);
  }

  async function connect(): Promise<TestClient> {
    const client = new TestClient(`ws://127.0.0.1:${getServerPort(server)}`);
    clients.push(client);
    await client.waitForOpen();
    return client;
  }

  beforeEach(() => {
    sink = new RecordingSink();
    logger = createSilentLogger();
    clients = [];
  });

  afterEach(async () => {
    for (const client of clients) client.close();
    await server.close();
  });

  describe("audio frames", () => {
    it("forwards a verified frame to the audio sink", async () => {
      await startServer({ verifyEnabled: true, rejectEnabled: true });
      const client = await connect();

      client.sendBinary(goodFrame([1, 2, 3, 4]));

      await vi.waitFor(() => expect(sink.writes).toHaveLength(1));
      expect(sink.writes[0].payload).toEqual(pcm([1, 2, 3, 4]));
      expect(sink.writes[0].metadata).toEqual({
        sampleRate: 16000,
        dataLength: 4,
        checksum: 10,
        timestamp: 1_700_000_000_000,
        verificationRequested: true,
      });
    });

    it("forwards a corrupted frame with an integrity_warning in monitor-only mode", async () => {
      await startServer({ verifyEnabled: true, rejectEnabled: false });
      const client = await connect();

      client.sendBinary(corruptedFrame());

      expect(await client.nextMessage()).toEqual({
        type: "integrity_warning",
        failureCount: 1,
        message: "Audio frame failed integrity verification but was accepted.",
      });
      await vi.waitFor(() => expect(sink.writes).toHaveLength(1));
      expect(client.ws.readyState).toBe(WebSocket.OPEN);
    });

    it("forwards a corrupted frame silently when verification is disabled", async () => {
      await startServer({ verifyEnabled: false, rejectEnabled: true });
      const client = await connect();

      client.sendBinary(corruptedFrame());
      client.sendJson({ command: "call_method", method: "clear_audio_queue" });

      // The control reply is the first message, so no warning preceded it
      expect((await client.nextMessage()).type).toBe("control_result");
      expect(sink.writes).toHaveLength(1);
    });

    it("sends a rejection notice and closes with 1008 once the threshold is exceeded", async () => {
      await startServer({ verifyEnabled: true, rejectEnabled: true, corruptionThreshold: 0 });
      const client = await connect();

      client.sendBinary(corruptedFrame());

      const notice = await client.nextMessage();
      expect(notice.type).toBe("error");
      expect(notice.error).toBe("data_corruption");
      expect(notice.action).toBe("disconnect");
      expect(notice.message).toContain("expected 10");
      expect(notice.message).toContain("got 11");

      expect(await client.closed).toEqual({ code: 1008, reason: "data_corruption" });
      expect(sink.writes).toHaveLength(0);
      expect(sink.closed.length).toBeGreaterThanOrEqual(1);
    });

    it("tolerates failures up to the threshold", async () => {
      await startServer({ verifyEnabled: true, rejectEnabled: true, corruptionThreshold: 1 });
      const client = await connect();

      client.sendBinary(corruptedFrame());
      expect((await client.nextMessage()).type).toBe("integrity_warning");

      client.sendBinary(corruptedFrame());
      const notice = await client.nextMessage();
      expect(notice.error).toBe("data_corruption");
      expect((await client.closed).code).toBe(1008);
      expect(sink.writes).toHaveLength(1);
    });

    it("reports a malformed frame and keeps the connection open", async () => {
      await startServer({ verifyEnabled: true, rejectEnabled: true, corruptionThreshold: 0 });
      const client = await connect();

      client.sendBinary(encodeFrame({ sampleRate: 16000, verificationRequested: false }, Buffer.from([1, 2, 3])));

      expect(await client.nextMessage()).toEqual({
        type: "frame_error",
        code: "misaligned_payload",
        message: "payload length 3 is not a multiple of 2. Expected 16-bit aligned PCM data.",
      });

      client.sendBinary(goodFrame([7, 8]));
      await vi.waitFor(() => expect(sink.writes).toHaveLength(1));
      expect(client.ws.readyState).toBe(WebSocket.OPEN);
    });

    it("reports a truncated frame", async () => {
      await startServer({});
      const client = await connect();

      client.sendBinary(Buffer.from([0x01, 0x00]));

      expect(await client.nextMessage()).toEqual({
        type: "frame_error",
        code: "truncated",
        message: "frame has 2 byte(s), need at least 4 for the length prefix",
      });
    });

    it("keeps failure counts independent per connection", async () => {
      await startServer({ verifyEnabled: true, rejectEnabled: true, corruptionThreshold: 0 });
      const bad = await connect();
      const good = await connect();

      bad.sendBinary(corruptedFrame());
      expect((await bad.closed).code).toBe(1008);

      good.sendBinary(goodFrame([1, 2, 3, 4]));
      await vi.waitFor(() => expect(sink.writes).toHaveLength(1));
      expect(good.ws.readyState).toBe(WebSocket.OPEN);
    });
  });

  describe("control commands", () => {
    it("stops recognition on call_method stop", async () => {
      await startServer({});
      const client = await connect();

      client.sendJson({ command: "call_method", method: "stop" });

      expect(await client.nextMessage()).toEqual({ type: "control_result", method: "stop", status: "success" });
      expect(sink.stopped).toHaveLength(1);
    });

    it("reports how many chunks clear_audio_queue dropped", async () => {
      await startServer({});
      const client = await connect();
      sink.queuedChunks = 3;

      client.sendJson({ command: "call_method", method: "clear_audio_queue" });

      expect(await client.nextMessage()).toEqual({
        type: "control_result",
        method: "clear_audio_queue",
        status: "success",
        dropped: 3,
      });
    });

    it("answers unknown or malformed commands with invalid_command", async () => {
      await startServer({});
      const client = await connect();
      const expected = {
        type: "error",
        error: "invalid_command",
        message: 'Unsupported control message. Expected {"command":"call_method","method":"stop"|"clear_audio_queue"}.',
      };

      client.sendJson({ command: "call_method", method: "set_microphone" });
      expect(await client.nextMessage()).toEqual(expected);

      client.ws.send("not json");
      expect(await client.nextMessage()).toEqual(expected);

      expect(sink.stopped).toHaveLength(0);
    });
  });

  describe("transcript relay", () => {
    it("relays interim results as realtime and final ones as fullSentence", async () => {
      await startServer({});
      const client = await connect();
      await vi.waitFor(() => expect(sink.listeners.size).toBe(1));

      sink.emitTranscript({ text: "hello", isFinal: false, startTime: 0, endTime: 0.5 });
      sink.emitTranscript({ text: "hello there.", isFinal: true, startTime: 0, endTime: 1.1 });

      expect(await client.nextMessage()).toEqual({ type: "realtime", text: "hello" });
      expect(await client.nextMessage()).toEqual({ type: "fullSentence", text: "hello there." });
    });
  });

  describe("connection lifecycle", () => {
    it("opens a sink stream per connection and closes it on disconnect", async () => {
      await startServer({});
      const client = await connect();
      await vi.waitFor(() => expect(sink.listeners.size).toBe(1));
      const [connectionId] = sink.listeners.keys();

      client.close();

      await vi.waitFor(() => expect(sink.closed).toContain(connectionId));
    });

    it("rejects listen() when the port is already in use", async () => {
      await startServer({});
      const port = getServerPort(server);
      const otherLogger = createSilentLogger();
      const other = createAppServer({ audioSink: new RecordingSink(), logger: otherLogger });

      await expect(other.listen(port)).rejects.toThrow("EADDRINUSE");
      expect(otherLogger.error).toHaveBeenCalledWith(expect.stringContaining("EADDRINUSE"));
      expect(other.httpServer.listening).toBe(false);
    });

    it("logs the policy when it starts listening", async () => {
      await startServer({ verifyEnabled: true });
      expect(logger.info).toHaveBeenCalledWith(
        "Server listening on port 0 (verification enabled, monitor only (no rejection), logging failures only)",
      );
    });
  });

  describe("GET /health", () => {
    it("reports status, open connections and the active policy", async () => {
      await startServer({ verifyEnabled: true, rejectEnabled: true, corruptionThreshold: 2 });
      await connect();

      const res = await fetch(`http://127.0.0.1:${getServerPort(server)}/health`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: "ok",
        connections: 1,
        policy: {
          verifyEnabled: true,
          rejectEnabled: true,
          corruptionThreshold: 2,
          extendedLogging: false,
        },
      });
    });
  });
});
