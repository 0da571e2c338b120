// Audio Frame Integrity Gateway - Transcription Engine
// Recognition sink for verified audio: one Deepgram live stream per client
// connection, with transcripts relayed back through a per-connection callback.
//
// Audio is held in memory only: frames written before the Deepgram socket is
// open are queued and flushed on open, never written to disk.

import { LiveTranscriptionEvents, type LiveSchema } from "@deepgram/sdk";
import type { AudioSink, FrameMetadata, TranscriptEvent } from "./types.js";

// ─── Deepgram client surface (for testability / dependency injection) ──────────

/**
 * Minimal view of a Deepgram `ListenLiveClient`. The SDK's client satisfies
 * it structurally; tests pass a mock.
 */
export interface LiveConnection {
  on(event: string, handler: (data: unknown) => void): unknown;
  send(data: ArrayBufferLike): void;
  requestClose(): void;
}

/** Minimal view of a `DeepgramClient`: only `listen.live()` is used. */
export interface LiveTranscriptionClient {
  listen: {
    live(options: LiveSchema): LiveConnection;
  };
}

/**
 * Default configuration for each Deepgram live connection.
 * Frames carry mono int16 little-endian PCM; the sample rate comes from the
 * first frame's metadata.
 */
const DEFAULT_LIVE_CONFIG: LiveSchema = {
  model: "nova-2",
  language: "en",
  encoding: "linear16",
  channels: 1,
  interim_results: true,
  punctuate: true,
  smart_format: true,
};

/** Audio held while a live socket is opening, in seconds at the stream's sample rate */
const DEFAULT_MAX_PENDING_SECONDS = 10;

const BYTES_PER_SAMPLE = 2;

export interface TranscriptionEngineOptions {
  /** Oldest queued audio is dropped once the pre-open queue exceeds this. */
  maxPendingSeconds?: number;
}

interface LiveStream {
  onTranscript: (event: TranscriptEvent) => void;
  client: LiveConnection | null;
  socketOpen: boolean;
  sampleRate: number | null;
  pending: ArrayBufferLike[];
  pendingBytes: number;
  qualityWarning: boolean;
}

/**
 * TranscriptionEngine feeds verified audio to Deepgram live transcription.
 *
 * Design decisions:
 * - Streams are opened lazily on the first write so the sample rate can be
 *   taken from the frame metadata; a sample-rate change restarts the stream.
 * - No reconnect on drop: the stream is marked with a quality warning and
 *   the next write opens a fresh one.
 * - `stop()` closes the live stream and drops audio Deepgram has not seen yet.
 * - The pre-open queue is bounded by `maxPendingSeconds`; audio queued for a
 *   stream that closes before opening is discarded with it.
 */
export class TranscriptionEngine implements AudioSink {
  private readonly deepgramClient: LiveTranscriptionClient;
  private readonly liveConfig: LiveSchema;
  private readonly maxPendingSeconds: number;
  private readonly streams: Map<string, LiveStream> = new Map();

  constructor(
    deepgramClient: LiveTranscriptionClient,
    config?: Partial<LiveSchema>,
    options: TranscriptionEngineOptions = {},
  ) {
    this.deepgramClient = deepgramClient;
    this.liveConfig = { ...DEFAULT_LIVE_CONFIG, ...config };
    this.maxPendingSeconds = options.maxPendingSeconds ?? DEFAULT_MAX_PENDING_SECONDS;
  }

  /**
   * Registers a connection. No Deepgram socket is opened until audio arrives.
   * @throws Error if the connection is already registered.
   */
  open(connectionId: string, onTranscript: (event: TranscriptEvent) => void): void {
    if (this.streams.has(connectionId)) {
      throw new Error(`Transcription stream for ${connectionId} already open. Call close() first.`);
    }
    this.streams.set(connectionId, {
      onTranscript,
      client: null,
      socketOpen: false,
      sampleRate: null,
      pending: [],
      pendingBytes: 0,
      qualityWarning: false,
    });
  }

  /**
   * Forwards one verified PCM payload to the connection's live stream.
   * @throws Error if the connection was never opened (or already closed).
   */
  write(connectionId: string, payload: Buffer, metadata: FrameMetadata): void {
    const stream = this.requireStream(connectionId);

    if (stream.client && stream.sampleRate !== metadata.sampleRate) {
      this.closeLive(stream);
      dropPending(stream);
    }
    if (!stream.client) {
      this.startLive(stream, metadata.sampleRate);
    }

    // Convert Buffer to ArrayBuffer for the Deepgram SDK's SocketDataLike type
    const chunk = payload.buffer.slice(payload.byteOffset, payload.byteOffset + payload.byteLength);
    if (stream.socketOpen && stream.client) {
      stream.client.send(chunk);
    } else {
      this.enqueue(stream, chunk);
    }
  }

  stop(connectionId: string): void {
    const stream = this.requireStream(connectionId);
    this.closeLive(stream);
    dropPending(stream);
  }

  clearQueue(connectionId: string): number {
    return dropPending(this.requireStream(connectionId));
  }

  /** Closes the live stream and forgets the connection. No-op if unknown. */
  close(connectionId: string): void {
    const stream = this.streams.get(connectionId);
    if (!stream) {
      return;
    }
    this.closeLive(stream);
    dropPending(stream);
    this.streams.delete(connectionId);
  }

  /** True once a live stream for this connection errored or dropped unexpectedly. */
  hasQualityWarning(connectionId: string): boolean {
    return this.streams.get(connectionId)?.qualityWarning ?? false;
  }

  /** Number of chunks waiting for the Deepgram socket to open */
  pendingChunks(connectionId: string): number {
    return this.streams.get(connectionId)?.pending.length ?? 0;
  }

  private requireStream(connectionId: string): LiveStream {
    const stream = this.streams.get(connectionId);
    if (!stream) {
      throw new Error(`No transcription stream for ${connectionId}. Call open() first.`);
    }
    return stream;
  }

  /** Queues a chunk, dropping the oldest ones once the queue exceeds its limit. */
  private enqueue(stream: LiveStream, chunk: ArrayBufferLike): void {
    stream.pending.push(chunk);
    stream.pendingBytes += chunk.byteLength;
    const limit = (stream.sampleRate ?? 0) * BYTES_PER_SAMPLE * this.maxPendingSeconds;
    while (stream.pendingBytes > limit && stream.pending.length > 1) {
      const oldest = stream.pending.shift();
      if (!oldest) break;
      stream.pendingBytes -= oldest.byteLength;
    }
  }

  private startLive(stream: LiveStream, sampleRate: number): void {
    const client = this.deepgramClient.listen.live({ ...this.liveConfig, sample_rate: sampleRate });
    stream.client = client;
    stream.sampleRate = sampleRate;
    stream.socketOpen = false;

    client.on(LiveTranscriptionEvents.Open, () => {
      if (stream.client !== client) return;
      stream.socketOpen = true;
      for (const chunk of stream.pending) {
        client.send(chunk);
      }
      dropPending(stream);
    });

    client.on(LiveTranscriptionEvents.Transcript, (data: unknown) => {
      if (stream.client !== client) return;
      const event = toTranscriptEvent(data);
      if (event) stream.onTranscript(event);
    });

    // Connection errors mark a quality warning; no reconnect
    client.on(LiveTranscriptionEvents.Error, () => {
      stream.qualityWarning = true;
    });

    client.on(LiveTranscriptionEvents.Close, () => {
      // If we didn't initiate the close (client still current), it's an unexpected drop
      if (stream.client === client) {
        stream.qualityWarning = true;
        stream.client = null;
        stream.socketOpen = false;
        stream.sampleRate = null;
        dropPending(stream);
      }
    });
  }

  private closeLive(stream: LiveStream): void {
    const client = stream.client;
    if (!client) {
      return;
    }
    stream.client = null;
    stream.socketOpen = false;
    stream.sampleRate = null;
    try {
      client.requestClose();
    } catch {
      // The socket was already dead
      stream.qualityWarning = true;
    }
  }
}

/** Empties the pre-open queue and returns how many chunks were dropped. */
function dropPending(stream: LiveStream): number {
  const dropped = stream.pending.length;
  stream.pending = [];
  stream.pendingBytes = 0;
  return dropped;
}

// ─── Deepgram Event Parsing ─────────────────────────────────────────────────────

/**
 * Shape of a Deepgram live transcription event.
 */
interface DeepgramTranscriptEvent {
  type: string;
  duration: number;
  start: number;
  is_final?: boolean;
  channel?: {
    alternatives?: Array<{
      transcript: string;
      confidence: number;
    }>;
  };
}

function isDeepgramTranscriptEvent(data: unknown): data is DeepgramTranscriptEvent {
  if (typeof data !== "object" || data === null) return false;
  return (
    "start" in data && typeof data.start === "number" && "duration" in data && typeof data.duration === "number"
  );
}

/**
 * Converts a Deepgram transcript event into a TranscriptEvent.
 * Returns null for silence (empty alternatives or empty transcript text).
 */
export function toTranscriptEvent(data: unknown): TranscriptEvent | null {
  if (!isDeepgramTranscriptEvent(data)) {
    return null;
  }
  const alternative = data.channel?.alternatives?.[0];
  if (!alternative || !alternative.transcript) {
    return null;
  }
  return {
    text: alternative.transcript,
    isFinal: data.is_final === true,
    startTime: data.start,
    endTime: data.start + data.duration,
  };
}
