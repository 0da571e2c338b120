// Audio Frame Integrity Gateway - Shared TypeScript interfaces and types

// ─── Wire Frame ─────────────────────────────────────────────────────────────────

/**
 * Client-declared metadata carried in the JSON section of every frame.
 *
 * `dataLength` and `checksum` are guaranteed present whenever
 * `verificationRequested` is true (enforced by the codec).
 */
export interface FrameMetadata {
  sampleRate: number;
  dataLength?: number; // declared sample count
  checksum?: number; // declared sum of samples mod 2^32
  timestamp?: number; // client clock, ms since epoch (informational)
  verificationRequested: boolean;
}

/** Metadata narrowed to the frames that carry declared length and checksum. */
export type VerifiableMetadata = FrameMetadata & {
  dataLength: number;
  checksum: number;
};

export interface DecodedFrame {
  metadata: FrameMetadata;
  payload: Buffer; // raw int16 LE PCM bytes, uninterpreted
}

export type DecodeErrorCode = "truncated" | "malformed_metadata" | "misaligned_payload";

export interface FrameDecodeError {
  code: DecodeErrorCode;
  message: string;
}

export type DecodeResult =
  | { ok: true; frame: DecodedFrame }
  | { ok: false; error: FrameDecodeError };

// ─── Verification ───────────────────────────────────────────────────────────────

export interface VerificationVerdict {
  lengthExpected: number;
  lengthActual: number;
  checksumExpected: number;
  checksumActual: number;
  ok: boolean;
}

// ─── Policy ─────────────────────────────────────────────────────────────────────

export interface PolicyConfig {
  readonly verifyEnabled: boolean;
  readonly rejectEnabled: boolean;
  /** Failures tolerated before rejection. 0 = reject on the first failure. */
  readonly corruptionThreshold: number;
  /** Log every verdict (true) or failures only (false). */
  readonly extendedLogging: boolean;
}

// ─── Connection State Machine ───────────────────────────────────────────────────

export enum ConnectionStatus {
  ACTIVE = "active",
  REJECTED = "rejected",
  DISCONNECTED = "disconnected",
}

export type ConnectionAction = "accept" | "accept_with_warning" | "reject";

export interface ConnectionState {
  clientId: string;
  status: ConnectionStatus;
  failureCount: number;
  framesAccepted: number;
  createdAt: Date;
}

// ─── Recognition Sink ───────────────────────────────────────────────────────────

export interface TranscriptEvent {
  text: string;
  isFinal: boolean;
  startTime: number; // seconds from stream start
  endTime: number;
}

/**
 * Downstream consumer of verified audio, keyed by connection id.
 * The server opens one stream per client connection and closes it when the
 * connection ends or is rejected.
 */
export interface AudioSink {
  open(connectionId: string, onTranscript: (event: TranscriptEvent) => void): void;
  write(connectionId: string, payload: Buffer, metadata: FrameMetadata): void;
  /** Finalize the current utterance. The next write starts a new stream. */
  stop(connectionId: string): void;
  /** Drop audio not yet handed to the recognizer. Returns the number of chunks dropped. */
  clearQueue(connectionId: string): number;
  /** Release the stream. Safe to call more than once. */
  close(connectionId: string): void;
}

// ─── WebSocket Message Protocol ─────────────────────────────────────────────────

export type ControlMethod = "stop" | "clear_audio_queue";

// Client → Server (text frames; audio travels as binary frames)
export type ClientMessage = { command: "call_method"; method: ControlMethod };

export interface RejectionNotice {
  type: "error";
  error: "data_corruption";
  message: string;
  action: "disconnect";
}

// Server → Client messages
export type ServerMessage =
  | RejectionNotice
  | { type: "error"; error: "invalid_command"; message: string }
  | { type: "frame_error"; code: DecodeErrorCode; message: string }
  | { type: "integrity_warning"; failureCount: number; message: string }
  | { type: "control_result"; method: ControlMethod; status: "success"; dropped?: number }
  | { type: "realtime"; text: string }
  | { type: "fullSentence"; text: string };
