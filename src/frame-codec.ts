/**
 * Binary frame codec for length-prefixed audio frames.
 *
 * Wire format: [4-byte little-endian uint32 metadata length][UTF-8 metadata JSON][int16 LE PCM samples]
 *
 * The codec is transport-agnostic: it neither verifies the payload nor keeps
 * any state, it only splits a message into metadata and raw audio bytes.
 */

import { computeChecksum, countSamples } from "./integrity-verifier.js";
import type { DecodeResult, DecodeErrorCode, FrameMetadata } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

/** Size of the little-endian metadata length prefix */
const PREFIX_BYTES = 4;

/** Bytes per signed 16-bit PCM sample */
const BYTES_PER_SAMPLE = 2;

const UINT32_MAX = 0xffffffff;

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode metadata and PCM payload into the wire format.
 * Produces: [uint32 LE metadata len][metadata JSON][PCM bytes]
 */
export function encodeFrame(metadata: FrameMetadata, payload: Buffer): Buffer {
  const metaJson = Buffer.from(JSON.stringify(metadata), "utf-8");
  const buf = Buffer.alloc(PREFIX_BYTES + metaJson.length + payload.length);

  buf.writeUInt32LE(metaJson.length, 0);
  metaJson.copy(buf, PREFIX_BYTES);
  payload.copy(buf, PREFIX_BYTES + metaJson.length);

  return buf;
}

/**
 * Build the metadata a well-behaved client declares for a payload: sample
 * count and modular checksum computed over the bytes actually sent.
 */
export function createFrameMetadata(
  payload: Buffer,
  sampleRate: number,
  timestamp: number = Date.now(),
): FrameMetadata {
  return {
    sampleRate,
    dataLength: countSamples(payload),
    checksum: computeChecksum(payload),
    timestamp,
    verificationRequested: true,
  };
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

function isUint32(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= UINT32_MAX;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fail(code: DecodeErrorCode, message: string): DecodeResult {
  return { ok: false, error: { code, message } };
}

/**
 * Validate the parsed metadata object and normalize it into FrameMetadata.
 * Returns an error message instead of throwing so decodeFrame stays total.
 */
function parseMetadata(obj: unknown): FrameMetadata | string {
  if (!isJsonObject(obj)) {
    return "metadata must be a JSON object";
  }
  const { sampleRate, dataLength, checksum, timestamp } = obj;
  const requested = obj.verificationRequested;

  if (!isUint32(sampleRate)) return "sampleRate must be an unsigned 32-bit integer";

  if (dataLength !== undefined && !isUint32(dataLength)) {
    return "dataLength must be an unsigned 32-bit integer";
  }
  if (checksum !== undefined && !isUint32(checksum)) {
    return "checksum must be an unsigned 32-bit integer";
  }
  if (timestamp !== undefined && (typeof timestamp !== "number" || !Number.isInteger(timestamp))) {
    return "timestamp must be an integer (ms since epoch)";
  }
  if (requested !== undefined && typeof requested !== "boolean") {
    return "verificationRequested must be a boolean";
  }

  // Clients that predate the opt-in flag declare length and checksum only
  const verificationRequested =
    typeof requested === "boolean" ? requested : dataLength !== undefined && checksum !== undefined;

  if (verificationRequested && (dataLength === undefined || checksum === undefined)) {
    return "verification requested but dataLength or checksum is missing";
  }

  const metadata: FrameMetadata = { sampleRate, verificationRequested };
  if (isUint32(dataLength)) metadata.dataLength = dataLength;
  if (isUint32(checksum)) metadata.checksum = checksum;
  if (typeof timestamp === "number") metadata.timestamp = timestamp;
  return metadata;
}

/**
 * Decode a frame from the wire format.
 * Never throws; malformed input yields a FrameDecodeError.
 */
export function decodeFrame(data: Buffer): DecodeResult {
  if (data.length < PREFIX_BYTES) {
    return fail("truncated", `frame has ${data.length} byte(s), need at least ${PREFIX_BYTES} for the length prefix`);
  }

  const metaLen = data.readUInt32LE(0);
  const available = data.length - PREFIX_BYTES;
  if (available < metaLen) {
    return fail("truncated", `metadata length ${metaLen} exceeds the ${available} byte(s) after the prefix`);
  }

  let parsed: unknown;
  try {
    const metaText = utf8Decoder.decode(data.subarray(PREFIX_BYTES, PREFIX_BYTES + metaLen));
    parsed = JSON.parse(metaText);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail("malformed_metadata", `metadata is not valid UTF-8 JSON: ${reason}`);
  }

  const metadata = parseMetadata(parsed);
  if (typeof metadata === "string") {
    return fail("malformed_metadata", metadata);
  }

  const payload = data.subarray(PREFIX_BYTES + metaLen);
  if (payload.length % BYTES_PER_SAMPLE !== 0) {
    return fail(
      "misaligned_payload",
      `payload length ${payload.length} is not a multiple of ${BYTES_PER_SAMPLE}. Expected 16-bit aligned PCM data.`,
    );
  }

  return { ok: true, frame: { metadata, payload } };
}
