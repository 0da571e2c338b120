// Audio Frame Integrity Gateway - Integrity Verifier
//
// Compares the sample count and modular checksum a client declared for a
// frame against the values computed over the bytes the server received.
//
// The checksum is a plain sum of signed int16 samples reduced mod 2^32. It
// detects transmission errors, not tampering: any single-sample change is
// caught, but several changes whose deltas cancel out are not. Clients compute
// the same sum, so the accumulation must stay signed and unreduced until the
// final step.

import type {
  FrameMetadata,
  PolicyConfig,
  VerifiableMetadata,
  VerificationVerdict,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const BYTES_PER_SAMPLE = 2;

/** Checksums are reduced modulo 2^32 */
const CHECKSUM_MODULUS = 2 ** 32;

// ─── Checksum ───────────────────────────────────────────────────────────────────

/**
 * Number of int16 samples in a payload. Trailing odd bytes are not counted;
 * the codec rejects misaligned payloads before they get here.
 */
export function countSamples(payload: Buffer): number {
  return Math.floor(payload.length / BYTES_PER_SAMPLE);
}

/**
 * Sum of all signed 16-bit little-endian samples, reduced mod 2^32.
 *
 * The running sum stays exact in a double for any payload below ~2^37
 * samples, far beyond a single frame, so no intermediate reduction is needed.
 */
export function computeChecksum(payload: Buffer): number {
  const samples = countSamples(payload);
  let sum = 0;
  for (let i = 0; i < samples; i++) {
    sum += payload.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  // JS `%` keeps the sign of the dividend; fold negatives into [0, 2^32)
  return ((sum % CHECKSUM_MODULUS) + CHECKSUM_MODULUS) % CHECKSUM_MODULUS;
}

// ─── Verification ───────────────────────────────────────────────────────────────

export function isVerifiable(metadata: FrameMetadata): metadata is VerifiableMetadata {
  return metadata.dataLength !== undefined && metadata.checksum !== undefined;
}

/**
 * Verify a payload against the length and checksum its client declared.
 * Deterministic and linear in the number of samples.
 */
export function verifyFrame(metadata: VerifiableMetadata, payload: Buffer): VerificationVerdict {
  const lengthActual = countSamples(payload);
  const checksumActual = computeChecksum(payload);

  return {
    lengthExpected: metadata.dataLength,
    lengthActual,
    checksumExpected: metadata.checksum,
    checksumActual,
    ok: lengthActual === metadata.dataLength && checksumActual === metadata.checksum,
  };
}

/**
 * Run verification only when the server policy enables it and the frame opted
 * in. Returns null when skipped; callers treat that as an implicit pass.
 */
export function verifyIfRequested(
  metadata: FrameMetadata,
  payload: Buffer,
  policy: PolicyConfig,
): VerificationVerdict | null {
  if (!policy.verifyEnabled || !metadata.verificationRequested || !isVerifiable(metadata)) {
    return null;
  }
  return verifyFrame(metadata, payload);
}

/**
 * Human-readable summary of a verdict, naming each mismatched quantity with
 * its expected and actual value.
 */
export function describeVerdict(verdict: VerificationVerdict): string {
  if (verdict.ok) {
    return `length and checksum match (${verdict.lengthActual} samples, checksum ${verdict.checksumActual})`;
  }

  const mismatches: string[] = [];
  if (verdict.lengthActual !== verdict.lengthExpected) {
    mismatches.push(`length mismatch (expected ${verdict.lengthExpected}, got ${verdict.lengthActual})`);
  }
  if (verdict.checksumActual !== verdict.checksumExpected) {
    mismatches.push(`checksum mismatch (expected ${verdict.checksumExpected}, got ${verdict.checksumActual})`);
  }
  return mismatches.join("; ");
}
