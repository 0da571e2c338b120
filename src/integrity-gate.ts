// Audio Frame Integrity Gateway - Integrity Gate
// Runs one binary message through decode → verify → policy and logs the verdict.
//
// Frames of one connection must go through processFrame() strictly in arrival
// order: the tracker's failure count is a sequential accumulator.

import { buildRejectionNotice, type ConnectionTracker } from "./connection-tracker.js";
import { decodeFrame } from "./frame-codec.js";
import { describeVerdict, verifyIfRequested } from "./integrity-verifier.js";
import type { ServerLogger } from "./logger.js";
import type {
  DecodedFrame,
  FrameDecodeError,
  RejectionNotice,
  VerificationVerdict,
} from "./types.js";

export type FrameOutcome =
  | {
      kind: "forward";
      action: "accept" | "accept_with_warning";
      frame: DecodedFrame;
      verdict: VerificationVerdict | null;
    }
  | { kind: "drop"; error: FrameDecodeError }
  | { kind: "reject"; verdict: VerificationVerdict; notice: RejectionNotice };

/**
 * Processes one wire message for a connection.
 *
 * - Decode errors drop the frame and never touch the failure count.
 * - Accepted frames (including tolerated failures) are returned for forwarding.
 * - A rejection carries the notice the caller sends before closing.
 */
export function processFrame(
  data: Buffer,
  tracker: ConnectionTracker,
  logger: ServerLogger,
): FrameOutcome {
  const decoded = decodeFrame(data);
  if (!decoded.ok) {
    logger.warn(
      `Dropped malformed frame from ${tracker.clientId} [${decoded.error.code}]: ${decoded.error.message}`,
    );
    return { kind: "drop", error: decoded.error };
  }

  const { frame } = decoded;
  const { policy } = tracker;
  const verdict = verifyIfRequested(frame.metadata, frame.payload, policy);
  const action = tracker.onVerdict(verdict);

  logVerdict(tracker, verdict, logger);

  if (action === "reject") {
    if (verdict === null) {
      throw new Error(`Connection ${tracker.clientId} rejected without a failing verdict`);
    }
    logger.error(
      `Rejecting ${tracker.clientId}: ${tracker.failureCount} failed verification(s) ` +
        `exceeds threshold ${policy.corruptionThreshold}`,
    );
    return {
      kind: "reject",
      verdict,
      notice: buildRejectionNotice(verdict, tracker.failureCount, policy.corruptionThreshold),
    };
  }

  return { kind: "forward", action, frame, verdict };
}

/**
 * Extended logging reports every verdict; otherwise only failures are logged.
 */
function logVerdict(
  tracker: ConnectionTracker,
  verdict: VerificationVerdict | null,
  logger: ServerLogger,
): void {
  const { extendedLogging } = tracker.policy;

  if (verdict === null) {
    if (extendedLogging) {
      logger.debug(`Verification skipped for frame from ${tracker.clientId}`);
    }
    return;
  }

  if (verdict.ok) {
    if (extendedLogging) {
      logger.info(`Integrity OK for ${tracker.clientId}: ${describeVerdict(verdict)}`);
    }
    return;
  }

  logger.warn(
    `Integrity check failed for ${tracker.clientId} (failure #${tracker.failureCount}): ${describeVerdict(verdict)}`,
  );
}
