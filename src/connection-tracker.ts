// Audio Frame Integrity Gateway - Connection Tracker
// Per-connection failure accounting and rejection policy.
//
// Each client connection owns exactly one tracker. There is no process-wide
// table of clients: the tracker lives and dies with its connection handler.

import { describeVerdict } from "./integrity-verifier.js";
import { ConnectionStatus } from "./types.js";
import type {
  ConnectionAction,
  ConnectionState,
  PolicyConfig,
  RejectionNotice,
  VerificationVerdict,
} from "./types.js";

/**
 * Valid terminal transitions for the connection state machine.
 *
 * ACTIVE → REJECTED:     onVerdict() once failureCount exceeds the threshold
 * ACTIVE → DISCONNECTED: disconnect() (transport closed)
 *
 * Only ACTIVE accepts verdicts.
 */
export class ConnectionTracker {
  readonly clientId: string;
  readonly createdAt: Date;
  readonly policy: PolicyConfig;
  private _status: ConnectionStatus = ConnectionStatus.ACTIVE;
  private _failureCount = 0;
  private _framesAccepted = 0;

  constructor(clientId: string, policy: PolicyConfig, createdAt: Date = new Date()) {
    this.clientId = clientId;
    this.policy = policy;
    this.createdAt = createdAt;
  }

  get status(): ConnectionStatus {
    return this._status;
  }

  /** Cumulative failing verdicts over the connection's lifetime. Never decreases. */
  get failureCount(): number {
    return this._failureCount;
  }

  get framesAccepted(): number {
    return this._framesAccepted;
  }

  get isActive(): boolean {
    return this._status === ConnectionStatus.ACTIVE;
  }

  /**
   * Applies one verdict (or null when verification was skipped) and returns
   * the action the connection handler must take.
   *
   * Rules, in order:
   *  1. no verdict → accept
   *  2. passing verdict → accept (the failure count is not reset)
   *  3. failing verdict → failureCount + 1, then
   *     - rejection disabled → accept_with_warning (monitor only)
   *     - failureCount <= threshold → accept_with_warning
   *     - failureCount > threshold → reject, tracker becomes REJECTED
   *
   * @throws Error if the connection is no longer ACTIVE.
   */
  onVerdict(verdict: VerificationVerdict | null): ConnectionAction {
    if (this._status !== ConnectionStatus.ACTIVE) {
      throw new Error(
        `Connection ${this.clientId} is "${this._status}"; no further frames are accepted.`,
      );
    }

    if (verdict === null || verdict.ok) {
      this._framesAccepted++;
      return "accept";
    }

    this._failureCount++;

    if (this.policy.rejectEnabled && this._failureCount > this.policy.corruptionThreshold) {
      this._status = ConnectionStatus.REJECTED;
      return "reject";
    }

    this._framesAccepted++;
    return "accept_with_warning";
  }

  /** Transport closed. Safe to call in any state; terminal states are kept. */
  disconnect(): void {
    if (this._status === ConnectionStatus.ACTIVE) {
      this._status = ConnectionStatus.DISCONNECTED;
    }
  }

  snapshot(): ConnectionState {
    return {
      clientId: this.clientId,
      status: this._status,
      failureCount: this._failureCount,
      framesAccepted: this._framesAccepted,
      createdAt: this.createdAt,
    };
  }
}

// ─── Rejection Notice ───────────────────────────────────────────────────────────

/**
 * Builds the JSON notice sent to a client right before its connection is
 * closed for exceeding the corruption threshold.
 */
export function buildRejectionNotice(
  verdict: VerificationVerdict,
  failureCount: number,
  corruptionThreshold: number,
): RejectionNotice {
  return {
    type: "error",
    error: "data_corruption",
    message:
      `Data corruption detected: ${describeVerdict(verdict)}. ` +
      `${failureCount} failed verification(s) exceeds the tolerated threshold of ${corruptionThreshold}. ` +
      "Closing connection.",
    action: "disconnect",
  };
}
