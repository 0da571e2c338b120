// Audio Frame Integrity Gateway - Policy Configuration
//
// One immutable PolicyConfig is built at startup and shared read-only by every
// connection handler.

import type { PolicyConfig } from "./types.js";

const UINT32_MAX = 0xffffffff;

export const DEFAULT_POLICY: PolicyConfig = Object.freeze({
  verifyEnabled: false,
  rejectEnabled: false,
  corruptionThreshold: 0,
  extendedLogging: false,
});

/** Environment variables read by loadPolicyConfig() */
export const POLICY_ENV_VARS = {
  verifyEnabled: "VERIFY_DATA_INTEGRITY",
  rejectEnabled: "REJECT_CORRUPTED_DATA",
  corruptionThreshold: "CORRUPTION_THRESHOLD",
  extendedLogging: "EXTENDED_INTEGRITY_LOGGING",
} as const;

export class PolicyConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PolicyConfigError";
  }
}

/**
 * Builds a frozen PolicyConfig from defaults and overrides.
 * @throws PolicyConfigError if the corruption threshold is not a uint32.
 */
export function createPolicyConfig(overrides: Partial<PolicyConfig> = {}): PolicyConfig {
  const config: PolicyConfig = { ...DEFAULT_POLICY, ...overrides };

  if (
    !Number.isInteger(config.corruptionThreshold) ||
    config.corruptionThreshold < 0 ||
    config.corruptionThreshold > UINT32_MAX
  ) {
    throw new PolicyConfigError(
      `Corruption threshold must be a non-negative integer, got ${config.corruptionThreshold}`,
    );
  }

  return Object.freeze(config);
}

// ─── Environment Loading ────────────────────────────────────────────────────────

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(value)) return true;
  if (FALSE_VALUES.has(value)) return false;
  throw new PolicyConfigError(`${name} must be a boolean (true/false), got "${raw}"`);
}

function parseThreshold(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  if (!/^\d+$/.test(raw.trim())) {
    throw new PolicyConfigError(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return Number(raw.trim());
}

/**
 * Reads the integrity policy from environment variables. Unset variables
 * fall back to DEFAULT_POLICY.
 * @throws PolicyConfigError on unparseable values.
 */
export function loadPolicyConfig(env: NodeJS.ProcessEnv = process.env): PolicyConfig {
  return createPolicyConfig({
    verifyEnabled: parseBoolean(
      POLICY_ENV_VARS.verifyEnabled,
      env[POLICY_ENV_VARS.verifyEnabled],
      DEFAULT_POLICY.verifyEnabled,
    ),
    rejectEnabled: parseBoolean(
      POLICY_ENV_VARS.rejectEnabled,
      env[POLICY_ENV_VARS.rejectEnabled],
      DEFAULT_POLICY.rejectEnabled,
    ),
    corruptionThreshold: parseThreshold(
      POLICY_ENV_VARS.corruptionThreshold,
      env[POLICY_ENV_VARS.corruptionThreshold],
      DEFAULT_POLICY.corruptionThreshold,
    ),
    extendedLogging: parseBoolean(
      POLICY_ENV_VARS.extendedLogging,
      env[POLICY_ENV_VARS.extendedLogging],
      DEFAULT_POLICY.extendedLogging,
    ),
  });
}

/** One-line summary for the startup log */
export function describePolicy(config: PolicyConfig): string {
  if (!config.verifyEnabled) {
    return "verification disabled";
  }
  const rejection = config.rejectEnabled
    ? `reject after ${config.corruptionThreshold} tolerated failure(s)`
    : "monitor only (no rejection)";
  const logging = config.extendedLogging ? "all verdicts" : "failures only";
  return `verification enabled, ${rejection}, logging ${logging}`;
}
