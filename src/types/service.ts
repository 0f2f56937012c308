/**
 * @module types/service
 * @description Value types exchanged with the remote security service:
 * status snapshots, key metadata, key lifecycle requests and the
 * diagnostic maps of the Complete tier.
 */

import type { ProtocolIdentifier, UnixMillis } from "./branded.js";
import type { SecureBytes } from "./secure-bytes.js";

// ─── Service Status ─────────────────────────────────────────────────

/**
 * Lifecycle state reported by the service.
 */
export type ServiceState =
  | "operational"
  | "initializing"
  | "maintenance"
  | "shuttingDown"
  | "degraded"
  | "failed"
  | "unknown";

const SERVICE_STATE_CODES: readonly ServiceState[] = [
  "operational",
  "initializing",
  "maintenance",
  "shuttingDown",
  "degraded",
  "failed",
];

/**
 * Map the numeric status code returned by `getServiceStatusCode`.
 * Codes outside the table are reported as `unknown`.
 */
export function serviceStateFromCode(code: number): ServiceState {
  return SERVICE_STATE_CODES[code] ?? "unknown";
}

export function serviceStateCode(state: ServiceState): number {
  return SERVICE_STATE_CODES.indexOf(state);
}

/**
 * Snapshot produced by a status query. Never persisted; frozen on return.
 */
export interface ServiceStatus {
  readonly reachable: boolean;
  readonly protocolIdentifier: ProtocolIdentifier;
  /** Absent when the version query failed; see `details.versionError`. */
  readonly version?: string;
  readonly state: ServiceState;
  readonly timestampMs: UnixMillis;
  readonly details: Readonly<Record<string, string>>;
}

// ─── Keys ───────────────────────────────────────────────────────────

export type KeyType = "symmetric" | "asymmetric" | "hmac";

export const DEFAULT_KEY_BITS: Readonly<Record<KeyType, number>> = {
  symmetric: 256,
  asymmetric: 2048,
  hmac: 256,
};

export type KeyFormat = "raw" | "pkcs8" | "spki" | "jwk";

export interface KeyGenerationRequest {
  readonly keyType: KeyType;
  /** Defaults to the key type's standard size. */
  readonly keySizeInBits?: number;
  readonly algorithm?: string;
  /** Service-assigned when omitted. */
  readonly identifier?: string;
  readonly purpose?: string;
}

export interface KeyImportRequest {
  readonly keyType: KeyType;
  readonly identifier?: string;
  readonly format?: KeyFormat;
  readonly purpose?: string;
  /** Temporary keys are discarded by the service when its session ends. */
  readonly temporary?: boolean;
}

export interface KeyMetadata {
  readonly identifier: string;
  readonly keyType: KeyType;
  readonly algorithm: string;
  readonly keySizeInBits: number;
  readonly createdAtMs: number;
  readonly attributes: Readonly<Record<string, string>>;
}

// ─── Derivation ─────────────────────────────────────────────────────

export interface PasswordDerivationParameters {
  readonly salt: SecureBytes;
  readonly iterations: number;
  readonly keySizeInBits: number;
  /** e.g. "PBKDF2-SHA256". Service default when omitted. */
  readonly algorithm?: string;
}

export const DEFAULT_DERIVATION_ITERATIONS = 10_000;

// ─── Lifecycle ──────────────────────────────────────────────────────

export type DiagnosticInfo = Readonly<Record<string, string>>;
export type ServiceConfiguration = Readonly<Record<string, string>>;
export type ServiceMetrics = Readonly<Record<string, number>>;
