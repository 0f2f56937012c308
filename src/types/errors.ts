/**
 * @module types/errors
 * @description The single error vocabulary of the security RPC layer.
 *
 * Every failure, whatever its origin (transport loss, a rejected
 * authorization, a cryptographic provider fault, malformed input), is
 * collapsed into exactly one SecurityError. Exactly one `kind` is active
 * per value and equality is structural.
 */

// ─── Error Union ────────────────────────────────────────────────────

export type SecurityError =
  | { readonly kind: "serviceUnavailable" }
  | { readonly kind: "serviceNotReady"; readonly reason: string }
  | { readonly kind: "timeout"; readonly afterMs: number }
  | { readonly kind: "authenticationFailed"; readonly reason: string }
  | { readonly kind: "authorizationDenied"; readonly operation: string }
  | { readonly kind: "operationNotSupported"; readonly name: string }
  | { readonly kind: "invalidInput"; readonly details: string }
  | { readonly kind: "invalidData"; readonly reason: string }
  | { readonly kind: "invalidState"; readonly details: string }
  | { readonly kind: "keyNotFound"; readonly identifier: string }
  | {
      readonly kind: "invalidKeyType";
      readonly expected: string;
      readonly received: string;
    }
  | {
      readonly kind: "cryptographicError";
      readonly operation: string;
      readonly details: string;
    }
  | { readonly kind: "encryptionFailed"; readonly reason: string }
  | { readonly kind: "decryptionFailed"; readonly reason: string }
  | { readonly kind: "keyGenerationFailed"; readonly reason: string }
  | { readonly kind: "notImplemented"; readonly reason: string }
  | { readonly kind: "internalError"; readonly reason: string }
  | { readonly kind: "connectionInterrupted" }
  | { readonly kind: "connectionInvalidated"; readonly reason: string };

export type SecurityErrorKind = SecurityError["kind"];

/** Narrow the union to one kind. */
export type SecurityErrorOf<K extends SecurityErrorKind> = Extract<
  SecurityError,
  { readonly kind: K }
>;

export const SECURITY_ERROR_KINDS = [
  "serviceUnavailable",
  "serviceNotReady",
  "timeout",
  "authenticationFailed",
  "authorizationDenied",
  "operationNotSupported",
  "invalidInput",
  "invalidData",
  "invalidState",
  "keyNotFound",
  "invalidKeyType",
  "cryptographicError",
  "encryptionFailed",
  "decryptionFailed",
  "keyGenerationFailed",
  "notImplemented",
  "internalError",
  "connectionInterrupted",
  "connectionInvalidated",
] as const satisfies readonly SecurityErrorKind[];

/**
 * Names used for the `operation` of a cryptographicError raised by a
 * cryptographic provider.
 */
export const CryptoOperation = {
  encryption: "encryption",
  decryption: "decryption",
  keyGeneration: "key generation",
  keyDerivation: "key derivation",
  authentication: "authentication",
  keyValidation: "key validation",
  unspecified: "unspecified",
} as const;

// ─── Constructors ───────────────────────────────────────────────────

export const SecurityErrors = {
  serviceUnavailable: (): SecurityErrorOf<"serviceUnavailable"> => ({
    kind: "serviceUnavailable",
  }),
  serviceNotReady: (reason: string): SecurityErrorOf<"serviceNotReady"> => ({
    kind: "serviceNotReady",
    reason,
  }),
  /** Non-finite or negative durations are recorded as 0. */
  timeout: (afterMs: number): SecurityErrorOf<"timeout"> => ({
    kind: "timeout",
    afterMs: Number.isFinite(afterMs) && afterMs > 0 ? afterMs : 0,
  }),
  authenticationFailed: (
    reason: string
  ): SecurityErrorOf<"authenticationFailed"> => ({
    kind: "authenticationFailed",
    reason,
  }),
  authorizationDenied: (
    operation: string
  ): SecurityErrorOf<"authorizationDenied"> => ({
    kind: "authorizationDenied",
    operation,
  }),
  operationNotSupported: (
    name: string
  ): SecurityErrorOf<"operationNotSupported"> => ({
    kind: "operationNotSupported",
    name,
  }),
  invalidInput: (details: string): SecurityErrorOf<"invalidInput"> => ({
    kind: "invalidInput",
    details,
  }),
  invalidData: (reason: string): SecurityErrorOf<"invalidData"> => ({
    kind: "invalidData",
    reason,
  }),
  invalidState: (details: string): SecurityErrorOf<"invalidState"> => ({
    kind: "invalidState",
    details,
  }),
  keyNotFound: (identifier: string): SecurityErrorOf<"keyNotFound"> => ({
    kind: "keyNotFound",
    identifier,
  }),
  invalidKeyType: (
    expected: string,
    received: string
  ): SecurityErrorOf<"invalidKeyType"> => ({
    kind: "invalidKeyType",
    expected,
    received,
  }),
  cryptographicError: (
    operation: string,
    details: string
  ): SecurityErrorOf<"cryptographicError"> => ({
    kind: "cryptographicError",
    operation,
    details,
  }),
  encryptionFailed: (reason: string): SecurityErrorOf<"encryptionFailed"> => ({
    kind: "encryptionFailed",
    reason,
  }),
  decryptionFailed: (reason: string): SecurityErrorOf<"decryptionFailed"> => ({
    kind: "decryptionFailed",
    reason,
  }),
  keyGenerationFailed: (
    reason: string
  ): SecurityErrorOf<"keyGenerationFailed"> => ({
    kind: "keyGenerationFailed",
    reason,
  }),
  notImplemented: (reason: string): SecurityErrorOf<"notImplemented"> => ({
    kind: "notImplemented",
    reason,
  }),
  internalError: (reason: string): SecurityErrorOf<"internalError"> => ({
    kind: "internalError",
    reason,
  }),
  connectionInterrupted: (): SecurityErrorOf<"connectionInterrupted"> => ({
    kind: "connectionInterrupted",
  }),
  connectionInvalidated: (
    reason: string
  ): SecurityErrorOf<"connectionInvalidated"> => ({
    kind: "connectionInvalidated",
    reason,
  }),
} as const;

// ─── Queries ────────────────────────────────────────────────────────

/**
 * Structural equality: same kind and same payload values.
 */
export function securityErrorEquals(a: SecurityError, b: SecurityError): boolean {
  if (a.kind !== b.kind) return false;
  const left = Object.entries(a);
  const right = new Map<string, unknown>(Object.entries(b));
  return (
    left.length === right.size &&
    left.every(([key, value]) => right.has(key) && right.get(key) === value)
  );
}

/**
 * Stable human-readable description of an error.
 */
export function describeSecurityError(error: SecurityError): string {
  switch (error.kind) {
    case "serviceUnavailable":
      return "Security service is unavailable";
    case "serviceNotReady":
      return `Security service is not ready: ${error.reason}`;
    case "timeout":
      return `Operation timed out after ${error.afterMs} ms`;
    case "authenticationFailed":
      return `Authentication failed: ${error.reason}`;
    case "authorizationDenied":
      return `Authorization denied for operation: ${error.operation}`;
    case "operationNotSupported":
      return `Operation not supported: ${error.name}`;
    case "invalidInput":
      return `Invalid input: ${error.details}`;
    case "invalidData":
      return `Invalid data: ${error.reason}`;
    case "invalidState":
      return `Invalid state: ${error.details}`;
    case "keyNotFound":
      return `Key not found: ${error.identifier}`;
    case "invalidKeyType":
      return `Invalid key type: expected ${error.expected}, received ${error.received}`;
    case "cryptographicError":
      return `Cryptographic error in ${error.operation}: ${error.details}`;
    case "encryptionFailed":
      return `Encryption failed: ${error.reason}`;
    case "decryptionFailed":
      return `Decryption failed: ${error.reason}`;
    case "keyGenerationFailed":
      return `Key generation failed: ${error.reason}`;
    case "notImplemented":
      return `Not implemented: ${error.reason}`;
    case "internalError":
      return `Internal error: ${error.reason}`;
    case "connectionInterrupted":
      return "Connection to the security service was interrupted";
    case "connectionInvalidated":
      return `Connection to the security service was invalidated: ${error.reason}`;
  }
}

/**
 * Whether an error belongs to the transport layer. Transport-layer errors
 * are always surfaced to the caller and never retried by this library.
 */
export function isTransportFailure(error: SecurityError): boolean {
  return (
    error.kind === "serviceUnavailable" ||
    error.kind === "connectionInterrupted" ||
    error.kind === "connectionInvalidated" ||
    error.kind === "timeout"
  );
}

// ─── Throwable Wrapper ──────────────────────────────────────────────

/**
 * Thrown by `unwrap()` for callers that prefer exceptions over results.
 */
export class SecurityServiceError extends Error {
  constructor(public readonly error: SecurityError) {
    super(describeSecurityError(error));
    this.name = "SecurityServiceError";
  }

  get kind(): SecurityErrorKind {
    return this.error.kind;
  }
}
