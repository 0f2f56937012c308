/**
 * @module codec/error-codes
 * @description Numeric error codes of the DTO layer and the conversion
 * between SecurityError and its (code, message, details) form.
 *
 * The code table is a versioned wire contract. Changing a mapping is a
 * breaking change.
 */

import type { SecurityError, SecurityErrorKind } from "../types/errors.js";
import {
  CryptoOperation,
  SECURITY_ERROR_KINDS,
  SecurityErrors,
  describeSecurityError,
} from "../types/errors.js";

// ─── Code Table ─────────────────────────────────────────────────────

export const SECURITY_ERROR_CODES = {
  serviceUnavailable: 1,
  serviceNotReady: 2,
  timeout: 3,
  connectionInterrupted: 4,
  connectionInvalidated: 5,
  invalidInput: 1001,
  invalidState: 1002,
  cryptographicError: 1003,
  notImplemented: 1004,
  invalidData: 1005,
  operationNotSupported: 1006,
  keyNotFound: 1007,
  invalidKeyType: 1008,
  authenticationFailed: 1009,
  authorizationDenied: 1010,
  encryptionFailed: 1011,
  decryptionFailed: 1012,
  keyGenerationFailed: 1013,
  internalError: 10000,
} as const satisfies Record<SecurityErrorKind, number>;

export function errorCodeOf(kind: SecurityErrorKind): number {
  return SECURITY_ERROR_CODES[kind];
}

export function errorKindOfCode(code: number): SecurityErrorKind | null {
  return (
    SECURITY_ERROR_KINDS.find((kind) => SECURITY_ERROR_CODES[kind] === code) ??
    null
  );
}

function isErrorKind(value: string | undefined): value is SecurityErrorKind {
  return SECURITY_ERROR_KINDS.some((kind) => kind === value);
}

// ─── Details ────────────────────────────────────────────────────────

/**
 * Flatten an error to a string map: its kind plus every payload field.
 */
export function errorDetails(error: SecurityError): Record<string, string> {
  const details: Record<string, string> = {};
  for (const [key, value] of Object.entries(error)) {
    details[key] = String(value);
  }
  return details;
}

function parseMillis(value: string | undefined): number {
  const parsed = Number(value);
  return value !== undefined && Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Rebuild an error from its code, message and detail map. The `kind`
 * detail wins over the code; missing payload fields fall back to the
 * message. Unknown codes without a known kind become internalError.
 */
export function errorFromDetails(
  code: number,
  message: string,
  details: Readonly<Record<string, string>>
): SecurityError {
  const declared = details["kind"];
  const kind = isErrorKind(declared) ? declared : errorKindOfCode(code);
  const field = (name: string): string => details[name] ?? message;

  switch (kind) {
    case null:
      return SecurityErrors.internalError(message);
    case "serviceUnavailable":
      return SecurityErrors.serviceUnavailable();
    case "serviceNotReady":
      return SecurityErrors.serviceNotReady(field("reason"));
    case "timeout":
      return SecurityErrors.timeout(parseMillis(details["afterMs"]));
    case "authenticationFailed":
      return SecurityErrors.authenticationFailed(field("reason"));
    case "authorizationDenied":
      return SecurityErrors.authorizationDenied(field("operation"));
    case "operationNotSupported":
      return SecurityErrors.operationNotSupported(field("name"));
    case "invalidInput":
      return SecurityErrors.invalidInput(field("details"));
    case "invalidData":
      return SecurityErrors.invalidData(field("reason"));
    case "invalidState":
      return SecurityErrors.invalidState(field("details"));
    case "keyNotFound":
      return SecurityErrors.keyNotFound(field("identifier"));
    case "invalidKeyType":
      return SecurityErrors.invalidKeyType(
        details["expected"] ?? "unknown",
        details["received"] ?? "unknown"
      );
    case "cryptographicError":
      return SecurityErrors.cryptographicError(
        details["operation"] ?? CryptoOperation.unspecified,
        field("details")
      );
    case "encryptionFailed":
      return SecurityErrors.encryptionFailed(field("reason"));
    case "decryptionFailed":
      return SecurityErrors.decryptionFailed(field("reason"));
    case "keyGenerationFailed":
      return SecurityErrors.keyGenerationFailed(field("reason"));
    case "notImplemented":
      return SecurityErrors.notImplemented(field("reason"));
    case "internalError":
      return SecurityErrors.internalError(field("reason"));
    case "connectionInterrupted":
      return SecurityErrors.connectionInterrupted();
    case "connectionInvalidated":
      return SecurityErrors.connectionInvalidated(field("reason"));
  }
}

// ─── DTO Form ───────────────────────────────────────────────────────

export interface ErrorDTO {
  readonly errorCode: number;
  readonly errorMessage: string;
  readonly details: Readonly<Record<string, string>>;
}

/**
 * @example
 * ```ts
 * const dto = toDTO(SecurityErrors.cryptographicError("encryption", "bad tag"));
 * dto.errorCode;              // 1003
 * dto.details["operation"];   // "encryption"
 * ```
 */
export function toDTO(error: SecurityError): ErrorDTO {
  return {
    errorCode: errorCodeOf(error.kind),
    errorMessage: describeSecurityError(error),
    details: errorDetails(error),
  };
}

export function fromDTO(dto: ErrorDTO): SecurityError {
  return errorFromDetails(dto.errorCode, dto.errorMessage, dto.details);
}
