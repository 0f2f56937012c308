/**
 * @module codec/error-mapper
 * @description Classification of anything a connection can hand back as a
 * failure into the SecurityError vocabulary, and the reverse encoding.
 *
 * `classify` is the trust-boundary backstop: it accepts any value, never
 * throws, and maps whatever it cannot recognize to `internalError`
 * carrying the original description. `classify(toNative(e))` returns `e`.
 */

import { z } from "zod";
import type { SecurityError } from "../types/errors.js";
import {
  CryptoOperation,
  SecurityErrors,
  SecurityServiceError,
  describeSecurityError,
} from "../types/errors.js";
import type { NativeError } from "../types/transport.js";
import {
  NativeErrorDomain,
  ServiceErrorCode,
  TransportErrorCode,
} from "../types/transport.js";
import { errorCodeOf, errorDetails, errorFromDetails } from "./error-codes.js";

// ─── Schemas ────────────────────────────────────────────────────────

const reason = z.string();

export const securityErrorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("serviceUnavailable") }).strict(),
  z.object({ kind: z.literal("serviceNotReady"), reason }).strict(),
  z.object({ kind: z.literal("timeout"), afterMs: z.number() }).strict(),
  z.object({ kind: z.literal("authenticationFailed"), reason }).strict(),
  z.object({ kind: z.literal("authorizationDenied"), operation: z.string() }).strict(),
  z.object({ kind: z.literal("operationNotSupported"), name: z.string() }).strict(),
  z.object({ kind: z.literal("invalidInput"), details: z.string() }).strict(),
  z.object({ kind: z.literal("invalidData"), reason }).strict(),
  z.object({ kind: z.literal("invalidState"), details: z.string() }).strict(),
  z.object({ kind: z.literal("keyNotFound"), identifier: z.string() }).strict(),
  z
    .object({
      kind: z.literal("invalidKeyType"),
      expected: z.string(),
      received: z.string(),
    })
    .strict(),
  z
    .object({
      kind: z.literal("cryptographicError"),
      operation: z.string(),
      details: z.string(),
    })
    .strict(),
  z.object({ kind: z.literal("encryptionFailed"), reason }).strict(),
  z.object({ kind: z.literal("decryptionFailed"), reason }).strict(),
  z.object({ kind: z.literal("keyGenerationFailed"), reason }).strict(),
  z.object({ kind: z.literal("notImplemented"), reason }).strict(),
  z.object({ kind: z.literal("internalError"), reason }).strict(),
  z.object({ kind: z.literal("connectionInterrupted") }).strict(),
  z.object({ kind: z.literal("connectionInvalidated"), reason }).strict(),
]);

export const nativeErrorSchema = z.object({
  domain: z.string(),
  code: z.number().int(),
  message: z.string(),
  userInfo: z
    .record(z.unknown())
    .optional()
    .transform((info) => (info === undefined ? undefined : stringifyValues(info))),
});

const errorDTOSchema = z.object({
  errorCode: z.number().int(),
  errorMessage: z.string(),
  details: z.record(z.string()).default({}),
});

const systemErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
});

function stringifyValues(info: Record<string, unknown>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(info).map(([key, value]) => [key, describeUnknown(value)])
  );
}

export function isSecurityError(value: unknown): value is SecurityError {
  return securityErrorSchema.safeParse(value).success;
}

// ─── Reverse Encoding ───────────────────────────────────────────────

/**
 * Encode an error in this library's own native domain. The code is the
 * DTO wire code and `userInfo` carries the kind and payload.
 */
export function toNative(error: SecurityError): NativeError {
  return {
    domain: NativeErrorDomain.core,
    code: errorCodeOf(error.kind),
    message: describeSecurityError(error),
    userInfo: errorDetails(error),
  };
}

// ─── Domain Rules ───────────────────────────────────────────────────

function fromTransport(native: NativeError): SecurityError {
  const info = native.userInfo ?? {};
  switch (native.code) {
    case TransportErrorCode.timedOut: {
      const afterMs = Number(info["afterMs"]);
      return SecurityErrors.timeout(Number.isFinite(afterMs) ? afterMs : 0);
    }
    case TransportErrorCode.interrupted:
      return SecurityErrors.connectionInterrupted();
    case TransportErrorCode.invalidated:
      return SecurityErrors.connectionInvalidated(native.message);
    case TransportErrorCode.unrecognizedOperation:
      return SecurityErrors.operationNotSupported(
        info["operation"] ?? native.message
      );
    case TransportErrorCode.unreachable:
      return SecurityErrors.serviceUnavailable();
    default:
      return SecurityErrors.connectionInterrupted();
  }
}

const CRYPTO_OPERATIONS: Readonly<Record<string, string>> = {
  encryption: CryptoOperation.encryption,
  decryption: CryptoOperation.decryption,
  keyGeneration: CryptoOperation.keyGeneration,
  keyDerivation: CryptoOperation.keyDerivation,
  authentication: CryptoOperation.authentication,
  keyValidation: CryptoOperation.keyValidation,
};

function fromCrypto(native: NativeError): SecurityError {
  const suboperation = native.userInfo?.["operation"];
  const operation =
    (suboperation !== undefined ? CRYPTO_OPERATIONS[suboperation] : undefined) ??
    CryptoOperation.unspecified;
  return SecurityErrors.cryptographicError(operation, native.message);
}

function fromService(native: NativeError): SecurityError {
  const { message, code } = native;
  const info = native.userInfo ?? {};
  const lowered = message.toLowerCase();

  if (lowered.includes("invalid format")) {
    return SecurityErrors.invalidInput(message);
  }
  if (lowered.includes("encryption failed")) {
    return SecurityErrors.cryptographicError(CryptoOperation.encryption, message);
  }
  if (lowered.includes("decryption failed")) {
    return SecurityErrors.cryptographicError(CryptoOperation.decryption, message);
  }
  if (lowered.includes("key not found")) {
    return SecurityErrors.keyNotFound(
      info["keyIdentifier"] ?? message.split(": ").at(-1) ?? message
    );
  }

  switch (code) {
    case ServiceErrorCode.serviceUnavailable:
      return SecurityErrors.serviceUnavailable();
    case ServiceErrorCode.authorizationDenied:
      return SecurityErrors.authorizationDenied(info["operation"] ?? message);
    case ServiceErrorCode.operationNotSupported:
      return SecurityErrors.operationNotSupported(info["operation"] ?? message);
    case ServiceErrorCode.keyNotFound:
      return SecurityErrors.keyNotFound(info["keyIdentifier"] ?? message);
    case ServiceErrorCode.invalidKeyType:
      return SecurityErrors.invalidKeyType(
        info["expected"] ?? "unknown",
        info["received"] ?? "unknown"
      );
    case ServiceErrorCode.authenticationFailed:
      return SecurityErrors.authenticationFailed(message);
    case ServiceErrorCode.serviceNotReady:
      return SecurityErrors.serviceNotReady(message);
    case ServiceErrorCode.invalidState:
      return SecurityErrors.invalidState(message);
    default:
      return SecurityErrors.internalError(
        `Unknown error (code: ${code}, message: ${message})`
      );
  }
}

function fromNative(native: NativeError): SecurityError {
  switch (native.domain) {
    case NativeErrorDomain.core:
      return errorFromDetails(native.code, native.message, native.userInfo ?? {});
    case NativeErrorDomain.transport:
      return fromTransport(native);
    case NativeErrorDomain.crypto:
      return fromCrypto(native);
    case NativeErrorDomain.service:
      return fromService(native);
    default:
      return SecurityErrors.internalError(
        `External error (domain: ${native.domain}, code: ${native.code}, message: ${native.message})`
      );
  }
}

const SYSTEM_ERROR_RULES: Readonly<
  Record<string, (message: string) => SecurityError>
> = {
  ETIMEDOUT: () => SecurityErrors.timeout(0),
  ECONNRESET: () => SecurityErrors.connectionInterrupted(),
  EPIPE: () => SecurityErrors.connectionInterrupted(),
  ECONNREFUSED: () => SecurityErrors.serviceUnavailable(),
  ENOENT: () => SecurityErrors.serviceUnavailable(),
  ERR_IPC_CHANNEL_CLOSED: (message) =>
    SecurityErrors.connectionInvalidated(message),
};

// ─── Classification ─────────────────────────────────────────────────

function describeUnknown(value: unknown): string {
  if (typeof value === "string") return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
}

function classifyValue(value: unknown): SecurityError {
  const known = securityErrorSchema.safeParse(value);
  if (known.success) return known.data;

  if (value instanceof SecurityServiceError) return value.error;

  const native = nativeErrorSchema.safeParse(value);
  if (native.success) return fromNative(native.data);

  const dto = errorDTOSchema.safeParse(value);
  if (dto.success) {
    return errorFromDetails(
      dto.data.errorCode,
      dto.data.errorMessage,
      dto.data.details
    );
  }

  if (value instanceof Error) {
    const system = systemErrorSchema.safeParse(value);
    const rule = system.success ? SYSTEM_ERROR_RULES[system.data.code] : undefined;
    if (rule) return rule(value.message);
    return SecurityErrors.internalError(value.message);
  }

  return SecurityErrors.internalError(describeUnknown(value));
}

/**
 * Map any failure value to the closest SecurityError. Total: never throws.
 *
 * Order: an existing SecurityError is returned unchanged; a thrown
 * SecurityServiceError yields its error; a native error is dispatched by
 * domain; a legacy `{ errorCode, errorMessage, details }` object goes
 * through the DTO code table; Node system errors map by `code`; any other
 * Error becomes internalError(message).
 */
export function classify(value: unknown): SecurityError {
  try {
    return classifyValue(value);
  } catch (cause) {
    return SecurityErrors.internalError(
      `Unclassifiable error: ${cause instanceof Error ? cause.message : "unknown"}`
    );
  }
}
