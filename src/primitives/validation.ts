/**
 * @module primitives/validation
 * @description Local argument checks run before a round trip.
 */

import type { SecurityError } from "../types/errors.js";
import { SecurityErrors } from "../types/errors.js";
import type { SecureBytes } from "../types/secure-bytes.js";
import type { Result } from "../types/result.js";
import { err } from "../types/result.js";

export type Check = SecurityError | null;

export function requireData(data: SecureBytes, message: string): Check {
  return data.isEmpty() ? SecurityErrors.invalidData(message) : null;
}

export function requireKeyIdentifier(keyIdentifier: string | null): Check {
  return keyIdentifier !== null && keyIdentifier.trim() === ""
    ? SecurityErrors.invalidInput("Key identifier must not be empty")
    : null;
}

export function requireLength(length: number, max: number): Check {
  if (!Number.isInteger(length) || length < 0) {
    return SecurityErrors.invalidInput(
      `Length must be a non-negative integer, got ${length}`
    );
  }
  if (length > max) {
    return SecurityErrors.invalidInput(
      `Length ${length} exceeds the maximum of ${max} bytes`
    );
  }
  return null;
}

export function requirePositiveInteger(value: number, name: string): Check {
  return Number.isInteger(value) && value > 0
    ? null
    : SecurityErrors.invalidInput(`${name} must be a positive integer, got ${value}`);
}

export function requireText(value: string, name: string): Check {
  return value.trim() === ""
    ? SecurityErrors.invalidInput(`${name} must not be empty`)
    : null;
}

/** First failing check, or null when all pass. */
export function firstFailure(...checks: readonly Check[]): Check {
  return checks.find((check) => check !== null) ?? null;
}

/** Settle immediately with a local validation failure. */
export function rejected<T>(error: SecurityError): Promise<Result<T>> {
  return Promise.resolve(err(error));
}
