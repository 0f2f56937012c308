/**
 * @module types/dto
 * @description Transport-independent value types of the DTO protocol family.
 *
 * DTO operations report through OperationResult and take their tuning
 * through SecurityConfig, so hosts can implement and test the contract
 * without any connection type in scope.
 */

import { z } from "zod";
import type { SecureBytes } from "./secure-bytes.js";
import { SecurityErrors, SecurityServiceError } from "./errors.js";

// ─── Operation Result Envelope ──────────────────────────────────────

export interface OperationSuccess<T> {
  readonly status: "success";
  readonly value: T;
}

export interface OperationFailure {
  readonly status: "failure";
  readonly errorCode: number;
  readonly errorMessage: string;
  readonly details: Readonly<Record<string, string>>;
}

export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export function operationSuccess<T>(value: T): OperationSuccess<T> {
  return { status: "success", value };
}

export function operationFailure(
  errorCode: number,
  errorMessage: string,
  details: Readonly<Record<string, string>> = {}
): OperationFailure {
  return { status: "failure", errorCode, errorMessage, details };
}

// ─── Security Configuration ─────────────────────────────────────────

/**
 * Well-known keys of `SecurityConfig.options`.
 */
export const ConfigOption = {
  keyIdentifier: "keyIdentifier",
  iterations: "iterations",
  /** Hex-encoded salt for password derivation. */
  salt: "salt",
  format: "format",
  purpose: "purpose",
  temporary: "temporary",
  /** Hex-encoded associated data for authenticated encryption. */
  associatedData: "associatedData",
  keyType: "keyType",
} as const;

export const securityConfigSchema = z.object({
  algorithm: z.string().min(1, "algorithm must not be empty"),
  keySizeInBits: z.number().int().nonnegative(),
  options: z.record(z.string()).default({}),
});

export type SecurityConfigInput = z.input<typeof securityConfigSchema>;

export interface SecurityConfig {
  readonly algorithm: string;
  readonly keySizeInBits: number;
  readonly options: Readonly<Record<string, string>>;
}

/**
 * Validate and freeze a configuration.
 *
 * @throws {SecurityServiceError} kind=invalidInput when the input does not
 * describe a configuration.
 */
export function createSecurityConfig(input: SecurityConfigInput): SecurityConfig {
  const parsed = securityConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") || "config";
    throw new SecurityServiceError(
      SecurityErrors.invalidInput(`${where}: ${issue?.message ?? "invalid"}`)
    );
  }
  return Object.freeze({
    algorithm: parsed.data.algorithm,
    keySizeInBits: parsed.data.keySizeInBits,
    options: Object.freeze({ ...parsed.data.options }),
  });
}

/** Copy of a configuration with extra options merged over its own. */
export function withOptions(
  config: SecurityConfig,
  options: Readonly<Record<string, string>>
): SecurityConfig {
  return Object.freeze({
    algorithm: config.algorithm,
    keySizeInBits: config.keySizeInBits,
    options: Object.freeze({ ...config.options, ...options }),
  });
}

// ─── Key Exchange ───────────────────────────────────────────────────

export interface KeyExchangeParameters {
  readonly publicKey: SecureBytes;
  readonly privateKey: SecureBytes;
  readonly algorithm: string;
  readonly parameters: Readonly<Record<string, string>>;
}
