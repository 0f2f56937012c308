/**
 * @module interfaces/complete-service
 * @description ICompleteSecurityService: key lifecycle, derivation,
 * authenticated encryption, algorithm-bound signatures, backup and service
 * lifecycle on top of the Standard tier.
 *
 * An implementation that lacks an operation returns `notImplemented`;
 * callers feature-detect by inspecting the error kind.
 */

import type { AsyncResult } from "../types/result.js";
import type { SecureBytes } from "../types/secure-bytes.js";
import type {
  DiagnosticInfo,
  KeyFormat,
  KeyGenerationRequest,
  KeyImportRequest,
  KeyMetadata,
  PasswordDerivationParameters,
  ServiceConfiguration,
  ServiceMetrics,
  ServiceStatus,
} from "../types/service.js";
import type { IStandardSecurityService } from "./standard-service.js";

/**
 * @interface ICompleteSecurityService
 */
export interface ICompleteSecurityService extends IStandardSecurityService {
  // ─── Key Lifecycle ──────────────────────────────────────────────

  /**
   * @command
   * @returns The identifier of the new key.
   */
  generateKey(request: KeyGenerationRequest): AsyncResult<string>;

  /**
   * @command
   * @returns The identifier under which the key was stored.
   */
  importKey(keyData: SecureBytes, request: KeyImportRequest): AsyncResult<string>;

  /** @command */
  exportKey(keyIdentifier: string, format: KeyFormat): AsyncResult<SecureBytes>;

  /** @command */
  deleteKey(keyIdentifier: string): AsyncResult<void>;

  /** @query */
  listKeyIdentifiers(): AsyncResult<readonly string[]>;

  /** @query */
  getKeyMetadata(keyIdentifier: string): AsyncResult<KeyMetadata>;

  // ─── Derivation ─────────────────────────────────────────────────

  /** @command */
  deriveKeyFromPassword(
    password: SecureBytes,
    parameters: PasswordDerivationParameters
  ): AsyncResult<SecureBytes>;

  /** @command */
  deriveKeyFromKey(
    sourceKeyIdentifier: string,
    algorithm: string,
    keySizeInBits: number
  ): AsyncResult<SecureBytes>;

  // ─── Authenticated Encryption ───────────────────────────────────

  /** @command */
  encryptAuthenticated(
    data: SecureBytes,
    keyIdentifier: string,
    associatedData: SecureBytes | null
  ): AsyncResult<SecureBytes>;

  /** @command */
  decryptAuthenticated(
    data: SecureBytes,
    keyIdentifier: string,
    associatedData: SecureBytes | null
  ): AsyncResult<SecureBytes>;

  // ─── Signatures ─────────────────────────────────────────────────

  /** @command */
  generateSignature(
    data: SecureBytes,
    keyIdentifier: string,
    algorithm: string
  ): AsyncResult<SecureBytes>;

  /** @command */
  verifySignature(
    signature: SecureBytes,
    data: SecureBytes,
    keyIdentifier: string,
    algorithm: string
  ): AsyncResult<boolean>;

  // ─── Backup ─────────────────────────────────────────────────────

  /** @command */
  createSecureBackup(password: SecureBytes): AsyncResult<SecureBytes>;

  /** @command */
  restoreFromSecureBackup(
    backup: SecureBytes,
    password: SecureBytes
  ): AsyncResult<void>;

  // ─── Service Lifecycle ──────────────────────────────────────────

  /** @command */
  resetService(): AsyncResult<void>;

  /** @query */
  getDiagnosticInfo(): AsyncResult<DiagnosticInfo>;

  /** @query */
  getConfiguration(): AsyncResult<ServiceConfiguration>;

  /** @command */
  setConfiguration(configuration: ServiceConfiguration): AsyncResult<void>;

  /** @query */
  getMetrics(): AsyncResult<ServiceMetrics>;

  /**
   * @query
   * @description Same snapshot as `status()`, named for the Complete tier.
   */
  getServiceStatus(): AsyncResult<ServiceStatus>;

  // ─── General Secure Operation ───────────────────────────────────

  /**
   * @command
   * @description The service's general-purpose primitive, e.g.
   * `deriveSharedSecret` over two stored keys.
   */
  performSecureOperation(
    operation: string,
    inputs: readonly SecureBytes[],
    options: Readonly<Record<string, string>>
  ): AsyncResult<SecureBytes>;
}
