/**
 * @module interfaces/dto-service
 * @description The DTO protocol family: every native operation `x` has an
 * `xWithDTO` counterpart reporting through OperationResult and tuned by a
 * SecurityConfig. No connection type appears in these contracts.
 *
 * Option keys read from `SecurityConfig.options` are listed in
 * `ConfigOption` (types/dto).
 */

import type { ProtocolIdentifier } from "../types/branded.js";
import type {
  KeyExchangeParameters,
  OperationResult,
  SecurityConfig,
} from "../types/dto.js";
import type { SecureBytes } from "../types/secure-bytes.js";
import type {
  DiagnosticInfo,
  KeyMetadata,
  ServiceConfiguration,
  ServiceMetrics,
  ServiceStatus,
} from "../types/service.js";

type DTOResult<T> = Promise<OperationResult<T>>;

/**
 * @interface IBasicSecurityDTOService
 */
export interface IBasicSecurityDTOService {
  /** @query DTO identifier: the native identifier with a `.dto` suffix. */
  identify(): ProtocolIdentifier;

  /** @query */
  pingWithDTO(): DTOResult<boolean>;

  /** @command */
  synchroniseKeysWithDTO(syncData: SecureBytes): DTOResult<void>;
}

/**
 * @interface IStandardSecurityDTOService
 */
export interface IStandardSecurityDTOService extends IBasicSecurityDTOService {
  /** @command */
  generateRandomDataWithDTO(length: number): DTOResult<SecureBytes>;

  /**
   * @command
   * @description Uses `options.keyIdentifier` when present, the service's
   * default key otherwise.
   */
  encryptSecureDataWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes>;

  /** @command */
  decryptSecureDataWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes>;

  /** @command */
  hashWithDTO(data: SecureBytes): DTOResult<SecureBytes>;

  /** @command Requires `options.keyIdentifier`. */
  signWithDTO(data: SecureBytes, config: SecurityConfig): DTOResult<SecureBytes>;

  /** @command Requires `options.keyIdentifier`. */
  verifyWithDTO(
    signature: SecureBytes,
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<boolean>;

  /** @command */
  resetSecurityWithDTO(): DTOResult<void>;

  /** @query */
  getServiceVersionWithDTO(): DTOResult<string>;

  /** @query */
  getHardwareIdentifierWithDTO(): DTOResult<string>;

  /** @query */
  statusWithDTO(): DTOResult<ServiceStatus>;
}

/**
 * @interface ICompleteSecurityDTOService
 */
export interface ICompleteSecurityDTOService extends IStandardSecurityDTOService {
  // ─── Key Lifecycle ──────────────────────────────────────────────

  /**
   * @command
   * @description Key type comes from `options.keyType` or is inferred from
   * the algorithm name.
   */
  generateKeyWithDTO(config: SecurityConfig): DTOResult<string>;

  /** @command */
  importKeyWithDTO(keyData: SecureBytes, config: SecurityConfig): DTOResult<string>;

  /** @command Format from `options.format`, `raw` by default. */
  exportKeyWithDTO(keyIdentifier: string, config: SecurityConfig): DTOResult<SecureBytes>;

  /** @command */
  deleteKeyWithDTO(keyIdentifier: string): DTOResult<void>;

  /** @query */
  listKeyIdentifiersWithDTO(): DTOResult<readonly string[]>;

  /** @query */
  getKeyMetadataWithDTO(keyIdentifier: string): DTOResult<KeyMetadata>;

  // ─── Derivation ─────────────────────────────────────────────────

  /**
   * @command
   * @description Salt (hex) and iterations come from the options bag.
   */
  deriveKeyFromPasswordWithDTO(
    password: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes>;

  /** @command Requires `options.keyIdentifier` naming the source key. */
  deriveKeyFromKeyWithDTO(config: SecurityConfig): DTOResult<SecureBytes>;

  // ─── Authenticated Encryption ───────────────────────────────────

  /** @command Associated data (hex) from `options.associatedData`. */
  encryptAuthenticatedWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes>;

  /** @command */
  decryptAuthenticatedWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes>;

  // ─── Signatures ─────────────────────────────────────────────────

  /** @command Algorithm from `config.algorithm`. */
  generateSignatureWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes>;

  /** @command */
  verifySignatureWithDTO(
    signature: SecureBytes,
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<boolean>;

  // ─── Backup ─────────────────────────────────────────────────────

  /** @command */
  createSecureBackupWithDTO(password: SecureBytes): DTOResult<SecureBytes>;

  /** @command */
  restoreFromSecureBackupWithDTO(
    backup: SecureBytes,
    password: SecureBytes
  ): DTOResult<void>;

  // ─── Service Lifecycle ──────────────────────────────────────────

  /** @command */
  resetServiceWithDTO(): DTOResult<void>;

  /** @query */
  getDiagnosticInfoWithDTO(): DTOResult<DiagnosticInfo>;

  /** @query */
  getConfigurationWithDTO(): DTOResult<ServiceConfiguration>;

  /** @command */
  setConfigurationWithDTO(configuration: ServiceConfiguration): DTOResult<void>;

  /** @query */
  getMetricsWithDTO(): DTOResult<ServiceMetrics>;

  /** @query */
  getServiceStatusWithDTO(): DTOResult<ServiceStatus>;

  /** @command */
  performSecureOperationWithDTO(
    operation: string,
    inputs: readonly SecureBytes[],
    config: SecurityConfig
  ): DTOResult<SecureBytes>;
}

/**
 * @interface IKeyExchangeDTOService
 * @description Key-exchange composition over the Complete DTO tier.
 */
export interface IKeyExchangeDTOService {
  /**
   * @command
   * @description Generate a public/private parameter pair. Temporary keys
   * registered on the way are deleted before returning.
   */
  generateKeyExchangeParametersWithDTO(
    config: SecurityConfig
  ): DTOResult<KeyExchangeParameters>;

  /**
   * @command
   * @description Derive the shared value of a parameter pair. Temporary
   * keys registered on the way are deleted on every path.
   */
  calculateSharedSecretWithDTO(
    publicKey: SecureBytes,
    privateKey: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes>;
}
