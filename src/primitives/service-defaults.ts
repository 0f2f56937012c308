/**
 * @module primitives/service-defaults
 * @description Default behavior of each capability tier and the
 * conveniences built on the tier primitives.
 *
 * - `BasicServiceDefaults` / `StandardServiceDefaults`: base classes for
 *   services implemented in-process. Unoverridden operations return
 *   `notImplemented`.
 * - `CompleteServiceDefaults`: lifts any Standard service to the Complete
 *   interface. Standard operations are forwarded; Complete operations return
 *   `notImplemented` until a subclass overrides them, so callers can
 *   feature-detect.
 */

import type { IBasicSecurityService } from "../interfaces/basic-service.js";
import type { IStandardSecurityService } from "../interfaces/standard-service.js";
import type { ICompleteSecurityService } from "../interfaces/complete-service.js";
import type { ProtocolIdentifier } from "../types/branded.js";
import { nowMillis } from "../types/branded.js";
import type { AsyncResult, Result } from "../types/result.js";
import { err, ok } from "../types/result.js";
import { SecurityErrors, describeSecurityError } from "../types/errors.js";
import type { SecureBytes } from "../types/secure-bytes.js";
import { DEFAULT_NAMESPACE, protocolIdentifiers } from "../types/protocol.js";
import type {
  DiagnosticInfo,
  KeyFormat,
  KeyGenerationRequest,
  KeyImportRequest,
  KeyMetadata,
  PasswordDerivationParameters,
  ServiceConfiguration,
  ServiceMetrics,
  ServiceState,
  ServiceStatus,
} from "../types/service.js";

function notImplemented<T>(reason: string): Promise<Result<T>> {
  return Promise.resolve(err(SecurityErrors.notImplemented(reason)));
}

// ─── Conveniences ───────────────────────────────────────────────────

/** Encrypt with the service's default key. */
export function encrypt(
  service: IStandardSecurityService,
  data: SecureBytes
): AsyncResult<SecureBytes> {
  return service.encryptSecureData(data, null);
}

/** Decrypt with the service's default key. */
export function decrypt(
  service: IStandardSecurityService,
  data: SecureBytes
): AsyncResult<SecureBytes> {
  return service.decryptSecureData(data, null);
}

/** Standard-tier liveness probe; the Basic `ping`. */
export function pingStandard(service: IStandardSecurityService): AsyncResult<boolean> {
  return service.ping();
}

/**
 * Build a frozen status snapshot. A failed version query leaves `version`
 * out and is described under `details.versionError`.
 */
export function composeStatus(
  protocolIdentifier: ProtocolIdentifier,
  version: Result<string>,
  state: ServiceState = "operational",
  details: Readonly<Record<string, string>> = {}
): ServiceStatus {
  const reported = version.ok ? { version: version.value } : {};
  const versionError: Readonly<Record<string, string>> = version.ok
    ? {}
    : { versionError: describeSecurityError(version.error) };
  return Object.freeze({
    reachable: true,
    protocolIdentifier,
    ...reported,
    state,
    timestampMs: nowMillis(),
    details: Object.freeze({ ...details, ...versionError }),
  });
}

// ─── Basic ──────────────────────────────────────────────────────────

export abstract class BasicServiceDefaults implements IBasicSecurityService {
  constructor(protected readonly namespace: string = DEFAULT_NAMESPACE) {}

  identify(): ProtocolIdentifier {
    return protocolIdentifiers(this.namespace).basic;
  }

  async ping(): AsyncResult<boolean> {
    return ok(true);
  }

  synchroniseKeys(_syncData: SecureBytes): AsyncResult<void> {
    return notImplemented("Key synchronisation not implemented");
  }
}

// ─── Standard ───────────────────────────────────────────────────────

export abstract class StandardServiceDefaults
  extends BasicServiceDefaults
  implements IStandardSecurityService
{
  override identify(): ProtocolIdentifier {
    return protocolIdentifiers(this.namespace).standard;
  }

  generateRandomData(_length: number): AsyncResult<SecureBytes> {
    return notImplemented("Random data generation not implemented");
  }

  encryptSecureData(
    _data: SecureBytes,
    _keyIdentifier: string | null
  ): AsyncResult<SecureBytes> {
    return notImplemented("Encryption not implemented");
  }

  decryptSecureData(
    _data: SecureBytes,
    _keyIdentifier: string | null
  ): AsyncResult<SecureBytes> {
    return notImplemented("Decryption not implemented");
  }

  hash(_data: SecureBytes): AsyncResult<SecureBytes> {
    return notImplemented("Hashing not implemented");
  }

  sign(_data: SecureBytes, _keyIdentifier: string): AsyncResult<SecureBytes> {
    return notImplemented("Signing not implemented");
  }

  verify(
    _signature: SecureBytes,
    _data: SecureBytes,
    _keyIdentifier: string
  ): AsyncResult<boolean> {
    return notImplemented("Verification not implemented");
  }

  resetSecurity(): AsyncResult<void> {
    return notImplemented("Security reset not implemented");
  }

  getServiceVersion(): AsyncResult<string> {
    return notImplemented("Version reporting not implemented");
  }

  getHardwareIdentifier(): AsyncResult<string> {
    return notImplemented("Hardware identifier not implemented");
  }

  async status(): AsyncResult<ServiceStatus> {
    return ok(composeStatus(this.identify(), await this.getServiceVersion()));
  }
}

// ─── Complete ───────────────────────────────────────────────────────

/**
 * Complete-tier view of a Standard service.
 *
 * @example
 * ```ts
 * const complete = withCompleteDefaults(new StandardSecurityAdapter(connection));
 * const key = await complete.generateKey({ keyType: "symmetric" });
 * if (!key.ok && key.error.kind === "notImplemented") {
 *   // fall back to a Standard-tier flow
 * }
 * ```
 */
export class CompleteServiceDefaults implements ICompleteSecurityService {
  constructor(protected readonly standard: IStandardSecurityService) {}

  // ─── Forwarded Standard Tier ────────────────────────────────────

  identify(): ProtocolIdentifier {
    return this.standard.identify();
  }

  ping(): AsyncResult<boolean> {
    return this.standard.ping();
  }

  synchroniseKeys(syncData: SecureBytes): AsyncResult<void> {
    return this.standard.synchroniseKeys(syncData);
  }

  generateRandomData(length: number): AsyncResult<SecureBytes> {
    return this.standard.generateRandomData(length);
  }

  encryptSecureData(
    data: SecureBytes,
    keyIdentifier: string | null
  ): AsyncResult<SecureBytes> {
    return this.standard.encryptSecureData(data, keyIdentifier);
  }

  decryptSecureData(
    data: SecureBytes,
    keyIdentifier: string | null
  ): AsyncResult<SecureBytes> {
    return this.standard.decryptSecureData(data, keyIdentifier);
  }

  hash(data: SecureBytes): AsyncResult<SecureBytes> {
    return this.standard.hash(data);
  }

  sign(data: SecureBytes, keyIdentifier: string): AsyncResult<SecureBytes> {
    return this.standard.sign(data, keyIdentifier);
  }

  verify(
    signature: SecureBytes,
    data: SecureBytes,
    keyIdentifier: string
  ): AsyncResult<boolean> {
    return this.standard.verify(signature, data, keyIdentifier);
  }

  resetSecurity(): AsyncResult<void> {
    return this.standard.resetSecurity();
  }

  getServiceVersion(): AsyncResult<string> {
    return this.standard.getServiceVersion();
  }

  getHardwareIdentifier(): AsyncResult<string> {
    return this.standard.getHardwareIdentifier();
  }

  status(): AsyncResult<ServiceStatus> {
    return this.standard.status();
  }

  // ─── Complete Tier ──────────────────────────────────────────────

  generateKey(_request: KeyGenerationRequest): AsyncResult<string> {
    return notImplemented("Key generation not implemented");
  }

  importKey(_keyData: SecureBytes, _request: KeyImportRequest): AsyncResult<string> {
    return notImplemented("Key import not implemented");
  }

  exportKey(_keyIdentifier: string, _format: KeyFormat): AsyncResult<SecureBytes> {
    return notImplemented("Key export not implemented");
  }

  deleteKey(_keyIdentifier: string): AsyncResult<void> {
    return notImplemented("Key deletion not implemented");
  }

  listKeyIdentifiers(): AsyncResult<readonly string[]> {
    return notImplemented("Key listing not implemented");
  }

  getKeyMetadata(_keyIdentifier: string): AsyncResult<KeyMetadata> {
    return notImplemented("Key metadata not implemented");
  }

  deriveKeyFromPassword(
    _password: SecureBytes,
    _parameters: PasswordDerivationParameters
  ): AsyncResult<SecureBytes> {
    return notImplemented("Password key derivation not implemented");
  }

  deriveKeyFromKey(
    _sourceKeyIdentifier: string,
    _algorithm: string,
    _keySizeInBits: number
  ): AsyncResult<SecureBytes> {
    return notImplemented("Key derivation not implemented");
  }

  encryptAuthenticated(
    _data: SecureBytes,
    _keyIdentifier: string,
    _associatedData: SecureBytes | null
  ): AsyncResult<SecureBytes> {
    return notImplemented("Authenticated encryption not implemented");
  }

  decryptAuthenticated(
    _data: SecureBytes,
    _keyIdentifier: string,
    _associatedData: SecureBytes | null
  ): AsyncResult<SecureBytes> {
    return notImplemented("Authenticated decryption not implemented");
  }

  generateSignature(
    _data: SecureBytes,
    _keyIdentifier: string,
    _algorithm: string
  ): AsyncResult<SecureBytes> {
    return notImplemented("Signature generation not implemented");
  }

  verifySignature(
    _signature: SecureBytes,
    _data: SecureBytes,
    _keyIdentifier: string,
    _algorithm: string
  ): AsyncResult<boolean> {
    return notImplemented("Signature verification not implemented");
  }

  createSecureBackup(_password: SecureBytes): AsyncResult<SecureBytes> {
    return notImplemented("Secure backup not implemented");
  }

  restoreFromSecureBackup(
    _backup: SecureBytes,
    _password: SecureBytes
  ): AsyncResult<void> {
    return notImplemented("Secure restore not implemented");
  }

  resetService(): AsyncResult<void> {
    return notImplemented("Service reset not implemented");
  }

  getDiagnosticInfo(): AsyncResult<DiagnosticInfo> {
    return notImplemented("Diagnostics not implemented");
  }

  getConfiguration(): AsyncResult<ServiceConfiguration> {
    return notImplemented("Configuration retrieval not implemented");
  }

  setConfiguration(_configuration: ServiceConfiguration): AsyncResult<void> {
    return notImplemented("Configuration update not implemented");
  }

  getMetrics(): AsyncResult<ServiceMetrics> {
    return notImplemented("Metrics not implemented");
  }

  getServiceStatus(): AsyncResult<ServiceStatus> {
    return this.standard.status();
  }

  performSecureOperation(
    _operation: string,
    _inputs: readonly SecureBytes[],
    _options: Readonly<Record<string, string>>
  ): AsyncResult<SecureBytes> {
    return notImplemented("Secure operation not implemented");
  }
}

/** Lift a Standard service to the Complete interface. */
export function withCompleteDefaults(
  standard: IStandardSecurityService
): ICompleteSecurityService {
  return new CompleteServiceDefaults(standard);
}
