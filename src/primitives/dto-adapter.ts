/**
 * @module primitives/dto-adapter
 * @description DTO adapters: re-express a native service through the
 * OperationResult envelope.
 *
 * Each tier's DTO adapter wraps the native service of that tier and holds
 * the next lower DTO adapter over the same service, mirroring the native
 * adapters' composition. Parameters that the native operations take
 * positionally are read from `SecurityConfig.options` here.
 *
 * A wrapped service that throws instead of returning a Result is
 * classified like any other failure.
 */

import type { IBasicSecurityService } from "../interfaces/basic-service.js";
import type { IStandardSecurityService } from "../interfaces/standard-service.js";
import type { ICompleteSecurityService } from "../interfaces/complete-service.js";
import type {
  IBasicSecurityDTOService,
  ICompleteSecurityDTOService,
  IStandardSecurityDTOService,
} from "../interfaces/dto-service.js";
import type { ProtocolIdentifier } from "../types/branded.js";
import { brand } from "../types/branded.js";
import type { AsyncResult, Result } from "../types/result.js";
import { andThen, err, ok } from "../types/result.js";
import { SecurityErrors } from "../types/errors.js";
import { SecureBytes } from "../types/secure-bytes.js";
import type { OperationResult, SecurityConfig } from "../types/dto.js";
import { ConfigOption } from "../types/dto.js";
import type {
  DiagnosticInfo,
  KeyFormat,
  KeyMetadata,
  KeyType,
  ServiceConfiguration,
  ServiceMetrics,
  ServiceStatus,
} from "../types/service.js";
import { DEFAULT_DERIVATION_ITERATIONS } from "../types/service.js";
import { classify } from "../codec/error-mapper.js";
import { toOperationResult } from "../codec/dto.js";

type DTOResult<T> = Promise<OperationResult<T>>;

// ─── Envelope ───────────────────────────────────────────────────────

/**
 * Run a native operation and wrap its outcome, classifying a throw.
 */
export async function settle<T>(
  operation: () => AsyncResult<T>
): DTOResult<T> {
  let result: Result<T>;
  try {
    result = await operation();
  } catch (cause) {
    result = err(classify(cause));
  }
  return toOperationResult(result);
}

/**
 * Run `next` on a locally parsed option; a parse failure settles without
 * a call.
 */
function settleWith<T, U>(
  parsed: Result<T>,
  next: (value: T) => AsyncResult<U>
): DTOResult<U> {
  return settle(() => andThen(parsed, next));
}

// ─── Option Readers ─────────────────────────────────────────────────

export function keyIdentifierOption(config: SecurityConfig): string | null {
  return config.options[ConfigOption.keyIdentifier] ?? null;
}

export function requireKeyIdentifierOption(config: SecurityConfig): Result<string> {
  const keyIdentifier = keyIdentifierOption(config);
  return keyIdentifier
    ? ok(keyIdentifier)
    : err(SecurityErrors.invalidInput("Missing keyIdentifier option"));
}

export function iterationsOption(config: SecurityConfig): Result<number> {
  const raw = config.options[ConfigOption.iterations];
  if (raw === undefined) return ok(DEFAULT_DERIVATION_ITERATIONS);
  const iterations = Number(raw);
  return Number.isInteger(iterations) && iterations > 0
    ? ok(iterations)
    : err(SecurityErrors.invalidInput(`Invalid iterations option: ${raw}`));
}

export function hexOption(
  config: SecurityConfig,
  name: string
): Result<SecureBytes | null> {
  const raw = config.options[name];
  if (raw === undefined) return ok(null);
  const bytes = SecureBytes.fromHex(raw);
  return bytes
    ? ok(bytes)
    : err(SecurityErrors.invalidInput(`Option ${name} is not hex encoded`));
}

const KEY_TYPES: readonly KeyType[] = ["symmetric", "asymmetric", "hmac"];
const KEY_FORMATS: readonly KeyFormat[] = ["raw", "pkcs8", "spki", "jwk"];

const ALGORITHM_KEY_TYPES: ReadonlyArray<readonly [RegExp, KeyType]> = [
  [/^(aes|chacha20)/i, "symmetric"],
  [/^(rsa|ecc|ec|ecdsa|ecdh|ed25519|x25519)/i, "asymmetric"],
  [/^hmac/i, "hmac"],
];

/**
 * Key type for a configuration: `options.keyType` when present, otherwise
 * inferred from the algorithm name (AES/ChaCha20 → symmetric,
 * RSA/EC → asymmetric, HMAC → hmac).
 */
export function keyTypeFor(config: SecurityConfig): Result<KeyType> {
  const declared = config.options[ConfigOption.keyType];
  if (declared !== undefined) {
    const keyType = KEY_TYPES.find((type) => type === declared);
    return keyType
      ? ok(keyType)
      : err(SecurityErrors.invalidKeyType(KEY_TYPES.join("|"), declared));
  }
  const match = ALGORITHM_KEY_TYPES.find(([pattern]) =>
    pattern.test(config.algorithm)
  );
  return match
    ? ok(match[1])
    : err(
        SecurityErrors.invalidInput(
          `Cannot infer a key type for algorithm ${config.algorithm}`
        )
      );
}

export function keyFormatOption(config: SecurityConfig): Result<KeyFormat> {
  const raw = config.options[ConfigOption.format] ?? "raw";
  const format = KEY_FORMATS.find((candidate) => candidate === raw);
  return format
    ? ok(format)
    : err(SecurityErrors.invalidInput(`Unsupported key format: ${raw}`));
}

function dtoIdentifier(native: ProtocolIdentifier): ProtocolIdentifier {
  return brand<"ProtocolIdentifier", string>(`${native}.dto`);
}

// ─── Basic ──────────────────────────────────────────────────────────

export class BasicSecurityDTOAdapter implements IBasicSecurityDTOService {
  constructor(private readonly service: IBasicSecurityService) {}

  identify(): ProtocolIdentifier {
    return dtoIdentifier(this.service.identify());
  }

  pingWithDTO(): DTOResult<boolean> {
    return settle(() => this.service.ping());
  }

  synchroniseKeysWithDTO(syncData: SecureBytes): DTOResult<void> {
    return settle(() => this.service.synchroniseKeys(syncData));
  }
}

// ─── Standard ───────────────────────────────────────────────────────

export class StandardSecurityDTOAdapter implements IStandardSecurityDTOService {
  private readonly basic: BasicSecurityDTOAdapter;

  constructor(private readonly service: IStandardSecurityService) {
    this.basic = new BasicSecurityDTOAdapter(service);
  }

  identify(): ProtocolIdentifier {
    return dtoIdentifier(this.service.identify());
  }

  pingWithDTO(): DTOResult<boolean> {
    return this.basic.pingWithDTO();
  }

  synchroniseKeysWithDTO(syncData: SecureBytes): DTOResult<void> {
    return this.basic.synchroniseKeysWithDTO(syncData);
  }

  generateRandomDataWithDTO(length: number): DTOResult<SecureBytes> {
    return settle(() => this.service.generateRandomData(length));
  }

  encryptSecureDataWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return settle(() =>
      this.service.encryptSecureData(data, keyIdentifierOption(config))
    );
  }

  decryptSecureDataWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return settle(() =>
      this.service.decryptSecureData(data, keyIdentifierOption(config))
    );
  }

  hashWithDTO(data: SecureBytes): DTOResult<SecureBytes> {
    return settle(() => this.service.hash(data));
  }

  signWithDTO(data: SecureBytes, config: SecurityConfig): DTOResult<SecureBytes> {
    return settleWith(requireKeyIdentifierOption(config), (keyIdentifier) =>
      this.service.sign(data, keyIdentifier)
    );
  }

  verifyWithDTO(
    signature: SecureBytes,
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<boolean> {
    return settleWith(requireKeyIdentifierOption(config), (keyIdentifier) =>
      this.service.verify(signature, data, keyIdentifier)
    );
  }

  resetSecurityWithDTO(): DTOResult<void> {
    return settle(() => this.service.resetSecurity());
  }

  getServiceVersionWithDTO(): DTOResult<string> {
    return settle(() => this.service.getServiceVersion());
  }

  getHardwareIdentifierWithDTO(): DTOResult<string> {
    return settle(() => this.service.getHardwareIdentifier());
  }

  statusWithDTO(): DTOResult<ServiceStatus> {
    return settle(() => this.service.status());
  }
}

// ─── Complete ───────────────────────────────────────────────────────

/**
 * CompleteSecurityDTOAdapter
 *
 * @example
 * ```ts
 * const dto = new CompleteSecurityDTOAdapter(new CompleteSecurityAdapter(connection));
 * const key = await dto.generateKeyWithDTO(
 *   createSecurityConfig({ algorithm: "AES-GCM", keySizeInBits: 256 })
 * );
 * if (key.status === "failure") console.log(key.errorCode, key.errorMessage);
 * ```
 */
export class CompleteSecurityDTOAdapter implements ICompleteSecurityDTOService {
  private readonly standard: StandardSecurityDTOAdapter;

  constructor(private readonly service: ICompleteSecurityService) {
    this.standard = new StandardSecurityDTOAdapter(service);
  }

  identify(): ProtocolIdentifier {
    return dtoIdentifier(this.service.identify());
  }

  // ─── Forwarded Lower Tiers ──────────────────────────────────────

  pingWithDTO(): DTOResult<boolean> {
    return this.standard.pingWithDTO();
  }

  synchroniseKeysWithDTO(syncData: SecureBytes): DTOResult<void> {
    return this.standard.synchroniseKeysWithDTO(syncData);
  }

  generateRandomDataWithDTO(length: number): DTOResult<SecureBytes> {
    return this.standard.generateRandomDataWithDTO(length);
  }

  encryptSecureDataWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return this.standard.encryptSecureDataWithDTO(data, config);
  }

  decryptSecureDataWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return this.standard.decryptSecureDataWithDTO(data, config);
  }

  hashWithDTO(data: SecureBytes): DTOResult<SecureBytes> {
    return this.standard.hashWithDTO(data);
  }

  signWithDTO(data: SecureBytes, config: SecurityConfig): DTOResult<SecureBytes> {
    return this.standard.signWithDTO(data, config);
  }

  verifyWithDTO(
    signature: SecureBytes,
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<boolean> {
    return this.standard.verifyWithDTO(signature, data, config);
  }

  resetSecurityWithDTO(): DTOResult<void> {
    return this.standard.resetSecurityWithDTO();
  }

  getServiceVersionWithDTO(): DTOResult<string> {
    return this.standard.getServiceVersionWithDTO();
  }

  getHardwareIdentifierWithDTO(): DTOResult<string> {
    return this.standard.getHardwareIdentifierWithDTO();
  }

  statusWithDTO(): DTOResult<ServiceStatus> {
    return this.standard.statusWithDTO();
  }

  // ─── Key Lifecycle ──────────────────────────────────────────────

  generateKeyWithDTO(config: SecurityConfig): DTOResult<string> {
    return settleWith(keyTypeFor(config), (keyType) =>
      this.service.generateKey({
        keyType,
        keySizeInBits: config.keySizeInBits,
        algorithm: config.algorithm,
        identifier: keyIdentifierOption(config) ?? undefined,
        purpose: config.options[ConfigOption.purpose],
      })
    );
  }

  importKeyWithDTO(keyData: SecureBytes, config: SecurityConfig): DTOResult<string> {
    const format = keyFormatOption(config);
    if (!format.ok) return Promise.resolve(toOperationResult<string>(format));
    return settleWith(keyTypeFor(config), (keyType) =>
      this.service.importKey(keyData, {
        keyType,
        identifier: keyIdentifierOption(config) ?? undefined,
        format: format.value,
        purpose: config.options[ConfigOption.purpose],
        temporary: config.options[ConfigOption.temporary] === "true",
      })
    );
  }

  exportKeyWithDTO(
    keyIdentifier: string,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return settleWith(keyFormatOption(config), (format) =>
      this.service.exportKey(keyIdentifier, format)
    );
  }

  deleteKeyWithDTO(keyIdentifier: string): DTOResult<void> {
    return settle(() => this.service.deleteKey(keyIdentifier));
  }

  listKeyIdentifiersWithDTO(): DTOResult<readonly string[]> {
    return settle(() => this.service.listKeyIdentifiers());
  }

  getKeyMetadataWithDTO(keyIdentifier: string): DTOResult<KeyMetadata> {
    return settle(() => this.service.getKeyMetadata(keyIdentifier));
  }

  // ─── Derivation ─────────────────────────────────────────────────

  deriveKeyFromPasswordWithDTO(
    password: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    const iterations = iterationsOption(config);
    if (!iterations.ok) return Promise.resolve(toOperationResult<SecureBytes>(iterations));
    return settleWith(hexOption(config, ConfigOption.salt), (salt) =>
      this.service.deriveKeyFromPassword(password, {
        salt: salt ?? SecureBytes.empty(),
        iterations: iterations.value,
        keySizeInBits: config.keySizeInBits,
        algorithm: config.algorithm,
      })
    );
  }

  deriveKeyFromKeyWithDTO(config: SecurityConfig): DTOResult<SecureBytes> {
    return settleWith(requireKeyIdentifierOption(config), (keyIdentifier) =>
      this.service.deriveKeyFromKey(
        keyIdentifier,
        config.algorithm,
        config.keySizeInBits
      )
    );
  }

  // ─── Authenticated Encryption ───────────────────────────────────

  encryptAuthenticatedWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return this.authenticated(config, (keyIdentifier, associatedData) =>
      this.service.encryptAuthenticated(data, keyIdentifier, associatedData)
    );
  }

  decryptAuthenticatedWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return this.authenticated(config, (keyIdentifier, associatedData) =>
      this.service.decryptAuthenticated(data, keyIdentifier, associatedData)
    );
  }

  // ─── Signatures ─────────────────────────────────────────────────

  generateSignatureWithDTO(
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return settleWith(requireKeyIdentifierOption(config), (keyIdentifier) =>
      this.service.generateSignature(data, keyIdentifier, config.algorithm)
    );
  }

  verifySignatureWithDTO(
    signature: SecureBytes,
    data: SecureBytes,
    config: SecurityConfig
  ): DTOResult<boolean> {
    return settleWith(requireKeyIdentifierOption(config), (keyIdentifier) =>
      this.service.verifySignature(signature, data, keyIdentifier, config.algorithm)
    );
  }

  // ─── Backup ─────────────────────────────────────────────────────

  createSecureBackupWithDTO(password: SecureBytes): DTOResult<SecureBytes> {
    return settle(() => this.service.createSecureBackup(password));
  }

  restoreFromSecureBackupWithDTO(
    backup: SecureBytes,
    password: SecureBytes
  ): DTOResult<void> {
    return settle(() => this.service.restoreFromSecureBackup(backup, password));
  }

  // ─── Service Lifecycle ──────────────────────────────────────────

  resetServiceWithDTO(): DTOResult<void> {
    return settle(() => this.service.resetService());
  }

  getDiagnosticInfoWithDTO(): DTOResult<DiagnosticInfo> {
    return settle(() => this.service.getDiagnosticInfo());
  }

  getConfigurationWithDTO(): DTOResult<ServiceConfiguration> {
    return settle(() => this.service.getConfiguration());
  }

  setConfigurationWithDTO(configuration: ServiceConfiguration): DTOResult<void> {
    return settle(() => this.service.setConfiguration(configuration));
  }

  getMetricsWithDTO(): DTOResult<ServiceMetrics> {
    return settle(() => this.service.getMetrics());
  }

  getServiceStatusWithDTO(): DTOResult<ServiceStatus> {
    return settle(() => this.service.getServiceStatus());
  }

  performSecureOperationWithDTO(
    operation: string,
    inputs: readonly SecureBytes[],
    config: SecurityConfig
  ): DTOResult<SecureBytes> {
    return settle(() =>
      this.service.performSecureOperation(operation, inputs, {
        ...config.options,
        algorithm: config.algorithm,
      })
    );
  }

  // ─── Internal ───────────────────────────────────────────────────

  private authenticated(
    config: SecurityConfig,
    run: (
      keyIdentifier: string,
      associatedData: SecureBytes | null
    ) => AsyncResult<SecureBytes>
  ): DTOResult<SecureBytes> {
    const associatedData = hexOption(config, ConfigOption.associatedData);
    if (!associatedData.ok) {
      return Promise.resolve(toOperationResult<SecureBytes>(associatedData));
    }
    return settleWith(requireKeyIdentifierOption(config), (keyIdentifier) =>
      run(keyIdentifier, associatedData.value)
    );
  }
}
