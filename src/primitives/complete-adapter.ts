/**
 * @module primitives/complete-adapter
 * @description Complete-tier capability adapter. Holds one Standard adapter
 * over the same invoker and forwards every Standard and Basic operation to
 * it; the Complete operations map one-to-one onto remote operations.
 *
 * `verifySignature` takes four logical parameters and therefore travels as
 * a single parameter bag.
 */

import { z } from "zod";
import type { ICompleteSecurityService } from "../interfaces/complete-service.js";
import type { ProtocolIdentifier } from "../types/branded.js";
import type { AsyncResult } from "../types/result.js";
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
  ServiceStatus,
} from "../types/service.js";
import { DEFAULT_KEY_BITS } from "../types/service.js";
import {
  interpretBytesReply,
  interpretValueReply,
  interpretVoidReply,
  toOptionalRawBuffer,
  toParameterBag,
  toRawBuffer,
} from "../codec/marshaling.js";
import { StandardSecurityAdapter } from "./standard-adapter.js";
import type { SecurityAdapterOptions } from "./basic-adapter.js";
import type {
  BoundInvoker,
  InvokerSource,
  RemoteInvoker,
} from "./remote-invoker.js";
import { bindInvoker, releaseInvoker } from "./remote-invoker.js";
import {
  firstFailure,
  rejected,
  requireData,
  requireKeyIdentifier,
  requirePositiveInteger,
  requireText,
} from "./validation.js";

// ─── Reply Schemas ──────────────────────────────────────────────────

const keyIdentifierSchema = z.string().min(1);

export const keyMetadataSchema = z.object({
  identifier: z.string(),
  keyType: z.enum(["symmetric", "asymmetric", "hmac"]),
  algorithm: z.string(),
  keySizeInBits: z.number().int().nonnegative(),
  createdAtMs: z.number(),
  attributes: z.record(z.string()).default({}),
});

const stringMapSchema = z.record(z.string());
const metricsSchema = z.record(z.number());

export class CompleteSecurityAdapter implements ICompleteSecurityService {
  private readonly bound: BoundInvoker;
  private readonly standard: StandardSecurityAdapter;
  private readonly namespace: string;

  constructor(source: InvokerSource, options: SecurityAdapterOptions = {}) {
    this.bound = bindInvoker(source, options);
    this.standard = new StandardSecurityAdapter(this.bound.invoker, options);
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
  }

  get invoker(): RemoteInvoker {
    return this.bound.invoker;
  }

  identify(): ProtocolIdentifier {
    return protocolIdentifiers(this.namespace).complete;
  }

  // ─── Forwarded Lower Tiers ──────────────────────────────────────

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

  // ─── Key Lifecycle ──────────────────────────────────────────────

  generateKey(request: KeyGenerationRequest): AsyncResult<string> {
    const keySizeInBits = request.keySizeInBits ?? DEFAULT_KEY_BITS[request.keyType];
    const invalid = requirePositiveInteger(keySizeInBits, "keySizeInBits");
    if (invalid) return rejected(invalid);
    const bag = toParameterBag({
      keyType: request.keyType,
      keySizeInBits,
      algorithm: request.algorithm,
      identifier: request.identifier,
      purpose: request.purpose,
    });
    return this.invoker.call("generateKey", [bag], (reply) =>
      interpretValueReply(reply, keyIdentifierSchema)
    );
  }

  importKey(keyData: SecureBytes, request: KeyImportRequest): AsyncResult<string> {
    const invalid = requireData(keyData, "Cannot import empty key data");
    if (invalid) return rejected(invalid);
    const bag = toParameterBag({
      keyType: request.keyType,
      identifier: request.identifier,
      format: request.format,
      purpose: request.purpose,
      temporary: request.temporary,
    });
    return this.invoker.call("importKey", [toRawBuffer(keyData), bag], (reply) =>
      interpretValueReply(reply, keyIdentifierSchema)
    );
  }

  exportKey(keyIdentifier: string, format: KeyFormat): AsyncResult<SecureBytes> {
    const invalid = requireKeyIdentifier(keyIdentifier);
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "exportKey",
      [keyIdentifier, format],
      interpretBytesReply
    );
  }

  deleteKey(keyIdentifier: string): AsyncResult<void> {
    const invalid = requireKeyIdentifier(keyIdentifier);
    if (invalid) return rejected(invalid);
    return this.invoker.call("deleteKey", [keyIdentifier], interpretVoidReply);
  }

  listKeyIdentifiers(): AsyncResult<readonly string[]> {
    return this.invoker.call("listKeyIdentifiers", [], (reply) =>
      interpretValueReply(reply, z.array(z.string()))
    );
  }

  getKeyMetadata(keyIdentifier: string): AsyncResult<KeyMetadata> {
    const invalid = requireKeyIdentifier(keyIdentifier);
    if (invalid) return rejected(invalid);
    return this.invoker.call("getKeyMetadata", [keyIdentifier], (reply) =>
      interpretValueReply(reply, keyMetadataSchema)
    );
  }

  // ─── Derivation ─────────────────────────────────────────────────

  deriveKeyFromPassword(
    password: SecureBytes,
    parameters: PasswordDerivationParameters
  ): AsyncResult<SecureBytes> {
    const invalid = firstFailure(
      requireData(password, "Cannot derive a key from an empty password"),
      requirePositiveInteger(parameters.iterations, "iterations"),
      requirePositiveInteger(parameters.keySizeInBits, "keySizeInBits")
    );
    if (invalid) return rejected(invalid);
    const bag = toParameterBag({
      salt: toRawBuffer(parameters.salt),
      iterations: parameters.iterations,
      keySizeInBits: parameters.keySizeInBits,
      algorithm: parameters.algorithm,
    });
    return this.invoker.call(
      "deriveKeyFromPassword",
      [toRawBuffer(password), bag],
      interpretBytesReply
    );
  }

  deriveKeyFromKey(
    sourceKeyIdentifier: string,
    algorithm: string,
    keySizeInBits: number
  ): AsyncResult<SecureBytes> {
    const invalid = firstFailure(
      requireKeyIdentifier(sourceKeyIdentifier),
      requireText(algorithm, "algorithm"),
      requirePositiveInteger(keySizeInBits, "keySizeInBits")
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "deriveKeyFromKey",
      [sourceKeyIdentifier, algorithm, keySizeInBits],
      interpretBytesReply
    );
  }

  // ─── Authenticated Encryption ───────────────────────────────────

  encryptAuthenticated(
    data: SecureBytes,
    keyIdentifier: string,
    associatedData: SecureBytes | null
  ): AsyncResult<SecureBytes> {
    const invalid = firstFailure(
      requireData(data, "Cannot encrypt empty data"),
      requireKeyIdentifier(keyIdentifier)
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "encryptAuthenticated",
      [toRawBuffer(data), keyIdentifier, toOptionalRawBuffer(associatedData)],
      interpretBytesReply
    );
  }

  decryptAuthenticated(
    data: SecureBytes,
    keyIdentifier: string,
    associatedData: SecureBytes | null
  ): AsyncResult<SecureBytes> {
    const invalid = firstFailure(
      requireData(data, "Cannot decrypt empty data"),
      requireKeyIdentifier(keyIdentifier)
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "decryptAuthenticated",
      [toRawBuffer(data), keyIdentifier, toOptionalRawBuffer(associatedData)],
      interpretBytesReply
    );
  }

  // ─── Signatures ─────────────────────────────────────────────────

  generateSignature(
    data: SecureBytes,
    keyIdentifier: string,
    algorithm: string
  ): AsyncResult<SecureBytes> {
    const invalid = firstFailure(
      requireData(data, "Cannot sign empty data"),
      requireKeyIdentifier(keyIdentifier),
      requireText(algorithm, "algorithm")
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "generateSignature",
      [toRawBuffer(data), keyIdentifier, algorithm],
      interpretBytesReply
    );
  }

  verifySignature(
    signature: SecureBytes,
    data: SecureBytes,
    keyIdentifier: string,
    algorithm: string
  ): AsyncResult<boolean> {
    const invalid = firstFailure(
      requireData(signature, "Cannot verify an empty signature"),
      requireKeyIdentifier(keyIdentifier),
      requireText(algorithm, "algorithm")
    );
    if (invalid) return rejected(invalid);
    const bag = toParameterBag({
      signature: toRawBuffer(signature),
      data: toRawBuffer(data),
      keyIdentifier,
      algorithm,
    });
    return this.invoker.call("verifySignature", [bag], (reply) =>
      interpretValueReply(reply, z.boolean())
    );
  }

  // ─── Backup ─────────────────────────────────────────────────────

  createSecureBackup(password: SecureBytes): AsyncResult<SecureBytes> {
    const invalid = requireData(password, "Cannot protect a backup with an empty password");
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "createSecureBackup",
      [toRawBuffer(password)],
      interpretBytesReply
    );
  }

  restoreFromSecureBackup(
    backup: SecureBytes,
    password: SecureBytes
  ): AsyncResult<void> {
    const invalid = firstFailure(
      requireData(backup, "Cannot restore an empty backup"),
      requireData(password, "Cannot restore a backup with an empty password")
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "restoreSecureBackup",
      [toRawBuffer(backup), toRawBuffer(password)],
      interpretVoidReply
    );
  }

  // ─── Service Lifecycle ──────────────────────────────────────────

  resetService(): AsyncResult<void> {
    return this.invoker.call("resetService", [], interpretVoidReply);
  }

  getDiagnosticInfo(): AsyncResult<DiagnosticInfo> {
    return this.invoker.call("getDiagnosticInfo", [], (reply) =>
      interpretValueReply(reply, stringMapSchema)
    );
  }

  getConfiguration(): AsyncResult<ServiceConfiguration> {
    return this.invoker.call("getConfiguration", [], (reply) =>
      interpretValueReply(reply, stringMapSchema)
    );
  }

  setConfiguration(configuration: ServiceConfiguration): AsyncResult<void> {
    return this.invoker.call(
      "setConfiguration",
      [toParameterBag(configuration)],
      interpretVoidReply
    );
  }

  getMetrics(): AsyncResult<ServiceMetrics> {
    return this.invoker.call("getMetrics", [], (reply) =>
      interpretValueReply(reply, metricsSchema)
    );
  }

  getServiceStatus(): AsyncResult<ServiceStatus> {
    return this.standard.status();
  }

  // ─── General Secure Operation ───────────────────────────────────

  performSecureOperation(
    operation: string,
    inputs: readonly SecureBytes[],
    options: Readonly<Record<string, string>>
  ): AsyncResult<SecureBytes> {
    const invalid = requireText(operation, "operation");
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "performSecureOperation",
      [operation, inputs.map(toRawBuffer), toParameterBag(options)],
      interpretBytesReply
    );
  }

  /** Invalidate the connection if this adapter owns it. */
  dispose(): void {
    releaseInvoker(this.bound, "Adapter disposed");
  }
}
