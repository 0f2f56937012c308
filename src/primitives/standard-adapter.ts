/**
 * @module primitives/standard-adapter
 * @description Standard-tier capability adapter. Holds one Basic adapter
 * over the same invoker and forwards the Basic operations to it.
 *
 * Empty payloads, empty key identifiers and out-of-range lengths are
 * rejected locally without a round trip.
 */

import { z } from "zod";
import type { IStandardSecurityService } from "../interfaces/standard-service.js";
import type { ProtocolIdentifier } from "../types/branded.js";
import type { AsyncResult, Result } from "../types/result.js";
import { err, mapResult, ok } from "../types/result.js";
import { SecurityErrors, isTransportFailure } from "../types/errors.js";
import type { SecureBytes } from "../types/secure-bytes.js";
import { DEFAULT_NAMESPACE, protocolIdentifiers } from "../types/protocol.js";
import type { ServiceStatus } from "../types/service.js";
import { serviceStateFromCode } from "../types/service.js";
import {
  interpretBytesReply,
  interpretValueReply,
  interpretVoidReply,
  toRawBuffer,
} from "../codec/marshaling.js";
import { DEFAULT_MAX_RANDOM_LENGTH } from "../config.js";
import { BasicSecurityAdapter } from "./basic-adapter.js";
import type { SecurityAdapterOptions } from "./basic-adapter.js";
import type {
  BoundInvoker,
  InvokerSource,
  RemoteInvoker,
} from "./remote-invoker.js";
import { bindInvoker, releaseInvoker } from "./remote-invoker.js";
import { composeStatus } from "./service-defaults.js";
import {
  firstFailure,
  requireData,
  requireKeyIdentifier,
  requireLength,
  rejected,
} from "./validation.js";

export class StandardSecurityAdapter implements IStandardSecurityService {
  private readonly bound: BoundInvoker;
  private readonly basic: BasicSecurityAdapter;
  private readonly namespace: string;
  private readonly maxRandomLength: number;

  constructor(source: InvokerSource, options: SecurityAdapterOptions = {}) {
    this.bound = bindInvoker(source, options);
    this.basic = new BasicSecurityAdapter(this.bound.invoker, options);
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
    this.maxRandomLength = options.maxRandomLength ?? DEFAULT_MAX_RANDOM_LENGTH;
  }

  get invoker(): RemoteInvoker {
    return this.bound.invoker;
  }

  // ─── Basic Tier ─────────────────────────────────────────────────

  identify(): ProtocolIdentifier {
    return protocolIdentifiers(this.namespace).standard;
  }

  ping(): AsyncResult<boolean> {
    return this.basic.ping();
  }

  synchroniseKeys(syncData: SecureBytes): AsyncResult<void> {
    return this.basic.synchroniseKeys(syncData);
  }

  // ─── Commands ───────────────────────────────────────────────────

  async generateRandomData(length: number): AsyncResult<SecureBytes> {
    const invalid = requireLength(length, this.maxRandomLength);
    if (invalid) return err(invalid);

    const result = await this.invoker.call(
      "generateRandomData",
      [length],
      interpretBytesReply
    );
    if (result.ok && result.value.length !== length) {
      return err(
        SecurityErrors.invalidData(
          `Expected ${length} random bytes, received ${result.value.length}`
        )
      );
    }
    return result;
  }

  encryptSecureData(
    data: SecureBytes,
    keyIdentifier: string | null
  ): AsyncResult<SecureBytes> {
    const invalid = firstFailure(
      requireData(data, "Cannot encrypt empty data"),
      requireKeyIdentifier(keyIdentifier)
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "encryptData",
      [toRawBuffer(data), keyIdentifier],
      interpretBytesReply
    );
  }

  decryptSecureData(
    data: SecureBytes,
    keyIdentifier: string | null
  ): AsyncResult<SecureBytes> {
    const invalid = firstFailure(
      requireData(data, "Cannot decrypt empty data"),
      requireKeyIdentifier(keyIdentifier)
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "decryptData",
      [toRawBuffer(data), keyIdentifier],
      interpretBytesReply
    );
  }

  hash(data: SecureBytes): AsyncResult<SecureBytes> {
    return this.invoker.call("hashData", [toRawBuffer(data)], interpretBytesReply);
  }

  sign(data: SecureBytes, keyIdentifier: string): AsyncResult<SecureBytes> {
    const invalid = firstFailure(
      requireData(data, "Cannot sign empty data"),
      requireKeyIdentifier(keyIdentifier)
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "signData",
      [toRawBuffer(data), keyIdentifier],
      interpretBytesReply
    );
  }

  verify(
    signature: SecureBytes,
    data: SecureBytes,
    keyIdentifier: string
  ): AsyncResult<boolean> {
    const invalid = firstFailure(
      requireData(signature, "Cannot verify an empty signature"),
      requireKeyIdentifier(keyIdentifier)
    );
    if (invalid) return rejected(invalid);
    return this.invoker.call(
      "verifyData",
      [toRawBuffer(signature), toRawBuffer(data), keyIdentifier],
      (reply) => interpretValueReply(reply, z.boolean())
    );
  }

  resetSecurity(): AsyncResult<void> {
    return this.invoker.call("resetSecurity", [], interpretVoidReply);
  }

  // ─── Queries ────────────────────────────────────────────────────

  getServiceVersion(): AsyncResult<string> {
    return this.invoker.call("getServiceVersion", [], (reply) =>
      interpretValueReply(reply, z.string())
    );
  }

  getHardwareIdentifier(): AsyncResult<string> {
    return this.invoker.call("getHardwareIdentifier", [], (reply) =>
      interpretValueReply(reply, z.string().min(1))
    );
  }

  /**
   * Version plus state code. Only a transport failure fails the snapshot:
   * a missing version is recorded in `details`, and a service that does not
   * report a state code is described as `unknown`.
   */
  async status(): AsyncResult<ServiceStatus> {
    const version = await this.getServiceVersion();
    if (!version.ok && isTransportFailure(version.error)) return version;

    const code = await this.getServiceStatusCode();
    if (!code.ok && code.error.kind !== "operationNotSupported") return code;

    const state = mapResult(code, serviceStateFromCode);
    return ok(
      composeStatus(
        this.identify(),
        version,
        state.ok ? state.value : "unknown",
        code.ok ? { statusCode: String(code.value) } : {}
      )
    );
  }

  /** Invalidate the connection if this adapter owns it. */
  dispose(): void {
    releaseInvoker(this.bound, "Adapter disposed");
  }

  // ─── Internal ───────────────────────────────────────────────────

  private getServiceStatusCode(): Promise<Result<number>> {
    return this.invoker.call("getServiceStatusCode", [], (reply) =>
      interpretValueReply(reply, z.number().int())
    );
  }
}
