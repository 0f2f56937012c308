/**
 * @module interfaces/standard-service
 * @description IStandardSecurityService: random data, symmetric
 * encryption, hashing, signing and status reporting on top of the Basic tier.
 *
 * Keyless encryption and the Standard-tier ping are conveniences built on
 * these primitives (see `encrypt`, `decrypt`, `pingStandard` in
 * primitives/service-defaults); they are not part of the interface so that
 * an implementation cannot diverge from the primitive.
 */

import type { AsyncResult } from "../types/result.js";
import type { SecureBytes } from "../types/secure-bytes.js";
import type { ServiceStatus } from "../types/service.js";
import type { IBasicSecurityService } from "./basic-service.js";

/**
 * @interface IStandardSecurityService
 */
export interface IStandardSecurityService extends IBasicSecurityService {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @param length - Non-negative integer byte count.
   * @returns Exactly `length` random bytes.
   */
  generateRandomData(length: number): AsyncResult<SecureBytes>;

  /**
   * @command
   * @param keyIdentifier - null selects the service's default key.
   */
  encryptSecureData(
    data: SecureBytes,
    keyIdentifier: string | null
  ): AsyncResult<SecureBytes>;

  /**
   * @command
   * @param keyIdentifier - null selects the service's default key.
   */
  decryptSecureData(
    data: SecureBytes,
    keyIdentifier: string | null
  ): AsyncResult<SecureBytes>;

  /** @command */
  hash(data: SecureBytes): AsyncResult<SecureBytes>;

  /** @command */
  sign(data: SecureBytes, keyIdentifier: string): AsyncResult<SecureBytes>;

  /** @command */
  verify(
    signature: SecureBytes,
    data: SecureBytes,
    keyIdentifier: string
  ): AsyncResult<boolean>;

  /**
   * @command
   * @description Ask the service to discard its session security state.
   */
  resetSecurity(): AsyncResult<void>;

  // ─── Queries ────────────────────────────────────────────────────

  /** @query */
  getServiceVersion(): AsyncResult<string>;

  /**
   * @query
   * @description Stable identifier of the machine the service runs on.
   */
  getHardwareIdentifier(): AsyncResult<string>;

  /**
   * @query
   * @description Snapshot of reachability, version and state. Created per
   * call and frozen.
   */
  status(): AsyncResult<ServiceStatus>;
}
