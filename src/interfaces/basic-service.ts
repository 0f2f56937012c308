/**
 * @module interfaces/basic-service
 * @description IBasicSecurityService: the minimal capability tier:
 * identification, liveness and key-material synchronisation.
 */

import type { ProtocolIdentifier } from "../types/branded.js";
import type { AsyncResult } from "../types/result.js";
import type { SecureBytes } from "../types/secure-bytes.js";

/**
 * @interface IBasicSecurityService
 * @description Stateless contract every security service offers.
 */
export interface IBasicSecurityService {
  /**
   * @query
   * @description Stable identifier of the contract this object implements,
   * used for negotiation.
   */
  identify(): ProtocolIdentifier;

  /**
   * @query
   * @description Liveness probe.
   * @returns true when the service answered.
   */
  ping(): AsyncResult<boolean>;

  /**
   * @command
   * @description Push key material to the remote side. Zero-length input is
   * forwarded as is; only the remote side may reject it.
   */
  synchroniseKeys(syncData: SecureBytes): AsyncResult<void>;
}
