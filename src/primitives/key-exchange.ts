/**
 * @module primitives/key-exchange
 * @description Key exchange composed from the Complete DTO tier.
 *
 * Both flows register their byte blocks with the service as temporary keys,
 * work through the key-lifecycle operations, and delete every temporary key
 * they created before returning, whichever step failed.
 */

import { randomBytes } from "node:crypto";
import type {
  ICompleteSecurityDTOService,
  IKeyExchangeDTOService,
} from "../interfaces/dto-service.js";
import type {
  KeyExchangeParameters,
  OperationResult,
  SecurityConfig,
} from "../types/dto.js";
import { ConfigOption, operationSuccess, withOptions } from "../types/dto.js";
import { err } from "../types/result.js";
import type { SecureBytes } from "../types/secure-bytes.js";
import { classify } from "../codec/error-mapper.js";
import { isOperationSuccess, toOperationResult } from "../codec/dto.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export const KEY_EXCHANGE_PUBLIC_LENGTH = 16;
export const KEY_EXCHANGE_PRIVATE_LENGTH = 32;
export const SHARED_SECRET_OPERATION = "deriveSharedSecret";

export interface KeyExchangeOptions {
  readonly logger?: Logger;
  /** Source of temporary key identifiers. */
  readonly nextKeyIdentifier?: () => string;
}

function randomKeyIdentifier(): string {
  return `key-${randomBytes(8).toString("hex")}`;
}

export class KeyExchangeDTOAdapter implements IKeyExchangeDTOService {
  private readonly log: Logger;
  private readonly nextKeyIdentifier: () => string;

  constructor(
    private readonly service: ICompleteSecurityDTOService,
    options: KeyExchangeOptions = {}
  ) {
    this.log = options.logger ?? silentLogger;
    this.nextKeyIdentifier = options.nextKeyIdentifier ?? randomKeyIdentifier;
  }

  // ─── Commands ───────────────────────────────────────────────────

  async generateKeyExchangeParametersWithDTO(
    config: SecurityConfig
  ): Promise<OperationResult<KeyExchangeParameters>> {
    const created: string[] = [];
    try {
      const publicBlock = await this.service.generateRandomDataWithDTO(
        KEY_EXCHANGE_PUBLIC_LENGTH
      );
      if (!isOperationSuccess(publicBlock)) return publicBlock;
      const privateBlock = await this.service.generateRandomDataWithDTO(
        KEY_EXCHANGE_PRIVATE_LENGTH
      );
      if (!isOperationSuccess(privateBlock)) return privateBlock;

      const publicKey = await this.registerAndExport(
        publicBlock.value,
        "keyExchange.public",
        config,
        created
      );
      if (!isOperationSuccess(publicKey)) return publicKey;
      const privateKey = await this.registerAndExport(
        privateBlock.value,
        "keyExchange.private",
        config,
        created
      );
      if (!isOperationSuccess(privateKey)) return privateKey;

      return operationSuccess({
        publicKey: publicKey.value,
        privateKey: privateKey.value,
        algorithm: config.algorithm,
        parameters: Object.freeze({
          ...config.options,
          keySizeInBits: String(config.keySizeInBits),
        }),
      });
    } catch (cause) {
      return toOperationResult<KeyExchangeParameters>(err(classify(cause)));
    } finally {
      await this.release(created);
    }
  }

  async calculateSharedSecretWithDTO(
    publicKey: SecureBytes,
    privateKey: SecureBytes,
    config: SecurityConfig
  ): Promise<OperationResult<SecureBytes>> {
    const created: string[] = [];
    try {
      const publicId = await this.register(
        publicKey,
        "keyExchange.public",
        config,
        created
      );
      if (!isOperationSuccess(publicId)) return publicId;
      const privateId = await this.register(
        privateKey,
        "keyExchange.private",
        config,
        created
      );
      if (!isOperationSuccess(privateId)) return privateId;

      return await this.service.performSecureOperationWithDTO(
        SHARED_SECRET_OPERATION,
        [],
        withOptions(config, {
          publicKeyIdentifier: publicId.value,
          privateKeyIdentifier: privateId.value,
        })
      );
    } catch (cause) {
      return toOperationResult<SecureBytes>(err(classify(cause)));
    } finally {
      await this.release(created);
    }
  }

  // ─── Internal ───────────────────────────────────────────────────

  /**
   * Import `keyData` as a temporary key. The identifier the service assigns
   * is appended to `created` before anything else can fail.
   */
  private async register(
    keyData: SecureBytes,
    purpose: string,
    config: SecurityConfig,
    created: string[]
  ): Promise<OperationResult<string>> {
    const imported = await this.service.importKeyWithDTO(
      keyData,
      withOptions(config, {
        [ConfigOption.keyIdentifier]: this.nextKeyIdentifier(),
        [ConfigOption.purpose]: purpose,
        [ConfigOption.temporary]: "true",
        [ConfigOption.keyType]:
          config.options[ConfigOption.keyType] ?? "asymmetric",
      })
    );
    if (isOperationSuccess(imported)) created.push(imported.value);
    return imported;
  }

  private async registerAndExport(
    keyData: SecureBytes,
    purpose: string,
    config: SecurityConfig,
    created: string[]
  ): Promise<OperationResult<SecureBytes>> {
    const keyIdentifier = await this.register(keyData, purpose, config, created);
    if (!isOperationSuccess(keyIdentifier)) return keyIdentifier;
    return this.service.exportKeyWithDTO(keyIdentifier.value, config);
  }

  /**
   * Delete every temporary key. A failed deletion is logged; it does not
   * replace the outcome of the flow.
   */
  private async release(created: readonly string[]): Promise<void> {
    for (const keyIdentifier of created) {
      try {
        const deleted = await this.service.deleteKeyWithDTO(keyIdentifier);
        if (deleted.status === "failure") {
          this.log.warn("temporary key not deleted", {
            keyIdentifier,
            errorCode: deleted.errorCode,
          });
        }
      } catch (cause) {
        this.log.warn("temporary key not deleted", {
          keyIdentifier,
          errorKind: classify(cause).kind,
        });
      }
    }
  }
}
