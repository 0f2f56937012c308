/**
 * @module primitives/basic-adapter
 * @description Basic-tier capability adapter: forwards `ping` and
 * `synchroniseKeys` over a connection.
 */

import { z } from "zod";
import type { IBasicSecurityService } from "../interfaces/basic-service.js";
import type { ProtocolIdentifier } from "../types/branded.js";
import type { AsyncResult } from "../types/result.js";
import type { SecureBytes } from "../types/secure-bytes.js";
import { DEFAULT_NAMESPACE, protocolIdentifiers } from "../types/protocol.js";
import {
  interpretValueReply,
  interpretVoidReply,
  toRawBuffer,
} from "../codec/marshaling.js";
import type {
  BoundInvoker,
  InvokerSource,
  RemoteInvoker,
  RemoteInvokerOptions,
} from "./remote-invoker.js";
import { bindInvoker, releaseInvoker } from "./remote-invoker.js";

export interface SecurityAdapterOptions extends RemoteInvokerOptions {
  /** Namespace of the protocol identifiers. */
  readonly namespace?: string;
  /** Upper bound for `generateRandomData`. */
  readonly maxRandomLength?: number;
}

/**
 * BasicSecurityAdapter
 *
 * @example
 * ```ts
 * const adapter = new BasicSecurityAdapter(connection);
 * const alive = await adapter.ping();
 * adapter.dispose();
 * ```
 */
export class BasicSecurityAdapter implements IBasicSecurityService {
  private readonly bound: BoundInvoker;
  private readonly namespace: string;

  constructor(source: InvokerSource, options: SecurityAdapterOptions = {}) {
    this.bound = bindInvoker(source, options);
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
  }

  get invoker(): RemoteInvoker {
    return this.bound.invoker;
  }

  identify(): ProtocolIdentifier {
    return protocolIdentifiers(this.namespace).basic;
  }

  ping(): AsyncResult<boolean> {
    return this.invoker.call("ping", [], (reply) =>
      interpretValueReply(reply, z.boolean())
    );
  }

  synchroniseKeys(syncData: SecureBytes): AsyncResult<void> {
    return this.invoker.call(
      "synchroniseKeys",
      [toRawBuffer(syncData)],
      interpretVoidReply
    );
  }

  /** Invalidate the connection if this adapter owns it. */
  dispose(): void {
    releaseInvoker(this.bound, "Adapter disposed");
  }
}
