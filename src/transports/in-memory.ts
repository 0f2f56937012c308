/**
 * @module transports/in-memory
 * @description In-process IServiceConnection backed by a handler table.
 *
 * Replies are delivered asynchronously, as a real channel would deliver
 * them. Interruption drops every reply still in flight; invalidation drops
 * them for good. Used by tests and by hosts that run the service in the
 * same process.
 */

import type { IServiceConnection, ReplyHandler } from "../interfaces/connection.js";
import type {
  RemoteArguments,
  RemoteOperationName,
} from "../types/transport.js";
import {
  NativeErrorDomain,
  TransportErrorCode,
  errorReply,
  nativeError,
} from "../types/transport.js";
import type { HandlerTable } from "./handlers.js";
import {
  dispatchOperation,
  hasHandler,
  unrecognizedOperationReply,
} from "./handlers.js";

export interface RecordedCall {
  readonly operation: RemoteOperationName;
  readonly args: readonly unknown[];
}

export class InMemoryServiceConnection implements IServiceConnection {
  private readonly invalidatedObservers = new Set<(reason: string) => void>();
  private readonly interruptedObservers = new Set<() => void>();
  private readonly recorded: RecordedCall[] = [];
  private handlers: HandlerTable;
  /** Bumped on interruption; replies from an older epoch are dropped. */
  private epoch = 0;
  private invalidationReason: string | null = null;

  constructor(handlers: HandlerTable = {}) {
    this.handlers = handlers;
  }

  // ─── Commands ───────────────────────────────────────────────────

  invoke<O extends RemoteOperationName>(
    operation: O,
    args: RemoteArguments<O>,
    onReply: ReplyHandler
  ): void {
    this.recorded.push({ operation, args: [...args] });

    if (this.invalidationReason !== null) {
      onReply(
        errorReply(
          nativeError(
            NativeErrorDomain.transport,
            TransportErrorCode.invalidated,
            this.invalidationReason
          )
        )
      );
      return;
    }
    if (!hasHandler(this.handlers, operation)) {
      onReply(unrecognizedOperationReply(operation));
      return;
    }

    const epoch = this.epoch;
    void dispatchOperation(this.handlers, operation, args).then((reply) => {
      if (this.invalidationReason !== null || epoch !== this.epoch) return;
      onReply(reply);
    });
  }

  invalidate(reason = "Connection invalidated"): void {
    if (this.invalidationReason !== null) return;
    this.invalidationReason = reason;
    for (const observer of [...this.invalidatedObservers]) observer(reason);
  }

  /**
   * Simulate the remote process going away. Replies in flight are lost.
   */
  interrupt(): void {
    if (this.invalidationReason !== null) return;
    this.epoch++;
    for (const observer of [...this.interruptedObservers]) observer();
  }

  /** Replace the handler table, e.g. after a simulated service restart. */
  setHandlers(handlers: HandlerTable): void {
    this.handlers = handlers;
  }

  // ─── Observers ──────────────────────────────────────────────────

  onInvalidated(observer: (reason: string) => void): () => void {
    this.invalidatedObservers.add(observer);
    return () => {
      this.invalidatedObservers.delete(observer);
    };
  }

  onInterrupted(observer: () => void): () => void {
    this.interruptedObservers.add(observer);
    return () => {
      this.interruptedObservers.delete(observer);
    };
  }

  // ─── Queries ────────────────────────────────────────────────────

  /** Every request that reached this connection, in order. */
  get calls(): readonly RecordedCall[] {
    return [...this.recorded];
  }

  callCount(operation?: RemoteOperationName): number {
    return operation === undefined
      ? this.recorded.length
      : this.recorded.filter((call) => call.operation === operation).length;
  }

  get isInvalidated(): boolean {
    return this.invalidationReason !== null;
  }
}
