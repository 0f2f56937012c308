/**
 * @module primitives/remote-invoker
 * @description Owner of one IServiceConnection. Bridges each request/reply
 * callback into a Promise of a Result and keeps track of pending calls so
 * that connection loss resolves them instead of leaving them hanging.
 *
 * Invalidation is terminal: every pending call resolves with
 * `connectionInvalidated(reason)` and every later call fails fast with
 * `serviceUnavailable` without touching the connection. Interruption
 * resolves pending calls with `connectionInterrupted` and leaves the
 * invoker usable. No call is ever retried.
 */

import { SecurityEmitter } from "./base-emitter.js";
import { OneShotCompletion } from "./one-shot.js";
import type { IServiceConnection } from "../interfaces/connection.js";
import type { Result } from "../types/result.js";
import { err } from "../types/result.js";
import type { SecurityError } from "../types/errors.js";
import { SecurityErrors } from "../types/errors.js";
import type {
  RemoteArguments,
  RemoteOperationName,
} from "../types/transport.js";
import { nowMillis } from "../types/branded.js";
import { classify } from "../codec/error-mapper.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export interface RemoteInvokerOptions {
  /** Resolve a call with `timeout` after this many ms; 0 disables. */
  readonly callTimeoutMs?: number;
  readonly logger?: Logger;
}

/** Turns a raw reply into a typed Result. Must not throw. */
export type ReplyInterpreter<T> = (reply: unknown) => Result<T>;

interface PendingCall {
  readonly operation: RemoteOperationName;
  fail(error: SecurityError): void;
}

/**
 * RemoteInvoker: the single owner of a connection.
 *
 * @example
 * ```ts
 * const invoker = new RemoteInvoker(connection, { callTimeoutMs: 5_000 });
 * const version = await invoker.call("getServiceVersion", [], (reply) =>
 *   interpretValueReply(reply, z.string())
 * );
 * ```
 */
export class RemoteInvoker extends SecurityEmitter {
  private readonly pending = new Set<PendingCall>();
  private readonly detachObservers: Array<() => void>;
  private readonly callTimeoutMs: number;
  private readonly log: Logger;
  private invalidationReason: string | null = null;

  constructor(
    private readonly connection: IServiceConnection,
    options: RemoteInvokerOptions = {}
  ) {
    super();
    this.callTimeoutMs = options.callTimeoutMs ?? 0;
    this.log = options.logger ?? silentLogger;
    this.detachObservers = [
      connection.onInvalidated((reason) => this.handleInvalidated(reason)),
      connection.onInterrupted(() => this.handleInterrupted()),
    ];
  }

  // ─── Commands ───────────────────────────────────────────────────

  /**
   * Issue one remote operation and interpret its reply.
   */
  call<O extends RemoteOperationName, T>(
    operation: O,
    args: RemoteArguments<O>,
    interpret: ReplyInterpreter<T>
  ): Promise<Result<T>> {
    if (this.invalidationReason !== null) {
      return Promise.resolve(err(SecurityErrors.serviceUnavailable()));
    }

    const startedAt = Date.now();
    const completion = new OneShotCompletion<Result<T>>();
    let timer: ReturnType<typeof setTimeout> | null = null;

    const finish = (result: Result<T>): void => {
      if (!completion.resolve(result)) return;
      this.pending.delete(entry);
      if (timer !== null) clearTimeout(timer);
      this.settled(operation, result, Date.now() - startedAt);
    };

    const entry: PendingCall = {
      operation,
      fail: (error) => finish(err(error)),
    };
    this.pending.add(entry);

    if (this.callTimeoutMs > 0) {
      const afterMs = this.callTimeoutMs;
      timer = setTimeout(() => finish(err(SecurityErrors.timeout(afterMs))), afterMs);
    }

    try {
      this.connection.invoke(operation, args, (reply) => {
        let result: Result<T>;
        try {
          result = interpret(reply);
        } catch (cause) {
          result = err(classify(cause));
        }
        finish(result);
      });
    } catch (cause) {
      finish(err(classify(cause)));
    }

    return completion.promise;
  }

  /**
   * Invalidate the owned connection. Pending calls resolve with
   * `connectionInvalidated`.
   */
  invalidate(reason = "Invalidated by client"): void {
    if (this.invalidationReason !== null) return;
    this.connection.invalidate(reason);
    // Connections are expected to notify observers; cover those that don't.
    this.handleInvalidated(reason);
  }

  /**
   * Stop observing the connection without invalidating it.
   */
  detach(): void {
    for (const detach of this.detachObservers) detach();
    this.detachObservers.length = 0;
  }

  // ─── Queries ────────────────────────────────────────────────────

  get isInvalidated(): boolean {
    return this.invalidationReason !== null;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private handleInvalidated(reason: string): void {
    if (this.invalidationReason !== null) return;
    this.invalidationReason = reason;
    const abandoned = this.failPending(SecurityErrors.connectionInvalidated(reason));
    this.log.warn("connection invalidated", { reason, abandonedCalls: abandoned });
    this.emit({
      type: "CONNECTION_INVALIDATED",
      reason,
      abandonedCalls: abandoned,
      timestamp: nowMillis(),
    });
  }

  private handleInterrupted(): void {
    if (this.invalidationReason !== null) return;
    const abandoned = this.failPending(SecurityErrors.connectionInterrupted());
    this.log.warn("connection interrupted", { abandonedCalls: abandoned });
    this.emit({
      type: "CONNECTION_INTERRUPTED",
      abandonedCalls: abandoned,
      timestamp: nowMillis(),
    });
  }

  private failPending(error: SecurityError): number {
    const calls = [...this.pending];
    for (const call of calls) call.fail(error);
    return calls.length;
  }

  private settled(
    operation: RemoteOperationName,
    result: Result<unknown>,
    durationMs: number
  ): void {
    if (!result.ok) {
      this.log.debug("call failed", {
        operation,
        errorKind: result.error.kind,
        durationMs,
      });
    }
    this.emit({
      type: "CALL_SETTLED",
      operation,
      ok: result.ok,
      errorKind: result.ok ? null : result.error.kind,
      durationMs,
      timestamp: nowMillis(),
    });
  }
}

// ─── Adapter Binding ────────────────────────────────────────────────

/**
 * What an adapter is constructed from: a connection it will own, or an
 * invoker shared with (and owned by) an enclosing adapter.
 */
export type InvokerSource = IServiceConnection | RemoteInvoker;

export interface BoundInvoker {
  readonly invoker: RemoteInvoker;
  /** Whether the adapter manages the invoker's lifecycle. */
  readonly owned: boolean;
}

export function bindInvoker(
  source: InvokerSource,
  options: RemoteInvokerOptions = {}
): BoundInvoker {
  return source instanceof RemoteInvoker
    ? { invoker: source, owned: false }
    : { invoker: new RemoteInvoker(source, options), owned: true };
}

/**
 * Dispose of a bound invoker: an owned one is invalidated and detached,
 * a shared one is left to its owner.
 */
export function releaseInvoker(bound: BoundInvoker, reason: string): void {
  if (!bound.owned) return;
  bound.invoker.invalidate(reason);
  bound.invoker.detach();
}
