/**
 * @module interfaces/connection
 * @description IServiceConnection: the request/completion-callback channel
 * to the remote security service.
 *
 * Concrete transports (an OS IPC facility, a worker MessagePort, an
 * in-process table) implement this. The adapters never see anything else
 * of the transport.
 */

import type {
  RemoteArguments,
  RemoteOperationName,
} from "../types/transport.js";

/**
 * Completion callback for one request. Replies arrive as `unknown` and are
 * validated by the codec.
 */
export type ReplyHandler = (reply: unknown) => void;

/**
 * @interface IServiceConnection
 * @description One live channel to the remote service.
 */
export interface IServiceConnection {
  // ─── Commands ───────────────────────────────────────────────────

  /**
   * @command
   * @description Issue a request. `onReply` is invoked once with the reply,
   * or immediately with a synthetic error for an operation the remote side
   * does not recognize.
   */
  invoke<O extends RemoteOperationName>(
    operation: O,
    args: RemoteArguments<O>,
    onReply: ReplyHandler
  ): void;

  /**
   * @command
   * @description Permanently close the channel. Fires invalidation observers.
   */
  invalidate(reason?: string): void;

  // ─── Observers ──────────────────────────────────────────────────

  /**
   * @description Register an observer for invalidation. Invalidation is
   * terminal: no call succeeds on this connection afterwards.
   * @returns Unsubscribe function.
   */
  onInvalidated(observer: (reason: string) => void): () => void;

  /**
   * @description Register an observer for interruption. Outstanding replies
   * are lost but the channel may be used again.
   * @returns Unsubscribe function.
   */
  onInterrupted(observer: () => void): () => void;
}
