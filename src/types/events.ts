/**
 * @module types/events
 * @description Event catalog for connection lifecycle and call settlement.
 *
 * The remote invoker emits these so hosts can observe a connection without
 * holding it. Events never carry byte contents.
 */

import type { UnixMillis } from "./branded.js";
import type { SecurityErrorKind } from "./errors.js";
import type { RemoteOperationName } from "./transport.js";

// ─── Connection Events ──────────────────────────────────────────────

/** Emitted once when the connection is invalidated. Terminal. */
export interface ConnectionInvalidatedEvent {
  readonly type: "CONNECTION_INVALIDATED";
  readonly reason: string;
  /** Calls that were pending and have been resolved with the failure. */
  readonly abandonedCalls: number;
  readonly timestamp: UnixMillis;
}

/** Emitted on each interruption. The connection stays usable. */
export interface ConnectionInterruptedEvent {
  readonly type: "CONNECTION_INTERRUPTED";
  readonly abandonedCalls: number;
  readonly timestamp: UnixMillis;
}

// ─── Call Events ────────────────────────────────────────────────────

/** Emitted when a bridged call resolves, successfully or not. */
export interface CallSettledEvent {
  readonly type: "CALL_SETTLED";
  readonly operation: RemoteOperationName;
  readonly ok: boolean;
  readonly errorKind: SecurityErrorKind | null;
  readonly durationMs: number;
  readonly timestamp: UnixMillis;
}

// ─── Event Map ──────────────────────────────────────────────────────

export interface SecurityEventMap {
  CONNECTION_INVALIDATED: ConnectionInvalidatedEvent;
  CONNECTION_INTERRUPTED: ConnectionInterruptedEvent;
  CALL_SETTLED: CallSettledEvent;
}

export type SecurityEventType = keyof SecurityEventMap;

export type SecurityEvent = SecurityEventMap[SecurityEventType];
