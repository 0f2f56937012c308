/**
 * @module interfaces/event-emitter
 * @description Typed event emitter interface for connection lifecycle events.
 *
 * The event map ensures that listeners receive correctly-typed payloads
 * without runtime type checking.
 */

import type {
  SecurityEvent,
  SecurityEventMap,
  SecurityEventType,
} from "../types/events.js";

/**
 * Listener function signature for a specific event type.
 */
export type EventListener<T extends SecurityEventType> = (
  event: SecurityEventMap[T]
) => void;

/**
 * @interface ISecurityEmitter
 * @description Typed event emitter for security RPC events.
 * Provides compile-time safety for event names and payload types.
 */
export interface ISecurityEmitter {
  /**
   * Register a listener for a specific event type.
   * @returns Unsubscribe function.
   */
  on<T extends SecurityEventType>(
    eventType: T,
    listener: EventListener<T>
  ): () => void;

  /**
   * Register a one-time listener that auto-removes after first invocation.
   */
  once<T extends SecurityEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Remove a previously registered listener.
   */
  off<T extends SecurityEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void;

  /**
   * Emit an event, invoking all registered listeners synchronously.
   */
  emit(event: SecurityEvent): void;
}
