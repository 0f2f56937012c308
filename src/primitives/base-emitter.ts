/**
 * @module primitives/base-emitter
 * @description Base implementation of the typed event emitter.
 * The remote invoker extends this to publish connection lifecycle events.
 */

import type {
  ISecurityEmitter,
  EventListener,
} from "../interfaces/event-emitter.js";
import type {
  SecurityEvent,
  SecurityEventMap,
  SecurityEventType,
} from "../types/events.js";

type ListenerTable = {
  [K in keyof SecurityEventMap]: Set<EventListener<K>>;
};

function dispatch<T extends SecurityEventType>(
  listeners: Set<EventListener<T>>,
  event: SecurityEventMap[T]
): void {
  // Copy so listeners may unsubscribe while being notified.
  for (const listener of [...listeners]) {
    listener(event);
  }
}

/**
 * Concrete typed event emitter.
 * One Set per event type for O(1) listener registration and removal.
 */
export class SecurityEmitter implements ISecurityEmitter {
  private readonly listeners: ListenerTable = {
    CONNECTION_INVALIDATED: new Set(),
    CONNECTION_INTERRUPTED: new Set(),
    CALL_SETTLED: new Set(),
  };

  on<T extends SecurityEventType>(
    eventType: T,
    listener: EventListener<T>
  ): () => void {
    this.listeners[eventType].add(listener);
    return () => this.off(eventType, listener);
  }

  once<T extends SecurityEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    const wrapper: EventListener<T> = (event) => {
      this.off(eventType, wrapper);
      listener(event);
    };
    this.on(eventType, wrapper);
  }

  off<T extends SecurityEventType>(
    eventType: T,
    listener: EventListener<T>
  ): void {
    this.listeners[eventType].delete(listener);
  }

  emit(event: SecurityEvent): void {
    switch (event.type) {
      case "CONNECTION_INVALIDATED":
        dispatch(this.listeners.CONNECTION_INVALIDATED, event);
        break;
      case "CONNECTION_INTERRUPTED":
        dispatch(this.listeners.CONNECTION_INTERRUPTED, event);
        break;
      case "CALL_SETTLED":
        dispatch(this.listeners.CALL_SETTLED, event);
        break;
    }
  }

  /** Number of listeners registered for an event type. */
  listenerCount(eventType: SecurityEventType): number {
    return this.listeners[eventType].size;
  }
}
