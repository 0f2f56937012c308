/**
 * @module transports/message-port
 * @description IServiceConnection over a worker_threads MessagePort, and the
 * responder that serves a handler table on the other end of the port.
 *
 * Messages are versioned envelopes correlated by request id:
 *
 *   { v: 1, kind: "request",  requestId, operation, args }
 *   { v: 1, kind: "response", requestId, reply }
 *
 * Closing either end invalidates the connection. A message that fails to
 * deserialize interrupts it: no reply can be matched any more, so the
 * replies in flight are abandoned.
 */

import { randomUUID } from "node:crypto";
import type { MessagePort } from "node:worker_threads";
import { z } from "zod";
import type { IServiceConnection, ReplyHandler } from "../interfaces/connection.js";
import type {
  RemoteArguments,
  RemoteOperationName,
  TransportReply,
} from "../types/transport.js";
import {
  NativeErrorDomain,
  TransportErrorCode,
  errorReply,
  nativeError,
} from "../types/transport.js";
import { SecurityErrors } from "../types/errors.js";
import { toNative } from "../codec/error-mapper.js";
import {
  isRemoteOperation,
  remoteArgumentSchemas,
} from "../codec/remote-arguments.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { HandlerTable } from "./handlers.js";
import { dispatchOperation, unrecognizedOperationReply } from "./handlers.js";

export const ENVELOPE_VERSION = 1;

// ─── Envelopes ──────────────────────────────────────────────────────

const requestEnvelopeSchema = z.object({
  v: z.literal(ENVELOPE_VERSION),
  kind: z.literal("request"),
  requestId: z.string().min(1),
  operation: z.string(),
  args: z.array(z.unknown()),
});

const responseEnvelopeSchema = z.object({
  v: z.literal(ENVELOPE_VERSION),
  kind: z.literal("response"),
  requestId: z.string().min(1),
  reply: z.unknown(),
});

export type RequestEnvelope = z.infer<typeof requestEnvelopeSchema>;
export type ResponseEnvelope = z.infer<typeof responseEnvelopeSchema>;

export interface MessagePortOptions {
  readonly logger?: Logger;
}

// ─── Client Side ────────────────────────────────────────────────────

export class MessagePortServiceConnection implements IServiceConnection {
  private readonly pending = new Map<string, ReplyHandler>();
  private readonly invalidatedObservers = new Set<(reason: string) => void>();
  private readonly interruptedObservers = new Set<() => void>();
  private readonly log: Logger;
  private invalidationReason: string | null = null;

  private readonly onMessage = (raw: unknown): void => this.handleMessage(raw);
  private readonly onMessageError = (): void => this.handleInterrupted();
  private readonly onClose = (): void =>
    this.handleInvalidated("Message port closed");

  constructor(
    private readonly port: MessagePort,
    options: MessagePortOptions = {}
  ) {
    this.log = options.logger ?? silentLogger;
    port.on("message", this.onMessage);
    port.on("messageerror", this.onMessageError);
    port.on("close", this.onClose);
  }

  // ─── Commands ───────────────────────────────────────────────────

  invoke<O extends RemoteOperationName>(
    operation: O,
    args: RemoteArguments<O>,
    onReply: ReplyHandler
  ): void {
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

    const requestId = randomUUID();
    const envelope: RequestEnvelope = {
      v: ENVELOPE_VERSION,
      kind: "request",
      requestId,
      operation,
      args: [...args],
    };
    this.pending.set(requestId, onReply);
    try {
      this.port.postMessage(envelope);
    } catch (cause) {
      this.pending.delete(requestId);
      throw cause;
    }
  }

  invalidate(reason = "Connection invalidated"): void {
    this.handleInvalidated(reason);
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

  get pendingCount(): number {
    return this.pending.size;
  }

  // ─── Internal ───────────────────────────────────────────────────

  private handleMessage(raw: unknown): void {
    const parsed = responseEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn("malformed envelope dropped", {
        issue: parsed.error.issues[0]?.message ?? null,
      });
      return;
    }
    const { requestId, reply } = parsed.data;
    const onReply = this.pending.get(requestId);
    if (onReply === undefined) {
      this.log.debug("reply for unknown request dropped", { requestId });
      return;
    }
    this.pending.delete(requestId);
    onReply(reply);
  }

  private handleInterrupted(): void {
    if (this.invalidationReason !== null) return;
    const abandoned = this.pending.size;
    this.pending.clear();
    this.log.warn("message could not be deserialized", { abandoned });
    for (const observer of [...this.interruptedObservers]) observer();
  }

  private handleInvalidated(reason: string): void {
    if (this.invalidationReason !== null) return;
    this.invalidationReason = reason;
    this.pending.clear();
    this.port.off("message", this.onMessage);
    this.port.off("messageerror", this.onMessageError);
    this.port.off("close", this.onClose);
    this.port.close();
    for (const observer of [...this.invalidatedObservers]) observer(reason);
  }
}

// ─── Service Side ───────────────────────────────────────────────────

async function serve<O extends RemoteOperationName>(
  handlers: HandlerTable,
  operation: O,
  args: unknown
): Promise<TransportReply> {
  const parsed = remoteArgumentSchemas[operation].safeParse(args);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue === undefined ? "" : ` at ${issue.path.join(".")}`;
    return errorReply(
      toNative(
        SecurityErrors.invalidInput(
          `Invalid arguments for ${operation}${where}: ${issue?.message ?? "rejected"}`
        )
      )
    );
  }
  return dispatchOperation(handlers, operation, parsed.data);
}

/**
 * Serve `handlers` on `port`. Each valid request envelope is answered with
 * exactly one response envelope.
 *
 * @returns Function that stops serving (the port stays open).
 */
export function attachServiceResponder(
  port: MessagePort,
  handlers: HandlerTable,
  options: MessagePortOptions = {}
): () => void {
  const log = options.logger ?? silentLogger;

  const respond = (requestId: string, reply: TransportReply): void => {
    const envelope: ResponseEnvelope = {
      v: ENVELOPE_VERSION,
      kind: "response",
      requestId,
      reply,
    };
    try {
      port.postMessage(envelope);
    } catch (cause) {
      const message = cause instanceof Error ? cause.message : String(cause);
      log.error("reply could not be sent", { requestId, error: message });
      port.postMessage({
        ...envelope,
        reply: errorReply(
          toNative(SecurityErrors.internalError(`Reply could not be sent: ${message}`))
        ),
      });
    }
  };

  const onMessage = (raw: unknown): void => {
    const parsed = requestEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn("malformed envelope dropped", {
        issue: parsed.error.issues[0]?.message ?? null,
      });
      return;
    }
    const { requestId, operation, args } = parsed.data;
    if (!isRemoteOperation(operation)) {
      respond(requestId, unrecognizedOperationReply(operation));
      return;
    }
    serve(handlers, operation, args)
      .then((reply) => respond(requestId, reply))
      .catch((cause: unknown) => {
        log.error("request not answered", {
          requestId,
          operation,
          error: cause instanceof Error ? cause.message : String(cause),
        });
      });
  };

  port.on("message", onMessage);
  return () => {
    port.off("message", onMessage);
  };
}
