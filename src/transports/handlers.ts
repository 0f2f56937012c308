/**
 * @module transports/handlers
 * @description Service-side operation tables shared by the in-process
 * connection and the MessagePort responder.
 */

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

/**
 * Serves one remote operation. A thrown value becomes an error reply, so a
 * handler may throw a NativeError to fail the call.
 */
export type OperationHandler<O extends RemoteOperationName> = (
  ...args: RemoteArguments<O>
) => TransportReply | Promise<TransportReply>;

/** Operations the service recognizes. Missing entries are unrecognized. */
export type HandlerTable = {
  readonly [O in RemoteOperationName]?: OperationHandler<O>;
};

export function unrecognizedOperationReply(operation: string): TransportReply {
  return errorReply(
    nativeError(
      NativeErrorDomain.transport,
      TransportErrorCode.unrecognizedOperation,
      `Unrecognized operation: ${operation}`,
      { operation }
    )
  );
}

export function hasHandler(
  handlers: HandlerTable,
  operation: RemoteOperationName
): boolean {
  return handlers[operation] !== undefined;
}

/**
 * Run the handler for `operation`. Never rejects.
 */
export async function dispatchOperation<O extends RemoteOperationName>(
  handlers: HandlerTable,
  operation: O,
  args: RemoteArguments<O>
): Promise<TransportReply> {
  const handler: OperationHandler<O> | undefined = handlers[operation];
  if (handler === undefined) return unrecognizedOperationReply(operation);
  try {
    return await handler(...args);
  } catch (thrown) {
    return errorReply(thrown);
  }
}
