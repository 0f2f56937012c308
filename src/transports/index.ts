/**
 * @module transports
 * @description IServiceConnection implementations.
 */

export type { HandlerTable, OperationHandler } from "./handlers.js";
export { dispatchOperation, unrecognizedOperationReply } from "./handlers.js";
export type { RecordedCall } from "./in-memory.js";
export { InMemoryServiceConnection } from "./in-memory.js";
export type {
  MessagePortOptions,
  RequestEnvelope,
  ResponseEnvelope,
} from "./message-port.js";
export {
  ENVELOPE_VERSION,
  MessagePortServiceConnection,
  attachServiceResponder,
} from "./message-port.js";
