/**
 * @module primitives
 * @description Adapters for each capability tier, their DTO wrappers, the
 * key-exchange composition and the call machinery beneath them.
 */

export { SecurityEmitter } from "./base-emitter.js";
export { OneShotCompletion } from "./one-shot.js";
export type {
  BoundInvoker,
  InvokerSource,
  RemoteInvokerOptions,
  ReplyInterpreter,
} from "./remote-invoker.js";
export { RemoteInvoker, bindInvoker, releaseInvoker } from "./remote-invoker.js";
export type { SecurityAdapterOptions } from "./basic-adapter.js";
export { BasicSecurityAdapter } from "./basic-adapter.js";
export { StandardSecurityAdapter } from "./standard-adapter.js";
export { CompleteSecurityAdapter, keyMetadataSchema } from "./complete-adapter.js";
export {
  BasicServiceDefaults,
  CompleteServiceDefaults,
  StandardServiceDefaults,
  composeStatus,
  decrypt,
  encrypt,
  pingStandard,
  withCompleteDefaults,
} from "./service-defaults.js";
export {
  BasicSecurityDTOAdapter,
  CompleteSecurityDTOAdapter,
  StandardSecurityDTOAdapter,
  settle,
} from "./dto-adapter.js";
export type { KeyExchangeOptions } from "./key-exchange.js";
export {
  KEY_EXCHANGE_PRIVATE_LENGTH,
  KEY_EXCHANGE_PUBLIC_LENGTH,
  KeyExchangeDTOAdapter,
  SHARED_SECRET_OPERATION,
} from "./key-exchange.js";
