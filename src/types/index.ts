/**
 * @module types
 * @description Public type exports for the security RPC facade.
 */

export * from "./branded.js";
export * from "./errors.js";
export * from "./result.js";
export * from "./secure-bytes.js";
export * from "./protocol.js";
export * from "./service.js";
export * from "./transport.js";
export * from "./events.js";
export * from "./dto.js";
