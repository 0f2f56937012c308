/**
 * @module codec
 * @description Marshaling between connection-level representations and the
 * typed values of this library: bytes, replies, native errors and the DTO
 * error form.
 */

export * from "./marshaling.js";
export * from "./error-mapper.js";
export * from "./error-codes.js";
export * from "./dto.js";
export * from "./remote-arguments.js";
