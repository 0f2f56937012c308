/**
 * @module interfaces
 * @description Public interface exports: the connection contract, the
 * three capability tiers and their DTO counterparts.
 */

export * from "./event-emitter.js";
export * from "./connection.js";
export * from "./basic-service.js";
export * from "./standard-service.js";
export * from "./complete-service.js";
export * from "./dto-service.js";
