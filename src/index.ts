/**
 * @module secure-rpc-core
 * @description Client-side facade for a security service running in another
 * process. Three capability tiers (Basic, Standard, Complete) are forwarded
 * over an IServiceConnection, with one error vocabulary for every failure
 * and a transport-independent DTO mirror of each tier.
 *
 * @version 0.1.0
 * @license MIT
 */

// ─── Types ──────────────────────────────────────────────────────────
export * from "./types/index.js";

// ─── Interfaces ─────────────────────────────────────────────────────
export * from "./interfaces/index.js";

// ─── Adapters ───────────────────────────────────────────────────────
export * from "./primitives/index.js";

// ─── Marshaling ─────────────────────────────────────────────────────
export * from "./codec/index.js";

// ─── Transport Implementations ──────────────────────────────────────
export * from "./transports/index.js";

// ─── Configuration & Logging ────────────────────────────────────────
export type { ClientConfig } from "./config.js";
export {
  ConfigurationError,
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_MAX_RANDOM_LENGTH,
  adapterOptionsFor,
  loadClientConfig,
} from "./config.js";
export type { LogFields, LogLevel, LogSink, Logger } from "./logger.js";
export {
  LOG_LEVELS,
  childLogger,
  createConsoleLogger,
  silentLogger,
} from "./logger.js";
