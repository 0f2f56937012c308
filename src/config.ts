/**
 * @module config
 * @description Client configuration read from the environment and validated
 * with zod.
 *
 * | Variable                        | Default          |
 * |---------------------------------|------------------|
 * | `SECURE_RPC_NAMESPACE`          | `com.securerpc`  |
 * | `SECURE_RPC_CALL_TIMEOUT_MS`    | `0` (no timeout) |
 * | `SECURE_RPC_MAX_RANDOM_LENGTH`  | `1048576`        |
 * | `SECURE_RPC_LOG_LEVEL`          | `warn`           |
 */

import { z } from "zod";
import { DEFAULT_NAMESPACE } from "./types/protocol.js";
import type { LogLevel, Logger } from "./logger.js";
import { LOG_LEVELS, createConsoleLogger } from "./logger.js";
import type { SecurityAdapterOptions } from "./primitives/basic-adapter.js";

export const DEFAULT_MAX_RANDOM_LENGTH = 1024 * 1024;

export interface ClientConfig {
  /** Namespace prefixed to every protocol identifier. */
  readonly namespace: string;
  /** Per-call timeout in milliseconds; 0 disables it. */
  readonly callTimeoutMs: number;
  /** Upper bound for `generateRandomData` lengths. */
  readonly maxRandomLength: number;
  readonly logLevel: LogLevel;
}

export const DEFAULT_CLIENT_CONFIG: ClientConfig = Object.freeze({
  namespace: DEFAULT_NAMESPACE,
  callTimeoutMs: 0,
  maxRandomLength: DEFAULT_MAX_RANDOM_LENGTH,
  logLevel: "warn",
});

const logLevelSchema = z.custom<LogLevel>(
  (value) => LOG_LEVELS.some((level) => level === value),
  { message: `must be one of ${LOG_LEVELS.join(", ")}` }
);

/** A blank numeric variable counts as unset. */
function blankAsUnset(value: unknown): unknown {
  return typeof value === "string" && value.trim() === "" ? undefined : value;
}

const envSchema = z.object({
  SECURE_RPC_NAMESPACE: z
    .string()
    .regex(/^[A-Za-z0-9-]+(\.[A-Za-z0-9-]+)*$/, "must be a dotted identifier")
    .default(DEFAULT_CLIENT_CONFIG.namespace),
  SECURE_RPC_CALL_TIMEOUT_MS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().nonnegative().default(DEFAULT_CLIENT_CONFIG.callTimeoutMs)
  ),
  SECURE_RPC_MAX_RANDOM_LENGTH: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().default(DEFAULT_CLIENT_CONFIG.maxRandomLength)
  ),
  SECURE_RPC_LOG_LEVEL: logLevelSchema.default(DEFAULT_CLIENT_CONFIG.logLevel),
});

/**
 * Thrown when the environment holds an invalid setting.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly variable: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Read the client configuration.
 *
 * @throws {ConfigurationError} naming the first invalid variable.
 */
export function loadClientConfig(
  env: Readonly<Record<string, string | undefined>> = process.env
): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue?.path[0] ?? "environment");
    throw new ConfigurationError(
      `${variable}: ${issue?.message ?? "invalid value"}`,
      variable
    );
  }
  return Object.freeze({
    namespace: parsed.data.SECURE_RPC_NAMESPACE,
    callTimeoutMs: parsed.data.SECURE_RPC_CALL_TIMEOUT_MS,
    maxRandomLength: parsed.data.SECURE_RPC_MAX_RANDOM_LENGTH,
    logLevel: parsed.data.SECURE_RPC_LOG_LEVEL,
  });
}

/**
 * Adapter options for a loaded configuration. Logs go to the console at the
 * configured level unless `logger` is given.
 */
export function adapterOptionsFor(
  config: ClientConfig,
  logger: Logger = createConsoleLogger(config.logLevel, {
    component: "secure-rpc",
  })
): SecurityAdapterOptions {
  return {
    namespace: config.namespace,
    callTimeoutMs: config.callTimeoutMs,
    maxRandomLength: config.maxRandomLength,
    logger,
  };
}
