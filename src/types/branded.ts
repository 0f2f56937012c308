/**
 * @module types/branded
 * @description Branded types for compile-time safety across the security RPC layer.
 *
 * Branded types keep raw strings from being passed where a negotiated
 * protocol identifier or a wire-level hex string is expected.
 *
 * @example
 * ```ts
 * const raw = "com.example.xpc.service.basic";
 * // Type error: string is not assignable to ProtocolIdentifier
 * const id: ProtocolIdentifier = raw;
 * // Correct:
 * const id = protocolIdentifiers("com.example").basic;
 * ```
 */

/** Unique symbol for branding. Not exported; internal only. */
declare const __brand: unique symbol;

/**
 * Generic branded type utility.
 * Intersects a base type with a phantom brand field that exists only
 * at the type level, never at runtime.
 */
export type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ─── Protocol Brands ────────────────────────────────────────────────

/**
 * A dotted identifier naming one capability tier of the service contract,
 * e.g. `com.example.xpc.service.standard`.
 */
export type ProtocolIdentifier = Brand<string, "ProtocolIdentifier">;

/**
 * A `major.minor.patch` protocol version string.
 */
export type ProtocolVersion = Brand<string, "ProtocolVersion">;

// ─── Wire Format Brands ─────────────────────────────────────────────

/**
 * Lower-case hexadecimal encoding of a byte sequence.
 * Used for key identifiers and byte values carried in DTO option bags.
 */
export type HexString = Brand<string, "HexString">;

/**
 * A Unix timestamp in milliseconds.
 */
export type UnixMillis = Brand<number, "UnixMillis">;

/**
 * Stamp a value with its brand. Callers are responsible for having
 * validated the value first.
 */
export function brand<B extends string, T>(value: T): Brand<T, B> {
  return value as Brand<T, B>;
}

/** Current wall-clock time as a branded millisecond timestamp. */
export function nowMillis(): UnixMillis {
  return brand<"UnixMillis", number>(Date.now());
}
