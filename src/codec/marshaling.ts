/**
 * @module codec/marshaling
 * @description Conversion between the raw buffers a connection carries and
 * SecureBytes, and between a single connection reply and a typed Result.
 *
 * Malformed replies are a recoverable condition: every interpreter returns
 * `invalidData("Unexpected result format")` for a shape it does not expect
 * and never throws.
 */

import { z } from "zod";
import { SecureBytes } from "../types/secure-bytes.js";
import type { Result } from "../types/result.js";
import { err, ok } from "../types/result.js";
import { SecurityErrors } from "../types/errors.js";
import type { ParameterBag } from "../types/transport.js";
import { classify } from "./error-mapper.js";

export const UNEXPECTED_RESULT_FORMAT = "Unexpected result format";

// ─── Bytes ──────────────────────────────────────────────────────────

export function toSecureBytes(raw: Uint8Array): SecureBytes {
  return new SecureBytes(raw);
}

export function toRawBuffer(value: SecureBytes): Uint8Array {
  return value.toUint8Array();
}

/** Raw buffer for an optional argument; null stays null. */
export function toOptionalRawBuffer(value: SecureBytes | null): Uint8Array | null {
  return value === null ? null : value.toUint8Array();
}

/**
 * Drop undefined entries so a request object can travel as a ParameterBag.
 */
export function toParameterBag(
  entries: Readonly<
    Record<string, string | number | boolean | Uint8Array | null | undefined>
  >
): ParameterBag {
  const bag: Record<string, string | number | boolean | Uint8Array | null> = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) bag[key] = value;
  }
  return bag;
}

// ─── Reply Schemas ──────────────────────────────────────────────────

export const transportReplySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("error"), error: z.unknown() }),
  z.object({ kind: z.literal("data"), data: z.instanceof(Uint8Array) }),
  z.object({ kind: z.literal("value"), value: z.unknown() }),
  z.object({ kind: z.literal("noData") }),
]);

export type ParsedReply = z.infer<typeof transportReplySchema>;

function unexpected<T>(): Result<T> {
  return err(SecurityErrors.invalidData(UNEXPECTED_RESULT_FORMAT));
}

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

// ─── Interpreters ───────────────────────────────────────────────────

/**
 * Interpret a reply carrying a byte payload.
 *
 * - error → classified
 * - data → `transform(data)`; a throwing transform yields invalidData
 * - anything else → invalidData("Unexpected result format")
 */
export function interpretReply<T>(
  reply: unknown,
  transform: (raw: Uint8Array) => T
): Result<T> {
  const parsed = transportReplySchema.safeParse(reply);
  if (!parsed.success) return unexpected();

  switch (parsed.data.kind) {
    case "error":
      return err(classify(parsed.data.error));
    case "data":
      try {
        return ok(transform(parsed.data.data));
      } catch (cause) {
        return err(SecurityErrors.invalidData(messageOf(cause)));
      }
    default:
      return unexpected();
  }
}

/** Interpret a reply to a byte-returning operation as SecureBytes. */
export function interpretBytesReply(reply: unknown): Result<SecureBytes> {
  return interpretReply(reply, toSecureBytes);
}

/**
 * Interpret a reply to an operation with no result. Both `noData` and a
 * (possibly empty) data payload count as success.
 */
export function interpretVoidReply(reply: unknown): Result<void> {
  const parsed = transportReplySchema.safeParse(reply);
  if (!parsed.success) return unexpected();

  switch (parsed.data.kind) {
    case "error":
      return err(classify(parsed.data.error));
    case "noData":
    case "data":
      return ok(undefined);
    default:
      return unexpected();
  }
}

/**
 * Interpret a reply carrying a structured value, validated by `schema`.
 */
export function interpretValueReply<T>(
  reply: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T> {
  const parsed = transportReplySchema.safeParse(reply);
  if (!parsed.success) return unexpected();

  switch (parsed.data.kind) {
    case "error":
      return err(classify(parsed.data.error));
    case "value": {
      const value = schema.safeParse(parsed.data.value);
      return value.success ? ok(value.data) : unexpected();
    }
    default:
      return unexpected();
  }
}
