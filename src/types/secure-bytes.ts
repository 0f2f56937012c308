/**
 * @module types/secure-bytes
 * @description Immutable container for sensitive byte material.
 *
 * Key material, plaintext, ciphertext, signatures and digests cross every
 * API boundary as SecureBytes, never as a raw mutable buffer. The
 * constructor copies its input, every accessor hands out a copy, and every
 * transform produces a new value.
 */

import { Buffer } from "node:buffer";
import { timingSafeEqual } from "node:crypto";
import type { HexString } from "./branded.js";
import { brand } from "./branded.js";

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

export class SecureBytes {
  private readonly bytes: Uint8Array;

  constructor(bytes: Uint8Array | readonly number[] = []) {
    this.bytes = Uint8Array.from(bytes);
  }

  // ─── Factories ──────────────────────────────────────────────────

  static empty(): SecureBytes {
    return new SecureBytes();
  }

  static fromUtf8(text: string): SecureBytes {
    return new SecureBytes(new TextEncoder().encode(text));
  }

  /**
   * Decode a hex string. Returns null when the input is not an even-length
   * hexadecimal string.
   */
  static fromHex(hex: string): SecureBytes | null {
    if (!HEX_PATTERN.test(hex)) return null;
    return new SecureBytes(Buffer.from(hex, "hex"));
  }

  // ─── Queries ────────────────────────────────────────────────────

  get length(): number {
    return this.bytes.length;
  }

  isEmpty(): boolean {
    return this.bytes.length === 0;
  }

  /** A fresh copy of the underlying bytes. */
  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toHex(): HexString {
    return brand<"HexString", string>(Buffer.from(this.bytes).toString("hex"));
  }

  /**
   * Structural equality. Equal-length values are compared in constant time.
   */
  equals(other: SecureBytes): boolean {
    if (other.bytes.length !== this.bytes.length) return false;
    return timingSafeEqual(this.bytes, other.bytes);
  }

  // ─── Transforms ─────────────────────────────────────────────────

  slice(start?: number, end?: number): SecureBytes {
    return new SecureBytes(this.bytes.subarray(start, end));
  }

  concat(other: SecureBytes): SecureBytes {
    const joined = new Uint8Array(this.bytes.length + other.bytes.length);
    joined.set(this.bytes, 0);
    joined.set(other.bytes, this.bytes.length);
    return new SecureBytes(joined);
  }

  // ─── Rendering ──────────────────────────────────────────────────

  /** Never reveals the contents. */
  toString(): string {
    return `SecureBytes(${this.bytes.length} bytes)`;
  }

  toJSON(): string {
    return this.toString();
  }
}
