/**
 * @module types/protocol
 * @description Capability tiers, their negotiation identifiers, and the
 * protocol version constants.
 *
 * Each tier advertises a stable dotted identifier. Negotiation compares
 * identifiers, never structural shape. DTO tiers use a parallel identifier
 * with a `.dto` suffix.
 */

import type { ProtocolIdentifier, ProtocolVersion } from "./branded.js";
import { brand } from "./branded.js";

export type CapabilityTier = "basic" | "standard" | "complete";

export const CAPABILITY_TIERS: readonly CapabilityTier[] = [
  "basic",
  "standard",
  "complete",
];

export const DEFAULT_NAMESPACE = "com.securerpc";

export interface ProtocolIdentifierSet {
  readonly basic: ProtocolIdentifier;
  readonly standard: ProtocolIdentifier;
  readonly complete: ProtocolIdentifier;
  readonly basicDTO: ProtocolIdentifier;
  readonly standardDTO: ProtocolIdentifier;
  readonly completeDTO: ProtocolIdentifier;
}

function identifier(
  namespace: string,
  tier: CapabilityTier,
  dto: boolean
): ProtocolIdentifier {
  const base = `${namespace}.xpc.service.${tier}`;
  return brand<"ProtocolIdentifier", string>(dto ? `${base}.dto` : base);
}

/**
 * Build the identifier set for a service namespace.
 *
 * @example
 * ```ts
 * protocolIdentifiers("com.example").standard;
 * // "com.example.xpc.service.standard"
 * ```
 */
export function protocolIdentifiers(
  namespace: string = DEFAULT_NAMESPACE
): ProtocolIdentifierSet {
  return Object.freeze({
    basic: identifier(namespace, "basic", false),
    standard: identifier(namespace, "standard", false),
    complete: identifier(namespace, "complete", false),
    basicDTO: identifier(namespace, "basic", true),
    standardDTO: identifier(namespace, "standard", true),
    completeDTO: identifier(namespace, "complete", true),
  });
}

export interface NegotiatedProtocol {
  readonly tier: CapabilityTier;
  readonly dto: boolean;
}

/**
 * Resolve an advertised identifier to the tier it names within a namespace.
 * Returns null for identifiers outside the namespace or naming no tier.
 */
export function negotiateTier(
  advertised: string,
  namespace: string = DEFAULT_NAMESPACE
): NegotiatedProtocol | null {
  const ids = protocolIdentifiers(namespace);
  for (const tier of CAPABILITY_TIERS) {
    if (advertised === ids[tier]) return { tier, dto: false };
    if (advertised === identifier(namespace, tier, true)) {
      return { tier, dto: true };
    }
  }
  return null;
}

/** Whether a service offering `offered` satisfies a caller needing `required`. */
export function tierSatisfies(
  offered: CapabilityTier,
  required: CapabilityTier
): boolean {
  return CAPABILITY_TIERS.indexOf(offered) >= CAPABILITY_TIERS.indexOf(required);
}

// ─── Versioning ─────────────────────────────────────────────────────

export const PROTOCOL_VERSION = {
  current: brand<"ProtocolVersion", string>("2.0.0"),
  minimum: brand<"ProtocolVersion", string>("1.0.0"),
} as const;

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\d+)$/;

/**
 * Parse a `major.minor.patch` string.
 */
export function parseProtocolVersion(
  version: string
): readonly [number, number, number] | null {
  const match = VERSION_PATTERN.exec(version);
  if (!match) return null;
  return [Number(match[1]), Number(match[2]), Number(match[3])];
}

function compareVersions(
  a: readonly [number, number, number],
  b: readonly [number, number, number]
): number {
  for (let i = 0; i < 3; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

/**
 * Whether a peer's version lies within [minimum, current].
 */
export function isProtocolVersionSupported(
  version: string
): version is ProtocolVersion {
  const parsed = parseProtocolVersion(version);
  const min = parseProtocolVersion(PROTOCOL_VERSION.minimum);
  const max = parseProtocolVersion(PROTOCOL_VERSION.current);
  if (!parsed || !min || !max) return false;
  return compareVersions(parsed, min) >= 0 && compareVersions(parsed, max) <= 0;
}
