/**
 * @module types/transport
 * @description Wire-level types of the connection to the security service.
 *
 * Every forwarded call names one remote operation from a closed table and
 * carries at most three positional arguments. Calls needing more logical
 * parameters marshal them into a single ParameterBag. The table is checked
 * at compile time: adding a fourth position to any operation is a type error.
 */

// ─── Wire Values ────────────────────────────────────────────────────

/**
 * A value that can cross the connection. Structured-clone compatible.
 */
export type TransportValue =
  | string
  | number
  | boolean
  | null
  | Uint8Array
  | readonly TransportValue[]
  | { readonly [key: string]: TransportValue };

/**
 * Single structured argument used in place of extra positional arguments.
 */
export type ParameterBag = Readonly<
  Record<string, string | number | boolean | Uint8Array | null>
>;

// ─── Remote Operation Table ─────────────────────────────────────────

type Arity =
  | readonly []
  | readonly [TransportValue]
  | readonly [TransportValue, TransportValue]
  | readonly [TransportValue, TransportValue, TransportValue];

type CheckArity<T extends { readonly [K in keyof T]: Arity }> = T;

/**
 * Remote operation name → positional argument tuple.
 */
export type RemoteOperations = CheckArity<{
  // Basic
  ping: [];
  synchroniseKeys: [syncData: Uint8Array];
  // Standard
  generateRandomData: [length: number];
  encryptData: [data: Uint8Array, keyIdentifier: string | null];
  decryptData: [data: Uint8Array, keyIdentifier: string | null];
  hashData: [data: Uint8Array];
  signData: [data: Uint8Array, keyIdentifier: string];
  verifyData: [signature: Uint8Array, data: Uint8Array, keyIdentifier: string];
  getServiceVersion: [];
  getHardwareIdentifier: [];
  getServiceStatusCode: [];
  resetSecurity: [];
  // Complete: key lifecycle
  generateKey: [request: ParameterBag];
  importKey: [keyData: Uint8Array, request: ParameterBag];
  exportKey: [keyIdentifier: string, format: string];
  deleteKey: [keyIdentifier: string];
  listKeyIdentifiers: [];
  getKeyMetadata: [keyIdentifier: string];
  // Complete: derivation
  deriveKeyFromPassword: [password: Uint8Array, parameters: ParameterBag];
  deriveKeyFromKey: [
    sourceKeyIdentifier: string,
    algorithm: string,
    keySizeInBits: number,
  ];
  // Complete: authenticated encryption and signatures
  encryptAuthenticated: [
    data: Uint8Array,
    keyIdentifier: string,
    associatedData: Uint8Array | null,
  ];
  decryptAuthenticated: [
    data: Uint8Array,
    keyIdentifier: string,
    associatedData: Uint8Array | null,
  ];
  generateSignature: [data: Uint8Array, keyIdentifier: string, algorithm: string];
  verifySignature: [request: ParameterBag];
  // Complete: backup
  createSecureBackup: [password: Uint8Array];
  restoreSecureBackup: [backup: Uint8Array, password: Uint8Array];
  // Complete: lifecycle
  resetService: [];
  getDiagnosticInfo: [];
  getConfiguration: [];
  setConfiguration: [configuration: ParameterBag];
  getMetrics: [];
  performSecureOperation: [
    operation: string,
    inputs: readonly Uint8Array[],
    parameters: ParameterBag,
  ];
}>;

export type RemoteOperationName = keyof RemoteOperations;

export type RemoteArguments<O extends RemoteOperationName> = RemoteOperations[O];

// ─── Replies ────────────────────────────────────────────────────────

/**
 * The four reply shapes a connection delivers. Connections hand replies
 * over as `unknown`; they are validated before use.
 */
export type TransportReply =
  | { readonly kind: "error"; readonly error: unknown }
  | { readonly kind: "data"; readonly data: Uint8Array }
  | { readonly kind: "value"; readonly value: TransportValue }
  | { readonly kind: "noData" };

export const NO_DATA_REPLY: TransportReply = Object.freeze({ kind: "noData" });

export function dataReply(data: Uint8Array): TransportReply {
  return { kind: "data", data };
}

export function valueReply(value: TransportValue): TransportReply {
  return { kind: "value", value };
}

export function errorReply(error: unknown): TransportReply {
  return { kind: "error", error };
}

// ─── Native Errors ──────────────────────────────────────────────────

/**
 * An error as the connection or the remote service represents it:
 * a domain, a numeric code, a message and an optional string map.
 */
export interface NativeError {
  readonly domain: string;
  readonly code: number;
  readonly message: string;
  readonly userInfo?: Readonly<Record<string, string>>;
}

export const NativeErrorDomain = {
  /** This library's own encoding, produced by `toNative`. */
  core: "rpc.security.core",
  /** Failures of the connection itself. */
  transport: "rpc.security.transport",
  /** Faults raised by the service's cryptographic provider. */
  crypto: "rpc.security.crypto",
  /** Errors raised by the service's own operation handlers. */
  service: "rpc.security.service",
} as const;

export const TransportErrorCode = {
  timedOut: 1,
  interrupted: 2,
  invalidated: 3,
  unrecognizedOperation: 4,
  unreachable: 5,
} as const;

export const ServiceErrorCode = {
  serviceUnavailable: 1001,
  authorizationDenied: 1002,
  operationNotSupported: 1003,
  keyNotFound: 1004,
  invalidKeyType: 1005,
  authenticationFailed: 1006,
  serviceNotReady: 1007,
  invalidState: 1008,
} as const;

export function nativeError(
  domain: string,
  code: number,
  message: string,
  userInfo?: Readonly<Record<string, string>>
): NativeError {
  return userInfo === undefined
    ? { domain, code, message }
    : { domain, code, message, userInfo };
}
