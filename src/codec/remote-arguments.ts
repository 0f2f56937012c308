/**
 * @module codec/remote-arguments
 * @description Argument schemas for every remote operation, used by the
 * receiving end of a connection to validate what arrived on the wire.
 */

import { z } from "zod";
import type {
  RemoteArguments,
  RemoteOperationName,
} from "../types/transport.js";

const bytes = z.instanceof(Uint8Array);
const text = z.string();
const bag = z.record(z.union([z.string(), z.number(), z.boolean(), bytes, z.null()]));

type ArgumentSchemas = {
  readonly [O in RemoteOperationName]: z.ZodType<
    RemoteArguments<O>,
    z.ZodTypeDef,
    unknown
  >;
};

export const remoteArgumentSchemas: ArgumentSchemas = {
  ping: z.tuple([]),
  synchroniseKeys: z.tuple([bytes]),
  generateRandomData: z.tuple([z.number().int().nonnegative()]),
  encryptData: z.tuple([bytes, text.nullable()]),
  decryptData: z.tuple([bytes, text.nullable()]),
  hashData: z.tuple([bytes]),
  signData: z.tuple([bytes, text]),
  verifyData: z.tuple([bytes, bytes, text]),
  getServiceVersion: z.tuple([]),
  getHardwareIdentifier: z.tuple([]),
  getServiceStatusCode: z.tuple([]),
  resetSecurity: z.tuple([]),
  generateKey: z.tuple([bag]),
  importKey: z.tuple([bytes, bag]),
  exportKey: z.tuple([text, text]),
  deleteKey: z.tuple([text]),
  listKeyIdentifiers: z.tuple([]),
  getKeyMetadata: z.tuple([text]),
  deriveKeyFromPassword: z.tuple([bytes, bag]),
  deriveKeyFromKey: z.tuple([text, text, z.number().int()]),
  encryptAuthenticated: z.tuple([bytes, text, bytes.nullable()]),
  decryptAuthenticated: z.tuple([bytes, text, bytes.nullable()]),
  generateSignature: z.tuple([bytes, text, text]),
  verifySignature: z.tuple([bag]),
  createSecureBackup: z.tuple([bytes]),
  restoreSecureBackup: z.tuple([bytes, bytes]),
  resetService: z.tuple([]),
  getDiagnosticInfo: z.tuple([]),
  getConfiguration: z.tuple([]),
  setConfiguration: z.tuple([bag]),
  getMetrics: z.tuple([]),
  performSecureOperation: z.tuple([text, z.array(bytes), bag]),
};

export const REMOTE_OPERATION_NAMES: readonly RemoteOperationName[] = [
  "ping",
  "synchroniseKeys",
  "generateRandomData",
  "encryptData",
  "decryptData",
  "hashData",
  "signData",
  "verifyData",
  "getServiceVersion",
  "getHardwareIdentifier",
  "getServiceStatusCode",
  "resetSecurity",
  "generateKey",
  "importKey",
  "exportKey",
  "deleteKey",
  "listKeyIdentifiers",
  "getKeyMetadata",
  "deriveKeyFromPassword",
  "deriveKeyFromKey",
  "encryptAuthenticated",
  "decryptAuthenticated",
  "generateSignature",
  "verifySignature",
  "createSecureBackup",
  "restoreSecureBackup",
  "resetService",
  "getDiagnosticInfo",
  "getConfiguration",
  "setConfiguration",
  "getMetrics",
  "performSecureOperation",
];

export function isRemoteOperation(name: string): name is RemoteOperationName {
  return REMOTE_OPERATION_NAMES.some((operation) => operation === name);
}
