import { describe, it, expect } from "vitest";
import { classify, isSecurityError, toNative } from "../src/codec/error-mapper.js";
import type { SecurityError } from "../src/types/errors.js";
import {
  SecurityErrors,
  SecurityServiceError,
  describeSecurityError,
  isTransportFailure,
  securityErrorEquals,
} from "../src/types/errors.js";
import {
  NativeErrorDomain,
  ServiceErrorCode,
  TransportErrorCode,
  nativeError,
} from "../src/types/transport.js";

const SAMPLES: readonly SecurityError[] = [
  SecurityErrors.serviceUnavailable(),
  SecurityErrors.serviceNotReady("warming up"),
  SecurityErrors.timeout(2500),
  SecurityErrors.authenticationFailed("bad password"),
  SecurityErrors.authorizationDenied("exportKey"),
  SecurityErrors.operationNotSupported("getMetrics"),
  SecurityErrors.invalidInput("length"),
  SecurityErrors.invalidData("truncated"),
  SecurityErrors.invalidState("locked"),
  SecurityErrors.keyNotFound("key-1"),
  SecurityErrors.invalidKeyType("symmetric", "hmac"),
  SecurityErrors.cryptographicError("encryption", "bad tag"),
  SecurityErrors.encryptionFailed("no key"),
  SecurityErrors.decryptionFailed("bad padding"),
  SecurityErrors.keyGenerationFailed("entropy"),
  SecurityErrors.notImplemented("later"),
  SecurityErrors.internalError("boom"),
  SecurityErrors.connectionInterrupted(),
  SecurityErrors.connectionInvalidated("peer exited"),
];

describe("Error Mapper", () => {
  describe("classify()", () => {
    it("should return an already-classified error unchanged", () => {
      for (const error of SAMPLES) {
        expect(classify(error)).toEqual(error);
      }
    });

    it("should be idempotent through the native encoding", () => {
      for (const error of SAMPLES) {
        const once = classify(error);
        expect(classify(toNative(once))).toEqual(once);
      }
    });

    it("should keep an unbounded timeout stable through the native encoding", () => {
      const error = SecurityErrors.timeout(Infinity);
      expect(classify(toNative(error))).toEqual(error);
      expect(classify(toNative(error))).toEqual({ kind: "timeout", afterMs: 0 });
    });

    it("should map an unknown domain to internalError", () => {
      expect(classify(nativeError("com.example.other", 42, "odd"))).toEqual(
        SecurityErrors.internalError(
          "External error (domain: com.example.other, code: 42, message: odd)"
        )
      );
    });

    it("should map an unknown service code to internalError", () => {
      expect(
        classify(nativeError(NativeErrorDomain.service, 9999, "strange"))
      ).toEqual(
        SecurityErrors.internalError("Unknown error (code: 9999, message: strange)")
      );
    });

    it("should never throw for arbitrary values", () => {
      const cyclic: Record<string, unknown> = {};
      cyclic["self"] = cyclic;
      const values: unknown[] = [undefined, null, 0, "text", [], {}, cyclic, Symbol("s")];
      for (const value of values) {
        expect(() => classify(value)).not.toThrow();
        expect(classify(value).kind).toBe("internalError");
      }
    });

    it("should describe strings verbatim", () => {
      expect(classify("socket gone")).toEqual(SecurityErrors.internalError("socket gone"));
    });

    it("should unwrap a SecurityServiceError", () => {
      const error = SecurityErrors.keyNotFound("k");
      expect(classify(new SecurityServiceError(error))).toEqual(error);
    });

    it("should turn a plain Error into internalError(message)", () => {
      expect(classify(new Error("kaput"))).toEqual(SecurityErrors.internalError("kaput"));
    });
  });

  describe("transport domain", () => {
    const transport = (code: number, message = "m", info?: Record<string, string>) =>
      classify(nativeError(NativeErrorDomain.transport, code, message, info));

    it("should map timedOut to timeout with the reported duration", () => {
      expect(transport(TransportErrorCode.timedOut, "slow", { afterMs: "750" })).toEqual(
        SecurityErrors.timeout(750)
      );
      expect(transport(TransportErrorCode.timedOut)).toEqual(SecurityErrors.timeout(0));
    });

    it("should read a numeric afterMs from userInfo", () => {
      expect(
        classify({
          domain: NativeErrorDomain.transport,
          code: TransportErrorCode.timedOut,
          message: "slow",
          userInfo: { afterMs: 750 },
        })
      ).toEqual(SecurityErrors.timeout(750));
    });

    it("should map connectivity failures", () => {
      expect(transport(TransportErrorCode.interrupted)).toEqual(
        SecurityErrors.connectionInterrupted()
      );
      expect(transport(TransportErrorCode.invalidated, "gone")).toEqual(
        SecurityErrors.connectionInvalidated("gone")
      );
      expect(transport(TransportErrorCode.unreachable)).toEqual(
        SecurityErrors.serviceUnavailable()
      );
    });

    it("should map an unrecognized operation to operationNotSupported", () => {
      expect(
        transport(TransportErrorCode.unrecognizedOperation, "Unrecognized operation: x", {
          operation: "getMetrics",
        })
      ).toEqual(SecurityErrors.operationNotSupported("getMetrics"));
    });

    it("should map an unknown transport code to connectionInterrupted", () => {
      expect(transport(77)).toEqual(SecurityErrors.connectionInterrupted());
    });
  });

  describe("crypto domain", () => {
    it("should sub-dispatch by suboperation", () => {
      const crypto = (operation: string | undefined) =>
        classify(
          nativeError(
            NativeErrorDomain.crypto,
            1,
            "provider fault",
            operation === undefined ? undefined : { operation }
          )
        );
      expect(crypto("encryption")).toEqual(
        SecurityErrors.cryptographicError("encryption", "provider fault")
      );
      expect(crypto("keyGeneration")).toEqual(
        SecurityErrors.cryptographicError("key generation", "provider fault")
      );
      expect(crypto("keyDerivation")).toEqual(
        SecurityErrors.cryptographicError("key derivation", "provider fault")
      );
      expect(crypto("authentication")).toEqual(
        SecurityErrors.cryptographicError("authentication", "provider fault")
      );
      expect(crypto(undefined)).toEqual(
        SecurityErrors.cryptographicError("unspecified", "provider fault")
      );
    });
  });

  describe("service domain", () => {
    const service = (code: number, message: string, info?: Record<string, string>) =>
      classify(nativeError(NativeErrorDomain.service, code, message, info));

    it("should recognise legacy messages before codes", () => {
      expect(service(1, "Invalid format of request")).toEqual(
        SecurityErrors.invalidInput("Invalid format of request")
      );
      expect(service(1, "Encryption failed")).toEqual(
        SecurityErrors.cryptographicError("encryption", "Encryption failed")
      );
      expect(service(1, "decryption failed: tag")).toEqual(
        SecurityErrors.cryptographicError("decryption", "decryption failed: tag")
      );
      expect(service(1, "Key not found: key-7")).toEqual(
        SecurityErrors.keyNotFound("key-7")
      );
    });

    it("should stringify userInfo values that are not strings", () => {
      expect(
        classify({
          domain: NativeErrorDomain.service,
          code: ServiceErrorCode.keyNotFound,
          message: "missing",
          userInfo: { keyIdentifier: 42, retryable: false },
        })
      ).toEqual(SecurityErrors.keyNotFound("42"));
    });

    it("should map service codes", () => {
      expect(service(ServiceErrorCode.serviceUnavailable, "down")).toEqual(
        SecurityErrors.serviceUnavailable()
      );
      expect(
        service(ServiceErrorCode.authorizationDenied, "no", { operation: "deleteKey" })
      ).toEqual(SecurityErrors.authorizationDenied("deleteKey"));
      expect(
        service(ServiceErrorCode.keyNotFound, "missing", { keyIdentifier: "key-2" })
      ).toEqual(SecurityErrors.keyNotFound("key-2"));
      expect(
        service(ServiceErrorCode.invalidKeyType, "wrong", {
          expected: "symmetric",
          received: "asymmetric",
        })
      ).toEqual(SecurityErrors.invalidKeyType("symmetric", "asymmetric"));
      expect(service(ServiceErrorCode.serviceNotReady, "booting")).toEqual(
        SecurityErrors.serviceNotReady("booting")
      );
    });
  });

  describe("system errors", () => {
    const systemError = (code: string, message: string): Error =>
      Object.assign(new Error(message), { code });

    it("should map Node error codes", () => {
      expect(classify(systemError("ECONNREFUSED", "refused"))).toEqual(
        SecurityErrors.serviceUnavailable()
      );
      expect(classify(systemError("EPIPE", "broken pipe"))).toEqual(
        SecurityErrors.connectionInterrupted()
      );
      expect(classify(systemError("ERR_IPC_CHANNEL_CLOSED", "Channel closed"))).toEqual(
        SecurityErrors.connectionInvalidated("Channel closed")
      );
      expect(classify(systemError("ETIMEDOUT", "slow"))).toEqual(
        SecurityErrors.timeout(0)
      );
    });

    it("should fall back to internalError for other codes", () => {
      expect(classify(systemError("EACCES", "denied"))).toEqual(
        SecurityErrors.internalError("denied")
      );
    });
  });

  describe("legacy DTO objects", () => {
    it("should go through the code table", () => {
      expect(
        classify({ errorCode: 1007, errorMessage: "Key not found: a", details: {} })
      ).toEqual(SecurityErrors.keyNotFound("Key not found: a"));
    });
  });

  describe("isSecurityError()", () => {
    it("should reject extra fields", () => {
      expect(isSecurityError({ kind: "serviceUnavailable" })).toBe(true);
      expect(isSecurityError({ kind: "serviceUnavailable", extra: 1 })).toBe(false);
    });
  });
});

describe("Error Taxonomy", () => {
  describe("SecurityErrors.timeout()", () => {
    it("should record a non-finite or negative duration as 0", () => {
      expect(SecurityErrors.timeout(Infinity).afterMs).toBe(0);
      expect(SecurityErrors.timeout(Number.NaN).afterMs).toBe(0);
      expect(SecurityErrors.timeout(-5).afterMs).toBe(0);
      expect(SecurityErrors.timeout(40).afterMs).toBe(40);
    });
  });

  describe("securityErrorEquals()", () => {
    it("should compare kind and payload", () => {
      expect(
        securityErrorEquals(SecurityErrors.keyNotFound("a"), SecurityErrors.keyNotFound("a"))
      ).toBe(true);
      expect(
        securityErrorEquals(SecurityErrors.keyNotFound("a"), SecurityErrors.keyNotFound("b"))
      ).toBe(false);
      expect(
        securityErrorEquals(
          SecurityErrors.invalidInput("a"),
          SecurityErrors.invalidState("a")
        )
      ).toBe(false);
    });
  });

  describe("describeSecurityError()", () => {
    it("should render payloads", () => {
      expect(
        describeSecurityError(SecurityErrors.cryptographicError("decryption", "bad tag"))
      ).toBe("Cryptographic error in decryption: bad tag");
      expect(describeSecurityError(SecurityErrors.timeout(30))).toBe(
        "Operation timed out after 30 ms"
      );
    });
  });

  describe("isTransportFailure()", () => {
    it("should single out the transport layer", () => {
      expect(isTransportFailure(SecurityErrors.timeout(1))).toBe(true);
      expect(isTransportFailure(SecurityErrors.connectionInterrupted())).toBe(true);
      expect(isTransportFailure(SecurityErrors.keyNotFound("k"))).toBe(false);
    });
  });
});
