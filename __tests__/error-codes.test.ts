import { describe, it, expect } from "vitest";
import {
  SECURITY_ERROR_CODES,
  errorFromDetails,
  errorKindOfCode,
  fromDTO,
  toDTO,
} from "../src/codec/error-codes.js";
import {
  fromOperationResult,
  isOperationSuccess,
  toOperationResult,
  toOperationResultWith,
} from "../src/codec/dto.js";
import {
  SECURITY_ERROR_KINDS,
  SecurityErrors,
  SecurityServiceError,
} from "../src/types/errors.js";
import type { SecurityError } from "../src/types/errors.js";
import { err, ok } from "../src/types/result.js";
import {
  createSecurityConfig,
  operationFailure,
  withOptions,
} from "../src/types/dto.js";

describe("DTO error codes", () => {
  describe("SECURITY_ERROR_CODES", () => {
    it("should keep the published wire codes", () => {
      expect(SECURITY_ERROR_CODES.serviceUnavailable).toBe(1);
      expect(SECURITY_ERROR_CODES.invalidInput).toBe(1001);
      expect(SECURITY_ERROR_CODES.invalidState).toBe(1002);
      expect(SECURITY_ERROR_CODES.cryptographicError).toBe(1003);
      expect(SECURITY_ERROR_CODES.notImplemented).toBe(1004);
      expect(SECURITY_ERROR_CODES.invalidData).toBe(1005);
      expect(SECURITY_ERROR_CODES.operationNotSupported).toBe(1006);
      expect(SECURITY_ERROR_CODES.internalError).toBe(10000);
    });

    it("should assign a distinct code to every kind", () => {
      const codes = SECURITY_ERROR_KINDS.map((kind) => SECURITY_ERROR_CODES[kind]);
      expect(new Set(codes).size).toBe(SECURITY_ERROR_KINDS.length);
    });
  });

  describe("errorKindOfCode()", () => {
    it("should invert the table", () => {
      expect(errorKindOfCode(1003)).toBe("cryptographicError");
      expect(errorKindOfCode(12345)).toBeNull();
    });
  });

  describe("toDTO()", () => {
    it("should encode cryptographicError as 1003 with the operation detail", () => {
      const dto = toDTO(SecurityErrors.cryptographicError("encryption", "x"));
      expect(dto.errorCode).toBe(1003);
      expect(dto.details["operation"]).toBe("encryption");
      expect(dto.errorMessage).toBe("Cryptographic error in encryption: x");
    });

    it("should stringify numeric payloads", () => {
      expect(toDTO(SecurityErrors.timeout(1500)).details).toEqual({
        kind: "timeout",
        afterMs: "1500",
      });
    });
  });

  describe("fromDTO()", () => {
    it("should restore every kind from its DTO form", () => {
      const samples: SecurityError[] = [
        SecurityErrors.serviceUnavailable(),
        SecurityErrors.timeout(10),
        SecurityErrors.invalidKeyType("hmac", "symmetric"),
        SecurityErrors.cryptographicError("decryption", "tag"),
        SecurityErrors.connectionInvalidated("closed"),
        SecurityErrors.notImplemented("Key generation not implemented"),
      ];
      for (const error of samples) {
        expect(fromDTO(toDTO(error))).toEqual(error);
      }
    });
  });

  describe("errorFromDetails()", () => {
    it("should prefer the declared kind over the code", () => {
      expect(errorFromDetails(1, "m", { kind: "keyNotFound", identifier: "k" })).toEqual(
        SecurityErrors.keyNotFound("k")
      );
    });

    it("should fall back to the message for missing fields", () => {
      expect(errorFromDetails(1005, "Truncated", {})).toEqual(
        SecurityErrors.invalidData("Truncated")
      );
    });

    it("should default a missing crypto operation to unspecified", () => {
      expect(errorFromDetails(1003, "fault", {})).toEqual(
        SecurityErrors.cryptographicError("unspecified", "fault")
      );
    });

    it("should map an unknown code to internalError", () => {
      expect(errorFromDetails(4242, "odd", {})).toEqual(
        SecurityErrors.internalError("odd")
      );
    });
  });
});

describe("OperationResult conversion", () => {
  describe("toOperationResult()", () => {
    it("should map success directly", () => {
      expect(toOperationResult(ok(7))).toEqual({ status: "success", value: 7 });
    });

    it("should map failure to code, message and details", () => {
      expect(toOperationResult(err(SecurityErrors.invalidInput("empty")))).toEqual(
        operationFailure(1001, "Invalid input: empty", {
          kind: "invalidInput",
          details: "empty",
        })
      );
    });

    it("should round-trip every error kind", () => {
      const samples: SecurityError[] = [
        SecurityErrors.serviceNotReady("r"),
        SecurityErrors.authenticationFailed("r"),
        SecurityErrors.authorizationDenied("op"),
        SecurityErrors.operationNotSupported("op"),
        SecurityErrors.invalidState("d"),
        SecurityErrors.encryptionFailed("r"),
        SecurityErrors.decryptionFailed("r"),
        SecurityErrors.keyGenerationFailed("r"),
        SecurityErrors.internalError("r"),
        SecurityErrors.connectionInterrupted(),
      ];
      for (const error of samples) {
        expect(fromOperationResult(toOperationResult(err(error)))).toEqual(err(error));
      }
    });
  });

  describe("toOperationResultWith()", () => {
    it("should transform only success values", () => {
      expect(toOperationResultWith(ok(2), (n) => n * 10)).toEqual({
        status: "success",
        value: 20,
      });
      expect(
        toOperationResultWith(err(SecurityErrors.serviceUnavailable()), (n: number) => n)
      ).toEqual(
        operationFailure(1, "Security service is unavailable", {
          kind: "serviceUnavailable",
        })
      );
    });
  });
  describe("isOperationSuccess()", () => {
    it("should narrow on the status tag", () => {
      const success = toOperationResult(ok("k1"));
      const failure = toOperationResult<string>(err(SecurityErrors.keyNotFound("k1")));
      expect(isOperationSuccess(success)).toBe(true);
      expect(isOperationSuccess(failure)).toBe(false);
      expect(isOperationSuccess(success) && success.value).toBe("k1");
    });
  });
});

describe("SecurityConfig", () => {
  describe("createSecurityConfig()", () => {
    it("should default options to an empty frozen map", () => {
      const config = createSecurityConfig({ algorithm: "AES-GCM", keySizeInBits: 256 });
      expect(config.options).toEqual({});
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.options)).toBe(true);
    });

    it("should throw invalidInput for an empty algorithm", () => {
      expect(() => createSecurityConfig({ algorithm: "", keySizeInBits: 256 })).toThrow(
        SecurityServiceError
      );
      expect(() => createSecurityConfig({ algorithm: "", keySizeInBits: 256 })).toThrow(
        "Invalid input: algorithm: algorithm must not be empty"
      );
    });
  });

  describe("withOptions()", () => {
    it("should merge options over the originals", () => {
      const base = createSecurityConfig({
        algorithm: "HMAC",
        keySizeInBits: 256,
        options: { keyIdentifier: "a", purpose: "x" },
      });
      expect(withOptions(base, { keyIdentifier: "b" }).options).toEqual({
        keyIdentifier: "b",
        purpose: "x",
      });
      expect(base.options["keyIdentifier"]).toBe("a");
    });
  });
});
