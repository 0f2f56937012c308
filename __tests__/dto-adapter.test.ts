import { describe, it, expect, beforeEach } from "vitest";
import {
  BasicSecurityDTOAdapter,
  CompleteSecurityDTOAdapter,
  StandardSecurityDTOAdapter,
  hexOption,
  iterationsOption,
  keyFormatOption,
  keyTypeFor,
  settle,
} from "../src/primitives/dto-adapter.js";
import { CompleteSecurityAdapter } from "../src/primitives/complete-adapter.js";
import { StandardSecurityAdapter } from "../src/primitives/standard-adapter.js";
import { BasicSecurityAdapter } from "../src/primitives/basic-adapter.js";
import { InMemoryServiceConnection } from "../src/transports/in-memory.js";
import { createSecurityConfig } from "../src/types/dto.js";
import { SecureBytes } from "../src/types/secure-bytes.js";
import { SecurityErrors } from "../src/types/errors.js";
import { err, ok } from "../src/types/result.js";
import {
  NativeErrorDomain,
  TransportErrorCode,
  nativeError,
} from "../src/types/transport.js";
import { FakeSecurityService } from "./helpers/fake-service.js";

const AES = createSecurityConfig({ algorithm: "AES-GCM", keySizeInBits: 256 });

function configFor(algorithm: string, options: Record<string, string> = {}) {
  return createSecurityConfig({ algorithm, keySizeInBits: 256, options });
}

describe("DTO option readers", () => {
  describe("keyTypeFor()", () => {
    it("should infer the key type from the algorithm", () => {
      expect(keyTypeFor(configFor("AES-GCM"))).toEqual(ok("symmetric"));
      expect(keyTypeFor(configFor("ChaCha20-Poly1305"))).toEqual(ok("symmetric"));
      expect(keyTypeFor(configFor("X25519"))).toEqual(ok("asymmetric"));
      expect(keyTypeFor(configFor("RSA-OAEP"))).toEqual(ok("asymmetric"));
      expect(keyTypeFor(configFor("HMAC-SHA256"))).toEqual(ok("hmac"));
    });

    it("should prefer a declared keyType option", () => {
      expect(keyTypeFor(configFor("AES-GCM", { keyType: "hmac" }))).toEqual(ok("hmac"));
      expect(keyTypeFor(configFor("AES-GCM", { keyType: "bogus" }))).toEqual(
        err(SecurityErrors.invalidKeyType("symmetric|asymmetric|hmac", "bogus"))
      );
    });

    it("should fail for an algorithm it cannot place", () => {
      expect(keyTypeFor(configFor("Blowfish"))).toEqual(
        err(SecurityErrors.invalidInput("Cannot infer a key type for algorithm Blowfish"))
      );
    });
  });

  describe("iterationsOption()", () => {
    it("should default and validate", () => {
      expect(iterationsOption(AES)).toEqual(ok(10000));
      expect(iterationsOption(configFor("PBKDF2", { iterations: "600" }))).toEqual(ok(600));
      expect(iterationsOption(configFor("PBKDF2", { iterations: "0" }))).toEqual(
        err(SecurityErrors.invalidInput("Invalid iterations option: 0"))
      );
    });
  });

  describe("hexOption()", () => {
    it("should decode hex and reject anything else", () => {
      const decoded = hexOption(configFor("PBKDF2", { salt: "0a0b" }), "salt");
      expect(decoded.ok && decoded.value?.toHex()).toBe("0a0b");
      expect(hexOption(AES, "salt")).toEqual(ok(null));
      expect(hexOption(configFor("PBKDF2", { salt: "zz" }), "salt")).toEqual(
        err(SecurityErrors.invalidInput("Option salt is not hex encoded"))
      );
    });
  });

  describe("keyFormatOption()", () => {
    it("should default to raw", () => {
      expect(keyFormatOption(AES)).toEqual(ok("raw"));
      expect(keyFormatOption(configFor("RSA", { format: "spki" }))).toEqual(ok("spki"));
    });
  });
});

describe("settle()", () => {
  it("should wrap a success", async () => {
    await expect(settle(async () => ok(5))).resolves.toEqual({
      status: "success",
      value: 5,
    });
  });

  it("should classify a throw from the wrapped service", async () => {
    const failure = await settle<number>(() => {
      throw nativeError(NativeErrorDomain.transport, TransportErrorCode.timedOut, "late", {
        afterMs: "50",
      });
    });
    expect(failure).toEqual({
      status: "failure",
      errorCode: 3,
      errorMessage: "Operation timed out after 50 ms",
      details: { kind: "timeout", afterMs: "50" },
    });
  });
});

describe("BasicSecurityDTOAdapter", () => {
  it("should suffix the native identifier and wrap ping", async () => {
    const dto = new BasicSecurityDTOAdapter(
      new BasicSecurityAdapter(new InMemoryServiceConnection(new FakeSecurityService().handlers()))
    );
    expect(dto.identify()).toBe("com.securerpc.xpc.service.basic.dto");
    await expect(dto.pingWithDTO()).resolves.toEqual({ status: "success", value: true });
  });
});

describe("StandardSecurityDTOAdapter", () => {
  let connection: InMemoryServiceConnection;
  let dto: StandardSecurityDTOAdapter;

  beforeEach(() => {
    connection = new InMemoryServiceConnection(new FakeSecurityService().handlers());
    dto = new StandardSecurityDTOAdapter(new StandardSecurityAdapter(connection));
  });

  describe("encryptSecureDataWithDTO()", () => {
    it("should pass the keyIdentifier option or the default key", async () => {
      await dto.encryptSecureDataWithDTO(SecureBytes.fromUtf8("a"), AES);
      await dto.encryptSecureDataWithDTO(
        SecureBytes.fromUtf8("a"),
        configFor("AES-GCM", { keyIdentifier: "k1" })
      );
      expect(connection.calls.map((call) => call.args[1])).toEqual([null, "k1"]);
    });

    it("should report the local validation failure with its code", async () => {
      await expect(dto.encryptSecureDataWithDTO(SecureBytes.empty(), AES)).resolves.toEqual({
        status: "failure",
        errorCode: 1005,
        errorMessage: "Invalid data: Cannot encrypt empty data",
        details: { kind: "invalidData", reason: "Cannot encrypt empty data" },
      });
    });
  });

  describe("signWithDTO()", () => {
    it("should require the keyIdentifier option", async () => {
      const result = await dto.signWithDTO(SecureBytes.fromUtf8("a"), AES);
      expect(result).toMatchObject({
        status: "failure",
        errorCode: 1001,
        errorMessage: "Invalid input: Missing keyIdentifier option",
      });
      expect(connection.callCount()).toBe(0);
    });
  });

  describe("getHardwareIdentifierWithDTO()", () => {
    it("should wrap the service identifier", async () => {
      await expect(dto.getHardwareIdentifierWithDTO()).resolves.toEqual({
        status: "success",
        value: "hw-test-0001",
      });
    });

    it("should report a service without the operation as 1006", async () => {
      const bare = new StandardSecurityDTOAdapter(
        new StandardSecurityAdapter(new InMemoryServiceConnection({}))
      );
      await expect(bare.getHardwareIdentifierWithDTO()).resolves.toMatchObject({
        status: "failure",
        errorCode: 1006,
        errorMessage: "Operation not supported: getHardwareIdentifier",
      });
    });
  });

  describe("statusWithDTO()", () => {
    it("should wrap the composed status", async () => {
      await expect(dto.statusWithDTO()).resolves.toMatchObject({
        status: "success",
        value: { version: "2.0.0", state: "operational" },
      });
    });
  });
});

describe("CompleteSecurityDTOAdapter", () => {
  let service: FakeSecurityService;
  let connection: InMemoryServiceConnection;
  let dto: CompleteSecurityDTOAdapter;

  beforeEach(() => {
    service = new FakeSecurityService();
    connection = new InMemoryServiceConnection(service.handlers());
    dto = new CompleteSecurityDTOAdapter(new CompleteSecurityAdapter(connection));
  });

  it("should identify as the complete DTO protocol", () => {
    expect(dto.identify()).toBe("com.securerpc.xpc.service.complete.dto");
  });

  describe("generateKeyWithDTO()", () => {
    it("should build the request from the configuration", async () => {
      const result = await dto.generateKeyWithDTO(
        createSecurityConfig({
          algorithm: "AES-GCM",
          keySizeInBits: 128,
          options: { keyIdentifier: "k1", purpose: "files" },
        })
      );
      expect(result).toEqual({ status: "success", value: "k1" });
      expect(service.keys.get("k1")).toMatchObject({ keyType: "symmetric", purpose: "files" });
      expect(service.keys.get("k1")?.bytes.length).toBe(16);
    });
  });

  describe("exportKeyWithDTO()", () => {
    it("should reject an unknown format without a round trip", async () => {
      await expect(
        dto.exportKeyWithDTO("k1", configFor("AES-GCM", { format: "pem" }))
      ).resolves.toMatchObject({
        status: "failure",
        errorCode: 1001,
        errorMessage: "Invalid input: Unsupported key format: pem",
      });
      expect(connection.callCount()).toBe(0);
    });
  });

  describe("getKeyMetadataWithDTO()", () => {
    it("should report a missing key as 1007", async () => {
      await expect(dto.getKeyMetadataWithDTO("missing")).resolves.toEqual({
        status: "failure",
        errorCode: 1007,
        errorMessage: "Key not found: missing",
        details: { kind: "keyNotFound", identifier: "missing" },
      });
    });
  });

  describe("encryptAuthenticatedWithDTO()", () => {
    it("should reject associated data that is not hex", async () => {
      await expect(
        dto.encryptAuthenticatedWithDTO(
          SecureBytes.fromUtf8("a"),
          configFor("AES-GCM", { keyIdentifier: "k1", associatedData: "xyz" })
        )
      ).resolves.toMatchObject({
        status: "failure",
        errorCode: 1001,
        errorMessage: "Invalid input: Option associatedData is not hex encoded",
      });
    });
  });

  describe("deriveKeyFromPasswordWithDTO()", () => {
    it("should reject an invalid iterations option", async () => {
      await expect(
        dto.deriveKeyFromPasswordWithDTO(
          SecureBytes.fromUtf8("test-secret"),
          configFor("PBKDF2", { iterations: "-3" })
        )
      ).resolves.toMatchObject({
        status: "failure",
        errorMessage: "Invalid input: Invalid iterations option: -3",
      });
    });
  });

  describe("performSecureOperationWithDTO()", () => {
    it("should merge the algorithm into the options", async () => {
      const result = await dto.performSecureOperationWithDTO(
        "teleport",
        [],
        configFor("AES-GCM", { mode: "x" })
      );
      expect(result).toMatchObject({
        status: "failure",
        errorCode: 1006,
        errorMessage: "Operation not supported: teleport",
      });
      expect(connection.calls[0]?.args[2]).toEqual({ mode: "x", algorithm: "AES-GCM" });
    });
  });
});
