import { describe, it, expect } from "vitest";
import { z } from "zod";
import {
  UNEXPECTED_RESULT_FORMAT,
  interpretBytesReply,
  interpretReply,
  interpretValueReply,
  interpretVoidReply,
  toParameterBag,
} from "../src/codec/marshaling.js";
import { isRemoteOperation, remoteArgumentSchemas } from "../src/codec/remote-arguments.js";
import { SecurityErrors } from "../src/types/errors.js";
import { err, ok } from "../src/types/result.js";
import {
  NO_DATA_REPLY,
  NativeErrorDomain,
  TransportErrorCode,
  dataReply,
  errorReply,
  nativeError,
  valueReply,
} from "../src/types/transport.js";

const unexpected = err(SecurityErrors.invalidData(UNEXPECTED_RESULT_FORMAT));

describe("Transport Marshaling", () => {
  describe("interpretReply()", () => {
    it("should transform a data reply", () => {
      expect(interpretReply(dataReply(new Uint8Array([1, 2, 3])), (raw) => raw.length)).toEqual(
        ok(3)
      );
    });

    it("should classify an error reply", () => {
      const reply = errorReply(
        nativeError(NativeErrorDomain.transport, TransportErrorCode.interrupted, "lost")
      );
      expect(interpretReply(reply, () => 0)).toEqual(
        err(SecurityErrors.connectionInterrupted())
      );
    });

    it("should turn a throwing transform into invalidData", () => {
      const result = interpretReply(dataReply(new Uint8Array([1])), () => {
        throw new Error("short buffer");
      });
      expect(result).toEqual(err(SecurityErrors.invalidData("short buffer")));
    });

    it("should reject unexpected shapes without throwing", () => {
      const shapes: unknown[] = [
        undefined,
        null,
        42,
        "data",
        { kind: "data", data: "not bytes" },
        { kind: "mystery" },
        NO_DATA_REPLY,
        valueReply(true),
      ];
      for (const shape of shapes) {
        expect(interpretReply(shape, () => 0)).toEqual(unexpected);
      }
    });
  });

  describe("interpretBytesReply()", () => {
    it("should wrap the payload in SecureBytes", () => {
      const result = interpretBytesReply(dataReply(new Uint8Array([0xab])));
      expect(result.ok && result.value.toHex()).toBe("ab");
    });
  });

  describe("interpretVoidReply()", () => {
    it("should accept noData and data replies", () => {
      expect(interpretVoidReply(NO_DATA_REPLY)).toEqual(ok(undefined));
      expect(interpretVoidReply(dataReply(new Uint8Array()))).toEqual(ok(undefined));
    });

    it("should reject a value reply", () => {
      expect(interpretVoidReply(valueReply("x"))).toEqual(unexpected);
    });
  });

  describe("interpretValueReply()", () => {
    it("should validate the value against the schema", () => {
      expect(interpretValueReply(valueReply("2.0.0"), z.string())).toEqual(ok("2.0.0"));
      expect(interpretValueReply(valueReply(7), z.string())).toEqual(unexpected);
    });

    it("should reject a data reply", () => {
      expect(interpretValueReply(dataReply(new Uint8Array([1])), z.boolean())).toEqual(
        unexpected
      );
    });
  });

  describe("toParameterBag()", () => {
    it("should drop undefined entries", () => {
      expect(toParameterBag({ a: "x", b: undefined, c: null, d: 0 })).toEqual({
        a: "x",
        c: null,
        d: 0,
      });
    });
  });
});

describe("Remote argument schemas", () => {
  describe("isRemoteOperation()", () => {
    it("should recognise the operation table", () => {
      expect(isRemoteOperation("encryptData")).toBe(true);
      expect(isRemoteOperation("launchMissiles")).toBe(false);
    });
  });

  describe("remoteArgumentSchemas", () => {
    it("should accept well-formed argument tuples", () => {
      expect(
        remoteArgumentSchemas.encryptData.safeParse([new Uint8Array([1]), null]).success
      ).toBe(true);
      expect(
        remoteArgumentSchemas.performSecureOperation.safeParse([
          "deriveSharedSecret",
          [new Uint8Array([1])],
          { algorithm: "X25519" },
        ]).success
      ).toBe(true);
    });

    it("should reject wrong types and arities", () => {
      expect(remoteArgumentSchemas.hashData.safeParse(["text"]).success).toBe(false);
      expect(remoteArgumentSchemas.ping.safeParse([1]).success).toBe(false);
      expect(remoteArgumentSchemas.generateRandomData.safeParse([-1]).success).toBe(false);
    });
  });
});
