import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { MessageChannel } from "node:worker_threads";
import type { MessagePort } from "node:worker_threads";
import { z } from "zod";
import {
  MessagePortServiceConnection,
  attachServiceResponder,
} from "../src/transports/message-port.js";
import { StandardSecurityAdapter } from "../src/primitives/standard-adapter.js";
import { interpretBytesReply } from "../src/codec/marshaling.js";
import { SecureBytes } from "../src/types/secure-bytes.js";
import { SecurityErrors } from "../src/types/errors.js";
import { err, ok } from "../src/types/result.js";
import { createConsoleLogger } from "../src/logger.js";
import { FakeSecurityService } from "./helpers/fake-service.js";

const responseSchema = z.object({
  v: z.literal(1),
  kind: z.literal("response"),
  requestId: z.string(),
  reply: z.unknown(),
});

/** Post a raw envelope and wait for the next response on the same port. */
function exchange(port: MessagePort, envelope: unknown): Promise<z.infer<typeof responseSchema>> {
  return new Promise((resolve) => {
    port.once("message", (message: unknown) => resolve(responseSchema.parse(message)));
    port.postMessage(envelope);
  });
}

describe("MessagePortServiceConnection", () => {
  let client: MessagePort;
  let server: MessagePort;

  beforeEach(() => {
    const channel = new MessageChannel();
    client = channel.port1;
    server = channel.port2;
  });

  afterEach(() => {
    client.close();
    server.close();
  });

  describe("round trip", () => {
    it("should carry requests and replies through the responder", async () => {
      attachServiceResponder(server, new FakeSecurityService().handlers());
      const adapter = new StandardSecurityAdapter(new MessagePortServiceConnection(client));

      await expect(adapter.ping()).resolves.toEqual(ok(true));
      const digest = await adapter.hash(SecureBytes.fromUtf8("abc"));
      expect(digest.ok && digest.value.toHex()).toBe(
        "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
      );
      expect(adapter.invoker.pendingCount).toBe(0);
    });

    it("should classify an error raised by a handler", async () => {
      attachServiceResponder(server, new FakeSecurityService().handlers());
      const adapter = new StandardSecurityAdapter(new MessagePortServiceConnection(client));

      await expect(adapter.sign(SecureBytes.fromUtf8("a"), "absent")).resolves.toEqual(
        err(SecurityErrors.keyNotFound("absent"))
      );
    });

    it("should report an operation the service lacks as operationNotSupported", async () => {
      attachServiceResponder(server, {});
      const adapter = new StandardSecurityAdapter(new MessagePortServiceConnection(client));

      await expect(adapter.getServiceVersion()).resolves.toEqual(
        err(SecurityErrors.operationNotSupported("getServiceVersion"))
      );
    });
  });

  describe("invalidation", () => {
    it("should invalidate when the other end closes", async () => {
      const connection = new MessagePortServiceConnection(client);
      const invalidated = new Promise<string>((resolve) => connection.onInvalidated(resolve));

      server.close();

      await expect(invalidated).resolves.toBe("Message port closed");
      const adapter = new StandardSecurityAdapter(connection);
      await expect(adapter.ping()).resolves.toEqual(err(SecurityErrors.serviceUnavailable()));
    });

    it("should fire observers once when invalidated locally", () => {
      const connection = new MessagePortServiceConnection(client);
      const observer = vi.fn();
      connection.onInvalidated(observer);

      connection.invalidate("done");
      connection.invalidate("again");

      expect(observer).toHaveBeenCalledTimes(1);
      expect(observer).toHaveBeenCalledWith("done");
    });
  });

  describe("malformed responses", () => {
    it("should drop them and log at warn", async () => {
      const lines: string[] = [];
      const connection = new MessagePortServiceConnection(client, {
        logger: createConsoleLogger("warn", {}, (line) => lines.push(line)),
      });

      server.postMessage({ hello: 1 });

      await vi.waitFor(() => expect(lines).toHaveLength(1));
      expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
        level: "warn",
        msg: "malformed envelope dropped",
      });
      expect(connection.pendingCount).toBe(0);
    });
  });
});

describe("attachServiceResponder()", () => {
  let client: MessagePort;
  let server: MessagePort;

  beforeEach(() => {
    const channel = new MessageChannel();
    client = channel.port1;
    server = channel.port2;
  });

  afterEach(() => {
    client.close();
    server.close();
  });

  it("should answer an unknown operation name as unrecognized", async () => {
    attachServiceResponder(server, new FakeSecurityService().handlers());

    const response = await exchange(client, {
      v: 1,
      kind: "request",
      requestId: "r1",
      operation: "teleport",
      args: [],
    });

    expect(response.requestId).toBe("r1");
    expect(interpretBytesReply(response.reply)).toEqual(
      err(SecurityErrors.operationNotSupported("teleport"))
    );
  });

  it("should reject arguments of the wrong shape as invalidInput", async () => {
    attachServiceResponder(server, new FakeSecurityService().handlers());

    const response = await exchange(client, {
      v: 1,
      kind: "request",
      requestId: "r2",
      operation: "generateRandomData",
      args: ["ten"],
    });

    expect(interpretBytesReply(response.reply)).toEqual(
      err(
        SecurityErrors.invalidInput(
          "Invalid arguments for generateRandomData at 0: Expected number, received string"
        )
      )
    );
  });

  it("should log and drop a malformed request", async () => {
    const lines: string[] = [];
    attachServiceResponder(server, new FakeSecurityService().handlers(), {
      logger: createConsoleLogger("warn", {}, (line) => lines.push(line)),
    });

    client.postMessage({ v: 1, kind: "request", requestId: "", operation: "ping", args: [] });

    await vi.waitFor(() => expect(lines).toHaveLength(1));
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      level: "warn",
      msg: "malformed envelope dropped",
    });
  });
});
