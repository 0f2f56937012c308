import { describe, it, expect, vi } from "vitest";
import { InMemoryServiceConnection } from "../src/transports/in-memory.js";
import { dispatchOperation } from "../src/transports/handlers.js";
import { OneShotCompletion } from "../src/primitives/one-shot.js";
import type { TransportReply } from "../src/types/transport.js";
import {
  NativeErrorDomain,
  TransportErrorCode,
  errorReply,
  nativeError,
  valueReply,
} from "../src/types/transport.js";

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("dispatchOperation()", () => {
  it("should answer an operation without a handler as unrecognized", async () => {
    await expect(dispatchOperation({}, "getMetrics", [])).resolves.toEqual(
      errorReply(
        nativeError(
          NativeErrorDomain.transport,
          TransportErrorCode.unrecognizedOperation,
          "Unrecognized operation: getMetrics",
          { operation: "getMetrics" }
        )
      )
    );
  });

  it("should turn a thrown value into an error reply", async () => {
    const fault = new Error("handler broke");
    await expect(
      dispatchOperation(
        {
          ping: () => {
            throw fault;
          },
        },
        "ping",
        []
      )
    ).resolves.toEqual(errorReply(fault));
  });
});

describe("InMemoryServiceConnection", () => {
  describe("invoke()", () => {
    it("should record each request and deliver the handler's reply", async () => {
      const connection = new InMemoryServiceConnection({ ping: () => valueReply(true) });
      const onReply = vi.fn();

      connection.invoke("ping", [], onReply);
      await flush();

      expect(onReply).toHaveBeenCalledWith(valueReply(true));
      expect(connection.calls).toEqual([{ operation: "ping", args: [] }]);
      expect(connection.callCount("ping")).toBe(1);
      expect(connection.callCount("hashData")).toBe(0);
    });

    it("should answer immediately once invalidated", () => {
      const connection = new InMemoryServiceConnection({ ping: () => valueReply(true) });
      connection.invalidate("bye");
      const onReply = vi.fn();

      connection.invoke("ping", [], onReply);

      expect(onReply).toHaveBeenCalledWith(
        errorReply(
          nativeError(NativeErrorDomain.transport, TransportErrorCode.invalidated, "bye")
        )
      );
    });

    it("should drop a reply that arrives after an interruption", async () => {
      const gate = new OneShotCompletion<TransportReply>();
      const connection = new InMemoryServiceConnection({ ping: () => gate.promise });
      const onReply = vi.fn();

      connection.invoke("ping", [], onReply);
      connection.interrupt();
      gate.resolve(valueReply(true));
      await flush();

      expect(onReply).not.toHaveBeenCalled();
    });
  });

  describe("invalidate()", () => {
    it("should notify observers once with the reason", () => {
      const connection = new InMemoryServiceConnection();
      const observer = vi.fn();
      connection.onInvalidated(observer);

      connection.invalidate();
      connection.invalidate("again");

      expect(observer).toHaveBeenCalledTimes(1);
      expect(observer).toHaveBeenCalledWith("Connection invalidated");
      expect(connection.isInvalidated).toBe(true);
    });

    it("should not notify an unsubscribed observer", () => {
      const connection = new InMemoryServiceConnection();
      const observer = vi.fn();
      const unsubscribe = connection.onInvalidated(observer);

      unsubscribe();
      connection.invalidate();

      expect(observer).not.toHaveBeenCalled();
    });
  });

  describe("interrupt()", () => {
    it("should notify observers and do nothing after invalidation", () => {
      const connection = new InMemoryServiceConnection();
      const observer = vi.fn();
      connection.onInterrupted(observer);

      connection.interrupt();
      connection.invalidate();
      connection.interrupt();

      expect(observer).toHaveBeenCalledTimes(1);
    });
  });

  describe("setHandlers()", () => {
    it("should serve later requests from the new table", async () => {
      const connection = new InMemoryServiceConnection({ ping: () => valueReply(false) });
      connection.setHandlers({ ping: () => valueReply(true) });
      const onReply = vi.fn();

      connection.invoke("ping", [], onReply);
      await flush();

      expect(onReply).toHaveBeenCalledWith(valueReply(true));
    });
  });
});
