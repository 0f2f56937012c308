import { describe, it, expect } from "vitest";
import { andThen, err, mapResult, ok, unwrap } from "../src/types/result.js";
import type { AsyncResult } from "../src/types/result.js";
import { SecurityErrors, SecurityServiceError } from "../src/types/errors.js";

const missing = SecurityErrors.keyNotFound("k1");

describe("Result", () => {
  describe("mapResult()", () => {
    it("should transform a success value", () => {
      expect(mapResult(ok(4), (n) => n + 1)).toEqual(ok(5));
    });

    it("should pass a failure through without calling the transform", () => {
      let called = false;
      const mapped = mapResult(err(missing), () => {
        called = true;
        return 0;
      });
      expect(mapped).toEqual(err(missing));
      expect(called).toBe(false);
    });
  });

  describe("andThen()", () => {
    const half = async (n: number): AsyncResult<number> =>
      n % 2 === 0 ? ok(n / 2) : err(SecurityErrors.invalidInput(`${n} is odd`));

    it("should chain onto a success value", async () => {
      await expect(andThen(ok(8), half)).resolves.toEqual(ok(4));
      await expect(andThen(ok(3), half)).resolves.toEqual(
        err(SecurityErrors.invalidInput("3 is odd"))
      );
    });

    it("should short-circuit a failure", async () => {
      let calls = 0;
      const result = await andThen(err(missing), async (n: number) => {
        calls += 1;
        return ok(n);
      });
      expect(result).toEqual(err(missing));
      expect(calls).toBe(0);
    });
  });

  describe("unwrap()", () => {
    it("should return the value or throw a SecurityServiceError", () => {
      expect(unwrap(ok("v"))).toBe("v");
      expect(() => unwrap(err(missing))).toThrow(SecurityServiceError);
    });
  });
});
