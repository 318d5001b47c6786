import { ok, err, isOk, isErr, unwrap, map, mapErr } from "./result";
import type { Result } from "./result";

describe("Result", () => {
  it("should tag ok values", () => {
    const result = ok(42);

    expect(result).toEqual({ kind: "ok", value: 42 });
    expect(isOk(result)).toBe(true);
    expect(isErr(result)).toBe(false);
  });

  it("should tag err values", () => {
    const result = err("boom");

    expect(result).toEqual({ kind: "err", error: "boom" });
    expect(isErr(result)).toBe(true);
    expect(isOk(result)).toBe(false);
  });

  describe("unwrap", () => {
    it("should return the value of an Ok", () => {
      expect(unwrap(ok("text"))).toBe("text");
    });

    it("should throw when unwrapping an Err", () => {
      expect(() => unwrap(err("bad"))).toThrow(
        "Attempted to unwrap an Err: bad",
      );
    });
  });

  describe("map", () => {
    it("should transform only Ok values", () => {
      const failed: Result<number, string> = err("bad");

      expect(map(ok(2), (n) => n * 10)).toEqual(ok(20));
      expect(map(failed, (n: number) => n * 10)).toEqual(err("bad"));
    });
  });

  describe("mapErr", () => {
    it("should transform only Err values", () => {
      const failed: Result<number, string> = err("bad");

      expect(mapErr(failed, (e) => e.toUpperCase())).toEqual(err("BAD"));
      expect(mapErr(ok(1), (e: string) => e.toUpperCase())).toEqual(ok(1));
    });
  });
});
