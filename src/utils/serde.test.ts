import { describe as suite, expect, it } from "vitest";
import { describe } from "./serde";

suite("describe", () => {
  it("should leave strings as they are", () => {
    expect(describe("socket hang up")).toBe("socket hang up");
  });

  it("should render plain objects as JSON", () => {
    expect(describe({ code: 5 })).toBe('{"code":5}');
  });

  it("should render values JSON cannot", () => {
    expect(describe(10n)).toBe('"10"');
    expect(describe(new Map([["a", 1]]))).toBe('[["a",1]]');
    expect(describe(new Set([1, 2]))).toBe("[1,2]");
    expect(describe(undefined)).toBe("undefined");
  });

  it("should render numbers and null", () => {
    expect(describe(42)).toBe("42");
    expect(describe(null)).toBe("null");
  });
});
