import { describe, it, expect } from "vitest";
import { formatOutcome, parseOutcome } from "../../src/lib/fixed-point.js";

describe("fixed-point outcomes", () => {
  it("parses prices into 2-decimal fixed point", () => {
    expect(parseOutcome("12.10")).toBe(1210n);
    expect(parseOutcome(14.5)).toBe(1450n);
    expect(parseOutcome("7")).toBe(700n);
  });

  it("truncates extra decimals toward zero", () => {
    expect(parseOutcome("64123.456")).toBe(6412345n);
    expect(parseOutcome("0.019")).toBe(1n);
  });

  it("rejects negative prices", () => {
    expect(() => parseOutcome("-1.00")).toThrow("Invalid outcome price");
  });

  it("formats with exactly 2 decimals", () => {
    expect(formatOutcome(1210n)).toBe("12.10");
    expect(formatOutcome(5n)).toBe("0.05");
    expect(formatOutcome(0n)).toBe("0.00");
    expect(formatOutcome(100_000_000n)).toBe("1000000.00");
  });
});
