import { describe, expect, it } from "vitest";
import { maybeFloat, safeFloat, safeInt } from "./safeNumber";

describe("safeFloat", () => {
  it("passes finite numbers and parses numeric strings", () => {
    expect(safeFloat(3.25)).toBe(3.25);
    expect(safeFloat(" 42.5 ")).toBe(42.5);
    expect(safeFloat("1e3")).toBe(1000);
  });

  it("falls back on anything else", () => {
    expect(safeFloat(null)).toBe(0);
    expect(safeFloat(undefined, 7)).toBe(7);
    expect(safeFloat("")).toBe(0);
    expect(safeFloat("abc", -1)).toBe(-1);
    expect(safeFloat(Number.NaN)).toBe(0);
    expect(safeFloat(Number.POSITIVE_INFINITY)).toBe(0);
    expect(safeFloat(true)).toBe(0);
    expect(safeFloat({ value: 1 })).toBe(0);
  });
});

describe("safeInt", () => {
  it("truncates toward zero", () => {
    expect(safeInt("12.9")).toBe(12);
    expect(safeInt(-3.7)).toBe(-3);
    expect(safeInt("n/a", 5)).toBe(5);
  });
});

describe("maybeFloat", () => {
  it("reports unusable values as null", () => {
    expect(maybeFloat("0")).toBe(0);
    expect(maybeFloat("x")).toBeNull();
    expect(maybeFloat(null)).toBeNull();
  });
});
