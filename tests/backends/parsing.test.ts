import { describe, it, expect } from "vitest";
import {
  findFirstJsonObject,
  normalizeTimeOfDay,
  parseDecimal,
  parseTideKind,
} from "@/lib/backends/parsing";

describe("parseDecimal", () => {
  it("reads dots, decimal commas and trailing units", () => {
    expect(parseDecimal("1.5")).toBe(1.5);
    expect(parseDecimal("1,5")).toBe(1.5);
    expect(parseDecimal(" 1.9 m")).toBe(1.9);
    expect(parseDecimal("-0.2")).toBe(-0.2);
  });

  it("returns null without a number", () => {
    expect(parseDecimal("n/a")).toBeNull();
  });
});

describe("normalizeTimeOfDay", () => {
  it("pads and normalizes separators", () => {
    expect(normalizeTimeOfDay("9:05")).toBe("09:05");
    expect(normalizeTimeOfDay("09.05")).toBe("09:05");
    expect(normalizeTimeOfDay("9h05")).toBe("09:05");
  });

  it("leaves unrecognized text trimmed but otherwise untouched", () => {
    expect(normalizeTimeOfDay(" noon ")).toBe("noon");
  });
});

describe("parseTideKind", () => {
  it("maps English and Russian labels", () => {
    expect(parseTideKind("High")).toBe("High");
    expect(parseTideKind("HW")).toBe("High");
    expect(parseTideKind("прилив")).toBe("High");
    expect(parseTideKind("low")).toBe("Low");
    expect(parseTideKind("отлив")).toBe("Low");
    expect(parseTideKind("L")).toBe("Low");
  });

  it("returns null for anything else", () => {
    expect(parseTideKind("mid")).toBeNull();
    expect(parseTideKind("hello")).toBeNull();
  });
});

describe("findFirstJsonObject", () => {
  it("finds JSON wrapped in prose and code fences", () => {
    const text = 'Sure!\n```json\n{"waveHeights": [1.2], "note": "a } inside"}\n```';
    expect(findFirstJsonObject(text)).toEqual({ waveHeights: [1.2], note: "a } inside" });
  });

  it("skips a brace that does not start valid JSON", () => {
    expect(findFirstJsonObject('{oops} then {"a": 1}')).toEqual({ a: 1 });
  });

  it("returns null when there is no object", () => {
    expect(findFirstJsonObject("no json here")).toBeNull();
  });
});
