import { describe, it, expect } from "vitest";
import { asArray, asNumber, asString, field, isRecord } from "./json";

describe("json helpers", () => {
  it("isRecord accepts plain objects only", () => {
    expect(isRecord({ a: 1 })).toBe(true);
    expect(isRecord([1])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });

  it("asNumber parses numeric strings", () => {
    expect(asNumber("0.75")).toBe(0.75);
    expect(asNumber(3)).toBe(3);
    expect(asNumber("abc")).toBeUndefined();
    expect(asNumber("")).toBeUndefined();
    expect(asNumber(Number.NaN)).toBeUndefined();
  });

  it("asString and asArray reject other shapes", () => {
    expect(asString(1)).toBeUndefined();
    expect(asArray("x")).toEqual([]);
  });

  it("field walks nested records", () => {
    const data = { data: { Get: { Docs: [1, 2] } } };
    expect(field(data, "data", "Get", "Docs")).toEqual([1, 2]);
    expect(field(data, "data", "Missing", "Docs")).toBeUndefined();
  });
});
