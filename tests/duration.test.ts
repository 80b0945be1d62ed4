import { describe, expect, it } from "vitest";

import { DurationParseError, parseDuration, parseTtl } from "@/lib/duration";

describe("parseDuration", () => {
  it("parses single-unit durations", () => {
    expect(parseDuration("300ms")).toBe(300);
    expect(parseDuration("10s")).toBe(10_000);
    expect(parseDuration("1h")).toBe(3_600_000);
  });

  it("parses compound and fractional durations", () => {
    expect(parseDuration("2h45m")).toBe(9_900_000);
    expect(parseDuration("1m30s")).toBe(90_000);
    expect(parseDuration("1.5h")).toBe(5_400_000);
    expect(parseDuration(".5s")).toBe(500);
  });

  it("parses sub-millisecond units", () => {
    expect(parseDuration("1500us")).toBeCloseTo(1.5, 9);
    expect(parseDuration("2000000ns")).toBeCloseTo(2, 9);
    expect(parseDuration("250µs")).toBeCloseTo(0.25, 9);
  });

  it("accepts a bare zero and surrounding whitespace", () => {
    expect(parseDuration("0")).toBe(0);
    expect(parseDuration(" 1h ")).toBe(3_600_000);
  });

  it("keeps the sign", () => {
    expect(parseDuration("-1s")).toBe(-1000);
    expect(parseDuration("+1s")).toBe(1000);
  });

  it.each(["", "   ", "10", "5d", "h", "1h x", "-", "1e3s"])(
    "rejects %j",
    (input) => {
      expect(() => parseDuration(input)).toThrow(DurationParseError);
    }
  );

  it("names the missing unit", () => {
    expect(() => parseDuration("10")).toThrow('Invalid duration "10": missing unit');
  });
});

describe("parseTtl", () => {
  it("accepts zero", () => {
    expect(parseTtl("0s")).toBe(0);
  });

  it("rejects negative durations", () => {
    expect(() => parseTtl("-1s")).toThrow(
      'Invalid duration "-1s": TTL must not be negative'
    );
  });
});
