import { describe, expect, it } from "vitest";
import { source } from "../../src/spice/sources.js";
import { unit } from "../../src/units/value.js";

function parsed(line: string) {
  const r = source(line);
  if (!r.ok) throw new Error(`did not parse: ${line}`);
  return r.value;
}

describe("sources", () => {
  it("parses a DC voltage source", () => {
    expect(parsed("V1 in 0 DC 5")).toEqual({
      name: "1",
      kind: "voltage",
      nodePos: "in",
      nodeNeg: "0",
      value: { kind: "dcVoltage", value: unit("voltage", 5) },
    });
  });

  it("parses a bare DC current", () => {
    expect(parsed("I2 0 n1 2mA").value).toEqual({ kind: "dcCurrent", value: unit("current", 2, "milli") });
    expect(parsed("I2 0 n1 2mA").kind).toBe("current");
  });

  it("accepts DC=", () => {
    expect(parsed("V1 a 0 DC=3.3").value).toEqual({ kind: "dcVoltage", value: unit("voltage", 3.3) });
  });

  it("parses an AC source", () => {
    expect(parsed("V3 a 0 AC 1 90").value).toEqual({
      kind: "acVoltage",
      magnitude: unit("voltage", 1),
      phase: unit("angle", 90),
    });
  });

  it("fills SIN defaults", () => {
    expect(parsed("V4 a 0 SIN(0 1 1k)").value).toEqual({
      kind: "sin",
      offset: unit("voltage", 0),
      amplitude: unit("voltage", 1),
      frequency: unit("frequency", 1, "kilo"),
      delay: unit("time", 0),
      damping: unit("frequency", 0),
      phase: unit("number", 0),
    });
  });

  it("keeps PWL points in order", () => {
    expect(parsed("V5 a 0 PWL(0 0 1m 5)").value).toEqual({
      kind: "pwl",
      points: [
        { time: unit("time", 0), value: unit("voltage", 0) },
        { time: unit("time", 1, "milli"), value: unit("voltage", 5) },
      ],
    });
  });

  it("parses a PULSE", () => {
    expect(parsed("V6 a 0 PULSE(0 5 1n 2n 3n 5n 10n)").value).toEqual({
      kind: "pulse",
      initial: unit("voltage", 0),
      pulsed: unit("voltage", 5),
      delay: unit("time", 1, "nano"),
      rise: unit("time", 2, "nano"),
      fall: unit("time", 3, "nano"),
      width: unit("time", 5, "nano"),
      period: unit("time", 10, "nano"),
    });
  });

  it("mismatches on other designators", () => {
    const r = source("R1 a b 1k");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.fatal).toBe(false);
  });

  it("rejects a source with no name", () => {
    const r = source("V 1 0 5");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.fatal).toBe(true);
      expect(r.trace[0]?.label).toBe("empty name");
    }
  });

  it("commits after the AC keyword", () => {
    const r = source("V7 a 0 AC");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.fatal).toBe(true);
  });

  it("fails on an unknown value", () => {
    const r = source("V8 a 0 foo");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.fatal).toBe(true);
      expect(r.trace.map((f) => f.label)).toContain("source_value");
    }
  });

  it("requires the closing parenthesis", () => {
    const r = source("V9 a 0 SIN(0 1 1k");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.trace.map((f) => f.label)).toContain("closing parenthesis");
  });
});
