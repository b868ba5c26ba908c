import { describe, expect, it } from "vitest";
import { measureCommand, outputVariable } from "../../src/spice/measures.js";
import { unit } from "../../src/units/value.js";

describe("output variables", () => {
  it("reads a node voltage", () => {
    expect(outputVariable("V(out)")).toEqual({ ok: true, rest: "", value: { kind: "voltage", node1: "out" } });
  });

  it("reads a differential voltage", () => {
    const r = outputVariable("V(a, b) rest");
    expect(r).toEqual({ ok: true, rest: "rest", value: { kind: "voltage", node1: "a", node2: "b" } });
  });

  it("reads a branch current with a suffix", () => {
    const r = outputVariable("I(VM)");
    expect(r.ok && r.value).toEqual({ kind: "current", elementName: "VM", suffix: "magnitude" });
  });
});

describe(".MEAS", () => {
  it("parses a trigger/target measurement", () => {
    const r = measureCommand(".MEAS TRAN rise_time TRIG V(1) VAL=0.2 RISE=1 TARG V(1) VAL=0.8 RISE=1");
    expect(r.ok && r.value).toEqual({
      kind: "rise",
      name: "rise_time",
      analysis: "tran",
      trig: { variable: { kind: "voltage", node1: "1" }, value: unit("number", 0.2), edge: "rise", number: 1 },
      targ: { variable: { kind: "voltage", node1: "1" }, value: unit("number", 0.8), edge: "rise", number: 1 },
    });
  });

  it("parses a statistic over a window", () => {
    const r = measureCommand(".MEASURE TRAN avgv AVG V(2) FROM=10n TO=55n");
    expect(r.ok && r.value).toEqual({
      kind: "basicStat",
      name: "avgv",
      analysis: "tran",
      stat: "avg",
      variable: { kind: "voltage", node1: "2" },
      from: unit("time", 10, "nano"),
      to: unit("time", 55, "nano"),
    });
  });

  it("parses FIND ... WHEN with a unit on the level", () => {
    const r = measureCommand(".meas ac vmax FIND V(out) WHEN V(in)=1V");
    expect(r.ok && r.value).toEqual({
      kind: "findWhen",
      name: "vmax",
      analysis: "ac",
      variable: { kind: "voltage", node1: "out" },
      when: { variable: { kind: "voltage", node1: "in" }, value: unit("number", 1) },
    });
  });

  it("reads a current level with the current table", () => {
    const r = measureCommand(".MEAS DC ifind FIND V(out) WHEN I(Vs)=2mA");
    expect(r.ok && r.value && r.value.kind === "findWhen" && r.value.when.value).toEqual(unit("number", 2, "milli"));
  });

  it("fails on an unknown measurement form", () => {
    const r = measureCommand(".MEAS TRAN m1 FOO");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.fatal).toBe(true);
  });

  it("fails on an unknown analysis", () => {
    const r = measureCommand(".MEAS XYZ m1 AVG V(1) FROM=0 TO=1");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.trace.map((f) => f.label)).toContain("analysis_type");
  });
});
