import { describe, expect, it } from "vitest";
import { instance, subckt } from "../../src/spice/subckt.js";
import { unit } from "../../src/units/value.js";

describe("instances", () => {
  it("takes the last token as the subcircuit", () => {
    expect(instance("X1 in out amp")).toEqual({
      ok: true,
      rest: "",
      value: { name: "X1", pins: ["in", "out"], subcktName: "amp" },
    });
  });

  it("requires a subcircuit name", () => {
    const r = instance("X1");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.fatal).toBe(true);
      expect(r.trace[0]?.label).toBe("missing subckt name");
    }
  });

  it("mismatches on other designators", () => {
    const r = instance("R1 a b 1k");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.fatal).toBe(false);
  });
});

describe(".SUBCKT", () => {
  it("collects body lines up to .ENDS", () => {
    const r = subckt(".SUBCKT amp in out\n* body\nR1 in mid 1k\nX2 mid out buf\n.ENDS amp\nrest");
    expect(r).toEqual({
      ok: true,
      rest: "rest",
      value: {
        name: "amp",
        ports: ["in", "out"],
        components: [
          { kind: "resistor", name: "1", nodePos: "in", nodeNeg: "mid", resistance: unit("resistance", 1, "kilo") },
        ],
        instances: [{ name: "X2", pins: ["mid", "out"], subcktName: "buf" }],
      },
    });
  });

  it("fails when .ENDS is missing", () => {
    const r = subckt(".SUBCKT amp a\nR1 a 0 1k\n");
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.trace[0]?.label).toBe("missing .ENDS");
  });

  it("rejects other statements in the body", () => {
    const r = subckt(".SUBCKT amp a\n.tran 1n 1u\n.ENDS\n");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.fatal).toBe(true);
      expect(r.trace[0]?.label).toBe("unknown line in subckt");
    }
  });
});
