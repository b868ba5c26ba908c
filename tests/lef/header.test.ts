import { describe, expect, it } from "vitest";
import { busbitChars, dividerChar, manufacturingGrid, units, useMinSpacing, version } from "../../src/lef/header.js";

describe("LEF header", () => {
  it("reads VERSION", () => {
    expect(version("VERSION 5.8 ;\nNEXT")).toEqual({ ok: true, rest: "NEXT", value: 5.8 });
  });

  it("reads BUSBITCHARS and DIVIDERCHAR without quotes", () => {
    expect(busbitChars('BUSBITCHARS "<>" ;')).toEqual({ ok: true, rest: "", value: "<>" });
    expect(dividerChar('DIVIDERCHAR "%" ;')).toEqual({ ok: true, rest: "", value: "%" });
  });

  it("rejects an unknown bus bit pair", () => {
    const r = busbitChars('BUSBITCHARS "()" ;');
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.fatal).toBe(true);
  });

  it("reads a UNITS block in any order", () => {
    const r = units("UNITS\n  TIME NANOSECONDS 100 ;\n  DATABASE MICRONS 1000 ;\nEND UNITS\n");
    expect(r).toEqual({ ok: true, rest: "", value: { time: 100, databaseMicrons: 1000 } });
  });

  it("rejects a repeated unit", () => {
    const r = units("UNITS\n  DATABASE MICRONS 1000 ;\n  DATABASE MICRONS 2000 ;\nEND UNITS\n");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.fatal).toBe(true);
      expect(r.trace[0]?.label).toBe("duplicate DATABASE in UNITS");
    }
  });

  it("leaves optional statements alone when absent", () => {
    expect(manufacturingGrid("LAYER M1")).toEqual({ ok: true, rest: "LAYER M1", value: undefined });
    expect(useMinSpacing("LAYER M1")).toEqual({ ok: true, rest: "LAYER M1", value: undefined });
  });

  it("maps USEMINSPACING OFF to ON", () => {
    expect(useMinSpacing("USEMINSPACING OFF ;")).toEqual({ ok: true, rest: "", value: "ON" });
    expect(useMinSpacing("USEMINSPACING ON ;")).toEqual({ ok: true, rest: "", value: "ON" });
  });

  it("rejects other USEMINSPACING words", () => {
    const r = useMinSpacing("USEMINSPACING MAYBE ;");
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.fatal).toBe(true);
      expect(r.trace[0]?.label).toBe("expected USEMINSPACING ON or OFF");
    }
  });
});
