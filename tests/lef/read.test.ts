import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { LefReadError, loadLef, readLef } from "../../src/lef/read.js";

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const HEADER = `VERSION 5.8 ;
BUSBITCHARS "[]" ;
DIVIDERCHAR "/" ;
UNITS
  DATABASE MICRONS 1000 ;
END UNITS
`;

function parseError(text: string): LefReadError {
  try {
    readLef(text);
  } catch (e: unknown) {
    if (e instanceof LefReadError) return e;
    throw e;
  }
  throw new Error("expected a LefReadError");
}

describe("readLef", () => {
  it("reads the technology fixture", async () => {
    const lib = await loadLef(fixture("tech.lef"));

    expect(lib.version).toBe(5.8);
    expect(lib.busbitchars).toBe("[]");
    expect(lib.dividerchar).toBe("/");
    expect(lib.units).toEqual({ databaseMicrons: 2000, capacitance: 1 });
    expect(lib.manufacturingGrid).toBe(0.005);
    expect(lib.useMinSpacing).toBe("ON");
    expect(lib.layers.map((l) => `${l.name}:${l.kind}`)).toEqual([
      "NW:special",
      "TM1:special",
      "VTH:implant",
      "M1:routing",
      "V1:cut",
    ]);
  });

  it("keeps layer details from the fixture", async () => {
    const lib = await loadLef(fixture("tech.lef"));
    const [nw, tm1, vth, m1, v1] = lib.layers;

    expect(nw).toEqual({ kind: "special", name: "NW", layerType: "MASTERSLICE", lef58Type: "NWELL", properties: [] });
    expect(tm1).toEqual({
      kind: "special",
      name: "TM1",
      layerType: "MASTERSLICE",
      lef58Type: "TRIMMETAL",
      lef58TrimmedMetal: { metalLayer: "M1", mask: 1 },
      properties: [["LEF58_OTHER", "x"]],
    });
    expect(vth).toEqual({
      kind: "implant",
      name: "VTH",
      width: 0.1,
      spacings: [{ minSpacing: 0.2 }, { minSpacing: 0.15, layer: "NW" }],
      properties: [],
    });
    expect(m1).toEqual({
      kind: "routing",
      name: "M1",
      direction: "HORIZONTAL",
      pitch: { kind: "uniform", pitch: 0.2 },
      width: 0.1,
      area: 0.02,
      spacings: [{ minSpacing: 0.1 }, { minSpacing: 0.2, rule: { kind: "range", minWidth: 0.3, maxWidth: 10 } }],
      maxWidth: 4,
    });
    expect(v1).toEqual({
      kind: "cut",
      name: "V1",
      width: 0.1,
      spacings: [
        { spacing: 0.15, centerToCenter: false, sameNet: false },
        {
          spacing: 0.2,
          centerToCenter: false,
          sameNet: false,
          constraint: { kind: "adjacentCuts", cuts: 3, within: 0.25, exceptSamePgNet: false },
        },
      ],
      enclosures: [
        { above: false, overhang1: 0.01, overhang2: 0.04 },
        { above: true, overhang1: 0, overhang2: 0.05, condition: { kind: "width", minWidth: 0.2 } },
      ],
    });
  });

  it("accepts a file without END LIBRARY", () => {
    const lib = readLef(HEADER);
    expect(lib.layers).toEqual([]);
    expect(lib.manufacturingGrid).toBeUndefined();
  });

  it("rejects content after END LIBRARY", () => {
    const e = parseError(`${HEADER}END LIBRARY\nfoo\n`);
    expect(e.kind).toBe("parse");
    expect(e.line).toBe(8);
    expect(e.message).toBe("Error at line 8:\n0: at line 8, in unexpected content:\nfoo\n^\n");
  });

  it("names the line of a committed error", () => {
    const e = parseError(`${HEADER}LAYER M1\n  TYPE VIA ;\nEND M1\n`);
    expect(e.line).toBe(8);
    expect(e.message.startsWith("Error at line 8:\n0: at line 8, in expected layer type:\n  TYPE VIA ;\n")).toBe(true);
  });

  it("requires VERSION first", () => {
    const e = parseError('BUSBITCHARS "[]" ;\n');
    expect(e.line).toBe(1);
  });

  it("wraps missing files as io errors", async () => {
    await expect(loadLef(fixture("missing.lef"))).rejects.toMatchObject({ name: "LefReadError", kind: "io" });
  });
});
