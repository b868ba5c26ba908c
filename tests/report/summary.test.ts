import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadLef } from "../../src/lef/read.js";
import { summarizeLef, summarizeSpice } from "../../src/report/summary.js";
import { loadSpice, readSpice } from "../../src/spice/read.js";

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

describe("summaries", () => {
  it("summarizes a netlist", async () => {
    const doc = await loadSpice(fixture("rc_filter.cir"));
    expect(summarizeSpice(doc)).toBe(
      [
        "Title: RC low-pass",
        "Components: 2",
        "  resistor: 1",
        "  capacitor: 1",
        "Sources: 1 (1 voltage, 0 current)",
        "Subcircuits: 1 (buffer)",
        "Instances: 1",
        "Models: 1",
        "Nets: 4",
        "Analysis: .TRAN 10n 20u",
        "Measures: 1",
        "",
      ].join("\n"),
    );
  });

  it("omits the title and subcircuit names when absent", () => {
    const summary = summarizeSpice(readSpice("R1 a 0 1\n"));
    expect(summary.split("\n").slice(0, 3)).toEqual(["Components: 1", "  resistor: 1", "Sources: 0 (0 voltage, 0 current)"]);
    expect(summary).toContain("Subcircuits: 0\n");
  });

  it("summarizes a technology library", async () => {
    const lib = await loadLef(fixture("tech.lef"));
    expect(summarizeLef(lib)).toBe(
      [
        "LEF version: 5.8",
        "Bus bit chars: []",
        "Divider char: /",
        "Database microns: 2000",
        "Manufacturing grid: 0.005",
        "Use min spacing: ON",
        "Layers: 5",
        "  NW MASTERSLICE NWELL",
        "  TM1 MASTERSLICE TRIMMETAL",
        "  VTH IMPLANT spacings=2",
        "  M1 ROUTING HORIZONTAL width=0.1",
        "  V1 CUT spacings=2 enclosures=2",
        "",
      ].join("\n"),
    );
  });
});
