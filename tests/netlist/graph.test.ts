import { describe, expect, it } from "vitest";
import { documentElements, netlistToDot } from "../../src/netlist/graph.js";
import { readSpice } from "../../src/spice/read.js";

describe("netlistToDot", () => {
  it("renders nets and elements as a bipartite graph", () => {
    const doc = readSpice("R1 in out 1k\nV1 in 0 5\n");
    expect(netlistToDot(doc)).toBe(
      [
        "digraph G {",
        "  rankdir=LR;",
        "  graph [splines=true, overlap=false];",
        "  node  [fontsize=10];",
        "",
        "  // Nets",
        '  net_in [label="in", shape=ellipse];',
        '  net_out [label="out", shape=ellipse];',
        '  net_0 [label="0", shape=ellipse];',
        "",
        "  // Elements",
        '  el_R1 [label="R1", shape=box];',
        '  el_V1 [label="V1", shape=box];',
        "",
        "  // Edges (net -> element)",
        "  net_in -> el_R1;",
        "  net_out -> el_R1;",
        "  net_in -> el_V1;",
        "  net_0 -> el_V1;",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("sanitizes identifiers but keeps labels", () => {
    const doc = readSpice("X1 a.b c amp\n");
    const dot = netlistToDot(doc);
    expect(dot).toContain('  net_a_b [label="a.b", shape=ellipse];\n');
    expect(dot).toContain("  net_a_b -> el_X1;\n");
  });
});

describe("documentElements", () => {
  it("lists the terminals of each element", () => {
    const doc = readSpice("M1 d g s b nch L=1u W=1u\nQ1 c b e npn1\nI1 a 0 1m\nX1 p q sub\n");
    expect(documentElements(doc)).toEqual([
      { ref: "M1", nodes: ["d", "g", "s", "b"] },
      { ref: "Q1", nodes: ["c", "b", "e"] },
      { ref: "I1", nodes: ["a", "0"] },
      { ref: "X1", nodes: ["p", "q"] },
    ]);
  });
});
