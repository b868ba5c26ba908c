import { COMPONENT_PREFIX, type Component, type SpiceDocument } from "../spice/model.js";

export type Element = { ref: string; nodes: string[] };

function componentNodes(c: Component): string[] {
  switch (c.kind) {
    case "resistor":
    case "capacitor":
    case "inductor":
    case "diode":
      return [c.nodePos, c.nodeNeg];
    case "bjt":
      return [c.collector, c.base, c.emitter];
    case "mosfet":
      return [c.drain, c.gate, c.source, c.bulk];
  }
}

/** Top-level elements of a document with the nets they touch. */
export function documentElements(doc: SpiceDocument): Element[] {
  return [
    ...doc.components.map((c) => ({ ref: `${COMPONENT_PREFIX[c.kind]}${c.name}`, nodes: componentNodes(c) })),
    ...doc.sources.map((s) => ({ ref: `${s.kind === "voltage" ? "V" : "I"}${s.name}`, nodes: [s.nodePos, s.nodeNeg] })),
    ...doc.instances.map((i) => ({ ref: i.name, nodes: i.pins })),
  ];
}

export function netlistToDot(doc: SpiceDocument): string {
  const elements = documentElements(doc);
  // bipartite graph: elements (boxes) and nets (ellipses)
  const nets = new Set<string>();
  for (const e of elements) for (const n of e.nodes) nets.add(n);

  const sanitize = (s: string) => s.replace(/[^a-zA-Z0-9_]/g, "_");

  let dot = "digraph G {\n";
  dot += "  rankdir=LR;\n";
  dot += "  graph [splines=true, overlap=false];\n";
  dot += "  node  [fontsize=10];\n\n";

  dot += "  // Nets\n";
  for (const n of nets) {
    dot += `  net_${sanitize(n)} [label="${n}", shape=ellipse];\n`;
  }
  dot += "\n  // Elements\n";
  for (const e of elements) {
    dot += `  el_${sanitize(e.ref)} [label="${e.ref}", shape=box];\n`;
  }

  dot += "\n  // Edges (net -> element)\n";
  for (const e of elements) {
    for (const n of e.nodes) {
      dot += `  net_${sanitize(n)} -> el_${sanitize(e.ref)};\n`;
    }
  }

  dot += "}\n";
  return dot;
}
