import type { LefLayer, LefTechLibrary } from "../lef/model.js";
import { documentElements } from "../netlist/graph.js";
import { simCommandToSpice } from "../spice/emit.js";
import type { Component, SpiceDocument } from "../spice/model.js";

const COMPONENT_KINDS: readonly Component["kind"][] = ["resistor", "capacitor", "inductor", "diode", "bjt", "mosfet"];

export function summarizeSpice(doc: SpiceDocument): string {
  const lines: string[] = [];
  if (doc.title) lines.push(`Title: ${doc.title}`);

  lines.push(`Components: ${doc.components.length}`);
  for (const kind of COMPONENT_KINDS) {
    const n = doc.components.filter((c) => c.kind === kind).length;
    if (n) lines.push(`  ${kind}: ${n}`);
  }

  const voltage = doc.sources.filter((s) => s.kind === "voltage").length;
  lines.push(`Sources: ${doc.sources.length} (${voltage} voltage, ${doc.sources.length - voltage} current)`);

  const subckts = doc.subckts.map((s) => s.name).join(", ");
  lines.push(`Subcircuits: ${doc.subckts.length}${subckts ? ` (${subckts})` : ""}`);
  lines.push(`Instances: ${doc.instances.length}`);
  lines.push(`Models: ${doc.models.length}`);

  const nets = new Set(documentElements(doc).flatMap((e) => e.nodes));
  lines.push(`Nets: ${nets.size}`);

  for (const cmd of doc.simulation) lines.push(`Analysis: ${simCommandToSpice(cmd)}`);
  lines.push(`Measures: ${doc.measures.length}`);

  return `${lines.join("\n")}\n`;
}

function layerLine(l: LefLayer): string {
  switch (l.kind) {
    case "routing":
      return `  ${l.name} ROUTING ${l.direction} width=${l.width}`;
    case "cut":
      return `  ${l.name} CUT spacings=${l.spacings.length} enclosures=${l.enclosures.length}`;
    case "implant":
      return `  ${l.name} IMPLANT spacings=${l.spacings.length}`;
    case "special":
      return `  ${l.name} ${l.layerType}${l.lef58Type ? ` ${l.lef58Type}` : ""}`;
  }
}

export function summarizeLef(lib: LefTechLibrary): string {
  const lines: string[] = [
    `LEF version: ${lib.version}`,
    `Bus bit chars: ${lib.busbitchars}`,
    `Divider char: ${lib.dividerchar}`,
  ];
  if (lib.units.databaseMicrons !== undefined) lines.push(`Database microns: ${lib.units.databaseMicrons}`);
  if (lib.manufacturingGrid !== undefined) lines.push(`Manufacturing grid: ${lib.manufacturingGrid}`);
  if (lib.useMinSpacing) lines.push(`Use min spacing: ${lib.useMinSpacing}`);
  lines.push(`Layers: ${lib.layers.length}`);
  for (const l of lib.layers) lines.push(layerLine(l));
  return `${lines.join("\n")}\n`;
}
