import {
  COMPONENT_PREFIX,
  type Component,
  type Instance,
  type MeasureCommand,
  type Model,
  type OutputVariable,
  type Parameters,
  type SimCommand,
  type Source,
  type SourceValue,
  type SpiceDocument,
  type Subckt,
  type TrigTargCondition,
} from "./model.js";

function params(p: Parameters): string[] {
  return Object.entries(p).map(([k, v]) => `${k}=${v}`);
}

export function componentToSpice(c: Component): string {
  const head = `${COMPONENT_PREFIX[c.kind]}${c.name}`;
  switch (c.kind) {
    case "resistor":
      return `${head} ${c.nodePos} ${c.nodeNeg} ${c.resistance}`;
    case "capacitor":
      return `${head} ${c.nodePos} ${c.nodeNeg} ${c.capacitance}`;
    case "inductor":
      return `${head} ${c.nodePos} ${c.nodeNeg} ${c.inductance}`;
    case "diode":
      return `${head} ${c.nodePos} ${c.nodeNeg} ${c.modelName}`;
    case "bjt":
      return `${head} ${c.collector} ${c.base} ${c.emitter} ${c.modelName}`;
    case "mosfet":
      return [
        head,
        c.drain,
        c.gate,
        c.source,
        c.bulk,
        c.modelName,
        `L=${c.length}`,
        `W=${c.width}`,
        ...params(c.parameters),
      ].join(" ");
  }
}

export function sourceValueToSpice(v: SourceValue): string {
  switch (v.kind) {
    case "dcVoltage":
    case "dcCurrent":
      return `DC ${v.value}`;
    case "acVoltage":
    case "acCurrent":
      return `AC ${v.magnitude} ${v.phase}`;
    case "sin":
      return `SIN(${v.offset} ${v.amplitude} ${v.frequency} ${v.delay} ${v.damping} ${v.phase})`;
    case "pwl":
      return `PWL(${v.points.map((p) => `${p.time} ${p.value}`).join(" ")})`;
    case "pulse":
      return `PULSE(${[v.initial, v.pulsed, v.delay, v.rise, v.fall, v.width, v.period].join(" ")})`;
  }
}

export function sourceToSpice(s: Source): string {
  const letter = s.kind === "voltage" ? "V" : "I";
  return `${letter}${s.name} ${s.nodePos} ${s.nodeNeg} ${sourceValueToSpice(s.value)}`;
}

export function simCommandToSpice(cmd: SimCommand): string {
  switch (cmd.kind) {
    case "dc":
      return `.DC ${cmd.sourceName} ${cmd.start} ${cmd.stop} ${cmd.step}`;
    case "ac":
      return `.AC ${cmd.sweep.toUpperCase()} ${cmd.points} ${cmd.fStart} ${cmd.fStop}`;
    case "tran": {
      let line = `.TRAN ${cmd.step} ${cmd.stop}`;
      // tmax is positional, so it needs a tstart in front of it.
      if (cmd.start) line += ` ${cmd.start}`;
      else if (cmd.max) line += " 0";
      if (cmd.max) line += ` ${cmd.max}`;
      if (cmd.uic) line += " UIC";
      return line;
    }
  }
}

export function outputVariableToSpice(v: OutputVariable): string {
  if (v.kind === "current") return `I(${v.elementName})`;
  return v.node2 === undefined ? `V(${v.node1})` : `V(${v.node1},${v.node2})`;
}

function condition(c: TrigTargCondition): string {
  return `${outputVariableToSpice(c.variable)} VAL=${c.value} ${c.edge.toUpperCase()}=${c.number}`;
}

export function measureToSpice(m: MeasureCommand): string {
  const head = `.MEAS ${m.analysis.toUpperCase()} ${m.name}`;
  switch (m.kind) {
    case "rise":
      return `${head} TRIG ${condition(m.trig)} TARG ${condition(m.targ)}`;
    case "basicStat":
      return `${head} ${m.stat.toUpperCase()} ${outputVariableToSpice(m.variable)} FROM=${m.from} TO=${m.to}`;
    case "findWhen":
      return `${head} FIND ${outputVariableToSpice(m.variable)} WHEN ${outputVariableToSpice(m.when.variable)}=${m.when.value}`;
  }
}

export function instanceToSpice(i: Instance): string {
  return [i.name, ...i.pins, i.subcktName].join(" ");
}

export function subcktToSpice(s: Subckt): string {
  const lines = [
    [".SUBCKT", s.name, ...s.ports].join(" "),
    ...s.components.map(componentToSpice),
    ...s.instances.map(instanceToSpice),
    `.ENDS ${s.name}`,
  ];
  return lines.join("\n");
}

export function modelToSpice(m: Model): string {
  return `.MODEL ${m.name} ${m.kind.toUpperCase()} (${params(m.parameters).join(" ")})`;
}

/** Render a whole document; the output reads back into an equal document. */
export function documentToSpice(doc: SpiceDocument): string {
  const lines: string[] = [];
  if (doc.title !== undefined) lines.push(`.title ${doc.title}`);
  lines.push(...doc.components.map(componentToSpice));
  lines.push(...doc.sources.map(sourceToSpice));
  lines.push(...doc.subckts.map(subcktToSpice));
  lines.push(...doc.instances.map(instanceToSpice));
  lines.push(...doc.models.map(modelToSpice));
  lines.push(...doc.simulation.map(simCommandToSpice));
  lines.push(...doc.measures.map(measureToSpice));
  lines.push(".end");
  return `${lines.join("\n")}\n`;
}
