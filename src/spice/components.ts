import { hws, node, number, spiceIdentifier, capacitance, inductance, resistance } from "../parse/lexeme.js";
import {
  type Parser,
  alt,
  char,
  context,
  cut,
  failure,
  many0,
  mismatch,
  ok,
  tagNoCase,
} from "../parse/result.js";
import type { Dimensionless } from "../units/value.js";
import type {
  Bjt,
  Capacitor,
  Component,
  Diode,
  Inductor,
  Model,
  ModelKind,
  Mosfet,
  Resistor,
} from "./model.js";

/** The element name with its type letter stripped; mismatch when the letter is wrong. */
function designator(letter: string): Parser<string> {
  return (input) => {
    const r = context("name", hws(spiceIdentifier))(input);
    if (!r.ok) return r;
    if (r.value[0]?.toUpperCase() !== letter) return mismatch(r.rest, `should begin with ${letter}`);
    if (r.value.length === 1) return failure(r.rest, "empty name");
    return ok(r.rest, r.value.slice(1));
  };
}

const committedNode = cut(hws(node));
const committedModelName = cut(hws(spiceIdentifier));

export const resistor: Parser<Resistor> = context<Resistor>("resistor", (input) => {
  const name = designator("R")(input);
  if (!name.ok) return name;
  const pos = committedNode(name.rest);
  if (!pos.ok) return pos;
  const neg = committedNode(pos.rest);
  if (!neg.ok) return neg;
  const value = cut(hws(resistance))(neg.rest);
  if (!value.ok) return value;
  return ok(value.rest, {
    kind: "resistor",
    name: name.value,
    nodePos: pos.value,
    nodeNeg: neg.value,
    resistance: value.value,
  });
});

export const capacitor: Parser<Capacitor> = context<Capacitor>("capacitor", (input) => {
  const name = designator("C")(input);
  if (!name.ok) return name;
  const pos = committedNode(name.rest);
  if (!pos.ok) return pos;
  const neg = committedNode(pos.rest);
  if (!neg.ok) return neg;
  const value = cut(hws(capacitance))(neg.rest);
  if (!value.ok) return value;
  return ok(value.rest, {
    kind: "capacitor",
    name: name.value,
    nodePos: pos.value,
    nodeNeg: neg.value,
    capacitance: value.value,
  });
});

export const inductor: Parser<Inductor> = context<Inductor>("inductor", (input) => {
  const name = designator("L")(input);
  if (!name.ok) return name;
  const pos = committedNode(name.rest);
  if (!pos.ok) return pos;
  const neg = committedNode(pos.rest);
  if (!neg.ok) return neg;
  const value = cut(hws(inductance))(neg.rest);
  if (!value.ok) return value;
  return ok(value.rest, {
    kind: "inductor",
    name: name.value,
    nodePos: pos.value,
    nodeNeg: neg.value,
    inductance: value.value,
  });
});

export const diode: Parser<Diode> = context<Diode>("diode", (input) => {
  const name = designator("D")(input);
  if (!name.ok) return name;
  const pos = committedNode(name.rest);
  if (!pos.ok) return pos;
  const neg = committedNode(pos.rest);
  if (!neg.ok) return neg;
  const model = committedModelName(neg.rest);
  if (!model.ok) return model;
  return ok(model.rest, {
    kind: "diode",
    name: name.value,
    nodePos: pos.value,
    nodeNeg: neg.value,
    modelName: model.value,
  });
});

export const bjt: Parser<Bjt> = context<Bjt>("bjt", (input) => {
  const name = designator("Q")(input);
  if (!name.ok) return name;
  const collector = committedNode(name.rest);
  if (!collector.ok) return collector;
  const base = committedNode(collector.rest);
  if (!base.ok) return base;
  const emitter = committedNode(base.rest);
  if (!emitter.ok) return emitter;
  const model = committedModelName(emitter.rest);
  if (!model.ok) return model;
  return ok(model.rest, {
    kind: "bjt",
    name: name.value,
    collector: collector.value,
    base: base.value,
    emitter: emitter.value,
    modelName: model.value,
  });
});

export type BuildResult<T> = { ok: true; value: T } | { ok: false; missing: string[] };

type MosfetFields = Omit<Mosfet, "kind">;

/** Collects MOSFET fields as they are parsed; `build` checks the mandatory ones. */
export class MosfetBuilder {
  private fields: Partial<MosfetFields> = {};
  private params: [string, Dimensionless][] = [];

  set<K extends keyof MosfetFields>(key: K, value: MosfetFields[K]): this {
    this.fields[key] = value;
    return this;
  }

  parameter(key: string, value: Dimensionless): this {
    switch (key.toLowerCase()) {
      case "l":
        return this.set("length", value.as("length"));
      case "w":
        return this.set("width", value.as("length"));
      default:
        this.params.push([key, value]);
        return this;
    }
  }

  build(): BuildResult<Mosfet> {
    const { name, drain, gate, source, bulk, modelName, length, width } = this.fields;
    if (
      name === undefined ||
      drain === undefined ||
      gate === undefined ||
      source === undefined ||
      bulk === undefined ||
      modelName === undefined ||
      length === undefined ||
      width === undefined
    ) {
      const required = ["name", "drain", "gate", "source", "bulk", "modelName", "length", "width"] as const;
      return { ok: false, missing: required.filter((k) => this.fields[k] === undefined) };
    }
    const value: Mosfet = {
      kind: "mosfet",
      name,
      drain,
      gate,
      source,
      bulk,
      modelName,
      length,
      width,
      parameters: Object.fromEntries(this.params),
    };
    return { ok: true, value };
  }
}

/** `key = value`, value dimensionless. */
export const parameterPair: Parser<[string, Dimensionless]> = (input) => {
  const key = hws(spiceIdentifier)(input);
  if (!key.ok) return key;
  const eq = hws(char("="))(key.rest);
  if (!eq.ok) return eq;
  const value = hws(number)(eq.rest);
  if (!value.ok) return value;
  return ok(value.rest, [key.value, value.value]);
};

export const mosfet: Parser<Mosfet> = context<Mosfet>("mosfet", (input) => {
  const name = designator("M")(input);
  if (!name.ok) return name;
  const builder = new MosfetBuilder().set("name", name.value);

  let rest = name.rest;
  for (const key of ["drain", "gate", "source", "bulk"] as const) {
    const r = committedNode(rest);
    if (!r.ok) return r;
    builder.set(key, r.value);
    rest = r.rest;
  }
  const model = committedModelName(rest);
  if (!model.ok) return model;
  builder.set("modelName", model.value);

  const params = many0(hws(parameterPair))(model.rest);
  if (!params.ok) return params;
  for (const [k, v] of params.value) builder.parameter(k, v);

  const built = builder.build();
  if (!built.ok) return failure(params.rest, "no w/l given");
  return ok(params.rest, built.value);
});

export const component: Parser<Component> = alt<Component>(resistor, capacitor, inductor, diode, bjt, mosfet);

const MODEL_KINDS: ReadonlyArray<readonly [string, ModelKind]> = [
  ["NPN", "npn"],
  ["PNP", "pnp"],
  ["NMOS", "nmos"],
  ["PMOS", "pmos"],
  ["D", "d"],
];

const modelKind: Parser<ModelKind> = (input) => {
  for (const [token, kind] of MODEL_KINDS) {
    const r = tagNoCase(token)(input);
    if (r.ok) return ok(r.rest, kind);
  }
  return mismatch(input, "model kind");
};

/** `.model <name> <kind> (<key=value> ...)` */
export const model: Parser<Model> = (input) => {
  const kw = context("keyword", hws(tagNoCase(".model")))(input);
  if (!kw.ok) return kw;
  const name = cut(context("model_name", hws(spiceIdentifier)))(kw.rest);
  if (!name.ok) return name;
  const kind = cut(context("model_kind", hws(modelKind)))(name.rest);
  if (!kind.ok) return kind;
  const open = cut(hws(char("(")))(kind.rest);
  if (!open.ok) return open;
  const params = many0(parameterPair)(open.rest);
  if (!params.ok) return params;
  const close = cut(context("closing parenthesis", hws(char(")"))))(params.rest);
  if (!close.ok) return close;
  return ok(close.rest, { name: name.value, kind: kind.value, parameters: Object.fromEntries(params.value) });
};
