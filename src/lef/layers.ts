import {
  type ParseResult,
  type Parser,
  alt,
  context,
  cut,
  failure,
  many0,
  map,
  ok,
  opt,
  preceded,
} from "../parse/result.js";
import type {
  Lef58TrimmedMetal,
  Lef58Type,
  LefCutLayer,
  LefCutSpacing,
  LefCutSpacingConstraint,
  LefEnclosure,
  LefEnclosureCondition,
  LefImplantLayer,
  LefImplantSpacing,
  LefLayer,
  LefPitch,
  LefRoutingDirection,
  LefRoutingLayer,
  LefRoutingSpacing,
  LefRoutingSpacingRule,
  LefSpecialLayer,
  LefSpecialLayerType,
} from "./model.js";
import { clause, float, ident, kw, quoted, repeated, semi, terminated, uint } from "./tokens.js";

function flag(keyword: string): Parser<boolean> {
  return map(opt(kw(keyword)), (v) => v !== undefined);
}

/** `KEYWORD <body>` that mismatches without the keyword and commits after it. */
function keyed<T>(keyword: string, body: Parser<T>): Parser<T> {
  return preceded(kw(keyword), cut(context(keyword, body)));
}

/** `END <name>`, where the name must repeat the one the layer was opened with. */
function endName(name: string): Parser<string> {
  return (input) => {
    const end = cut(context("END", kw("END")))(input);
    if (!end.ok) return end;
    const n = cut(context("layer name", ident))(end.rest);
    if (!n.ok) return n;
    if (n.value !== name) return failure(end.rest, "unmatched end name");
    return ok(n.rest, n.value);
  };
}

const mask = clause("MASK", terminated(uint));

const cutSpacingConstraint: Parser<LefCutSpacingConstraint> = alt<LefCutSpacingConstraint>(
  keyed("LAYER", (input): ParseResult<LefCutSpacingConstraint> => {
    const name = ident(input);
    if (!name.ok) return name;
    const stack = flag("STACK")(name.rest);
    if (!stack.ok) return stack;
    return ok(stack.rest, { kind: "layer", name: name.value, stack: stack.value });
  }),
  keyed("ADJACENTCUTS", (input): ParseResult<LefCutSpacingConstraint> => {
    const cuts = uint(input);
    if (!cuts.ok) return cuts;
    const within = preceded(kw("WITHIN"), float)(cuts.rest);
    if (!within.ok) return within;
    const except = flag("EXCEPTSAMEPGNET")(within.rest);
    if (!except.ok) return except;
    return ok(except.rest, {
      kind: "adjacentCuts",
      cuts: cuts.value,
      within: within.value,
      exceptSamePgNet: except.value,
    });
  }),
  map(kw("PARALLELOVERLAP"), (): LefCutSpacingConstraint => ({ kind: "parallelOverlap" })),
  keyed(
    "AREA",
    map(float, (area): LefCutSpacingConstraint => ({ kind: "area", area })),
  ),
);

/** Body of `SPACING cutSpacing [CENTERTOCENTER] [SAMENET] [constraint] ;` */
const cutSpacing: Parser<LefCutSpacing> = (input) => {
  const spacing = float(input);
  if (!spacing.ok) return spacing;
  const c2c = flag("CENTERTOCENTER")(spacing.rest);
  if (!c2c.ok) return c2c;
  const sameNet = flag("SAMENET")(c2c.rest);
  if (!sameNet.ok) return sameNet;
  const constraint = opt(cutSpacingConstraint)(sameNet.rest);
  if (!constraint.ok) return constraint;
  const s = context("';'", semi)(constraint.rest);
  if (!s.ok) return s;
  const value: LefCutSpacing = { spacing: spacing.value, centerToCenter: c2c.value, sameNet: sameNet.value };
  if (constraint.value) value.constraint = constraint.value;
  return ok(s.rest, value);
};

const enclosureCondition: Parser<LefEnclosureCondition> = alt<LefEnclosureCondition>(
  keyed("WIDTH", (input): ParseResult<LefEnclosureCondition> => {
    const minWidth = float(input);
    if (!minWidth.ok) return minWidth;
    const except = opt(keyed("EXCEPTEXTRACUT", float))(minWidth.rest);
    if (!except.ok) return except;
    const cond: LefEnclosureCondition = { kind: "width", minWidth: minWidth.value };
    if (except.value !== undefined) cond.exceptExtraCut = except.value;
    return ok(except.rest, cond);
  }),
  keyed(
    "LENGTH",
    map(float, (minLength): LefEnclosureCondition => ({ kind: "length", minLength })),
  ),
);

/** Body of `ENCLOSURE [ABOVE|BELOW] overhang1 overhang2 [condition] ;`; above by default. */
const enclosure: Parser<LefEnclosure> = (input) => {
  const side = opt(alt(kw("ABOVE"), kw("BELOW")))(input);
  if (!side.ok) return side;
  const o1 = float(side.rest);
  if (!o1.ok) return o1;
  const o2 = float(o1.rest);
  if (!o2.ok) return o2;
  const condition = opt(enclosureCondition)(o2.rest);
  if (!condition.ok) return condition;
  const s = context("';'", semi)(condition.rest);
  if (!s.ok) return s;
  const value: LefEnclosure = { above: side.value !== "BELOW", overhang1: o1.value, overhang2: o2.value };
  if (condition.value) value.condition = condition.value;
  return ok(s.rest, value);
};

export function cutLayer(name: string): Parser<LefCutLayer> {
  return (input) => {
    const m = mask(input);
    if (!m.ok) return m;
    const spacings = repeated("SPACING", cutSpacing)(m.rest);
    if (!spacings.ok) return spacings;
    const width = clause("WIDTH", terminated(float))(spacings.rest);
    if (!width.ok) return width;
    const enclosures = repeated("ENCLOSURE", enclosure)(width.rest);
    if (!enclosures.ok) return enclosures;
    const end = endName(name)(enclosures.rest);
    if (!end.ok) return end;

    const layer: LefCutLayer = { kind: "cut", name, spacings: spacings.value, enclosures: enclosures.value };
    if (m.value !== undefined) layer.mask = m.value;
    if (width.value !== undefined) layer.width = width.value;
    return ok(end.rest, layer);
  };
}

/**
 * `SPACING minSpacing [LAYER name] ;`. Commits only after the distance since the property
 * form below starts with the same keyword.
 */
const implantSpacing: Parser<LefImplantSpacing> = (input) => {
  const k = kw("SPACING")(input);
  if (!k.ok) return k;
  const spacing = float(k.rest);
  if (!spacing.ok) return spacing;
  const layer = cut(opt(keyed("LAYER", ident)))(spacing.rest);
  if (!layer.ok) return layer;
  const s = cut(context("';'", semi))(layer.rest);
  if (!s.ok) return s;
  const value: LefImplantSpacing = { minSpacing: spacing.value };
  if (layer.value !== undefined) value.layer = layer.value;
  return ok(s.rest, value);
};

/** `SPACING propName propValue ;` */
const implantProperty: Parser<[string, string]> = (input) => {
  const k = kw("SPACING")(input);
  if (!k.ok) return k;
  const key = ident(k.rest);
  if (!key.ok) return key;
  const value = cut(context("property value", ident))(key.rest);
  if (!value.ok) return value;
  const s = cut(context("';'", semi))(value.rest);
  if (!s.ok) return s;
  return ok(s.rest, [key.value, value.value]);
};

export function implantLayer(name: string): Parser<LefImplantLayer> {
  return (input) => {
    const m = mask(input);
    if (!m.ok) return m;
    const width = clause("WIDTH", terminated(float))(m.rest);
    if (!width.ok) return width;
    const spacings = many0(implantSpacing)(width.rest);
    if (!spacings.ok) return spacings;
    const properties = many0(implantProperty)(spacings.rest);
    if (!properties.ok) return properties;
    const end = endName(name)(properties.rest);
    if (!end.ok) return end;

    const layer: LefImplantLayer = {
      kind: "implant",
      name,
      spacings: spacings.value,
      properties: properties.value,
    };
    if (m.value !== undefined) layer.mask = m.value;
    if (width.value !== undefined) layer.width = width.value;
    return ok(end.rest, layer);
  };
}

const DIRECTIONS: readonly LefRoutingDirection[] = ["HORIZONTAL", "VERTICAL", "DIAG45", "DIAG135"];

const direction: Parser<LefRoutingDirection> = context(
  "direction",
  alt(...DIRECTIONS.map((d) => map(kw(d), (): LefRoutingDirection => d))),
);

const pitch: Parser<LefPitch> = (input) => {
  const first = float(input);
  if (!first.ok) return first;
  const second = opt(float)(first.rest);
  if (!second.ok) return second;
  const value: LefPitch =
    second.value === undefined ? { kind: "uniform", pitch: first.value } : { kind: "xy", x: first.value, y: second.value };
  return ok(second.rest, value);
};

const widthRange: Parser<{ minWidth: number; maxWidth: number }> = (input) => {
  const min = float(input);
  if (!min.ok) return min;
  const max = float(min.rest);
  if (!max.ok) return max;
  return ok(max.rest, { minWidth: min.value, maxWidth: max.value });
};

const routingSpacingRule: Parser<LefRoutingSpacingRule> = alt<LefRoutingSpacingRule>(
  keyed(
    "RANGE",
    map(widthRange, (r): LefRoutingSpacingRule => ({ kind: "range", ...r })),
  ),
  keyed("LENGTHTHRESHOLD", (input): ParseResult<LefRoutingSpacingRule> => {
    const maxLength = float(input);
    if (!maxLength.ok) return maxLength;
    const range = opt(keyed("RANGE", widthRange))(maxLength.rest);
    if (!range.ok) return range;
    const rule: LefRoutingSpacingRule = { kind: "lengthThreshold", maxLength: maxLength.value };
    if (range.value) rule.range = range.value;
    return ok(range.rest, rule);
  }),
  keyed(
    "SAMENET",
    map(flag("PGONLY"), (pgOnly): LefRoutingSpacingRule => ({ kind: "sameNet", pgOnly })),
  ),
  keyed("ENDOFLINE", (input): ParseResult<LefRoutingSpacingRule> => {
    const width = float(input);
    if (!width.ok) return width;
    const within = preceded(kw("WITHIN"), float)(width.rest);
    if (!within.ok) return within;
    return ok(within.rest, { kind: "endOfLine", width: width.value, within: within.value });
  }),
  keyed(
    "NOTCHLENGTH",
    map(float, (length): LefRoutingSpacingRule => ({ kind: "notchLength", length })),
  ),
);

/** Body of `SPACING minSpacing [rule] ;` */
const routingSpacing: Parser<LefRoutingSpacing> = (input) => {
  const min = float(input);
  if (!min.ok) return min;
  const rule = opt(routingSpacingRule)(min.rest);
  if (!rule.ok) return rule;
  const s = context("';'", semi)(rule.rest);
  if (!s.ok) return s;
  const value: LefRoutingSpacing = { minSpacing: min.value };
  if (rule.value) value.rule = rule.value;
  return ok(s.rest, value);
};

export function routingLayer(name: string): Parser<LefRoutingLayer> {
  return (input) => {
    const m = mask(input);
    if (!m.ok) return m;
    const dir = cut(keyed("DIRECTION", terminated(direction)))(m.rest);
    if (!dir.ok) return dir;
    const p = cut(keyed("PITCH", terminated(pitch)))(dir.rest);
    if (!p.ok) return p;
    const width = cut(keyed("WIDTH", terminated(float)))(p.rest);
    if (!width.ok) return width;
    const area = clause("AREA", terminated(float))(width.rest);
    if (!area.ok) return area;
    const spacings = repeated("SPACING", routingSpacing)(area.rest);
    if (!spacings.ok) return spacings;
    const maxWidth = clause("MAXWIDTH", terminated(float))(spacings.rest);
    if (!maxWidth.ok) return maxWidth;
    const minWidth = clause("MINWIDTH", terminated(float))(maxWidth.rest);
    if (!minWidth.ok) return minWidth;
    const end = endName(name)(minWidth.rest);
    if (!end.ok) return end;

    const layer: LefRoutingLayer = {
      kind: "routing",
      name,
      direction: dir.value,
      pitch: p.value,
      width: width.value,
      spacings: spacings.value,
    };
    if (m.value !== undefined) layer.mask = m.value;
    if (area.value !== undefined) layer.area = area.value;
    if (maxWidth.value !== undefined) layer.maxWidth = maxWidth.value;
    if (minWidth.value !== undefined) layer.minWidth = minWidth.value;
    return ok(end.rest, layer);
  };
}

const LEF58_TYPES: readonly Lef58Type[] = [
  "NWELL",
  "PWELL",
  "ABOVEDIEEDGE",
  "BELOWDIEEDGE",
  "DIFFUSION",
  "TRIMPOLY",
  "TRIMMETAL",
  "REGION",
];

/** The statement inside a LEF58 property string, without its closing `;`. */
function propertyStatement(value: string): string {
  return value.trim().replace(/;$/, "").trim();
}

/** Maps a LEF58_TYPE property value such as `TYPE NWELL ;` to its type; anything else is undefined. */
export function lef58Type(value: string): Lef58Type | undefined {
  const upper = propertyStatement(value).toUpperCase();
  return LEF58_TYPES.find((t) => upper === `TYPE ${t}`);
}

/** `TRIMMEDMETAL metalLayer [MASK maskNum]` */
export const trimmedMetal: Parser<Lef58TrimmedMetal> = (input) => {
  const k = kw("TRIMMEDMETAL")(input);
  if (!k.ok) return k;
  const layer = ident(k.rest);
  if (!layer.ok) return layer;
  const m = opt(preceded(kw("MASK"), uint))(layer.rest);
  if (!m.ok) return m;
  const value: Lef58TrimmedMetal = { metalLayer: layer.value };
  if (m.value !== undefined) value.mask = m.value;
  return ok(m.rest, value);
};

export function specialLayer(name: string, layerType: LefSpecialLayerType): Parser<LefSpecialLayer> {
  return (input) => {
    const m = mask(input);
    if (!m.ok) return m;

    const layer: LefSpecialLayer = { kind: "special", name, layerType, properties: [] };
    if (m.value !== undefined) layer.mask = m.value;

    let rest = m.rest;
    for (;;) {
      const k = kw("PROPERTY")(rest);
      if (!k.ok) break;
      const key = cut(context("property name", ident))(k.rest);
      if (!key.ok) return key;
      const value = cut(context("property value", quoted))(key.rest);
      if (!value.ok) return value;
      const s = cut(context("';'", semi))(value.rest);
      if (!s.ok) return s;

      if (key.value === "LEF58_TYPE") {
        const t = lef58Type(value.value);
        if (t) layer.lef58Type = t;
      } else if (key.value === "LEF58_TRIMMEDMETAL") {
        const tm = trimmedMetal(propertyStatement(value.value));
        if (!tm.ok || tm.rest !== "") return failure(key.rest, "invalid LEF58_TRIMMEDMETAL value");
        layer.lef58TrimmedMetal = tm.value;
      } else {
        layer.properties.push([key.value, value.value]);
      }
      rest = s.rest;
    }

    const end = endName(name)(rest);
    if (!end.ok) return end;
    return ok(end.rest, layer);
  };
}

/** `LAYER name TYPE type ; ... END name` */
export const layer: Parser<LefLayer> = (input) => {
  const k = context("LAYER", kw("LAYER"))(input);
  if (!k.ok) return k;
  const name = cut(context("layer name", ident))(k.rest);
  if (!name.ok) return name;
  const typeKw = cut(context("TYPE", kw("TYPE")))(name.rest);
  if (!typeKw.ok) return typeKw;
  const type = cut(context("layer type", ident))(typeKw.rest);
  if (!type.ok) return type;
  const s = cut(context("';'", semi))(type.rest);
  if (!s.ok) return s;

  const n = name.value;
  let body: Parser<LefLayer>;
  switch (type.value) {
    case "CUT":
      body = cutLayer(n);
      break;
    case "IMPLANT":
      body = implantLayer(n);
      break;
    case "ROUTING":
      body = routingLayer(n);
      break;
    case "MASTERSLICE":
    case "OVERLAP":
      body = specialLayer(n, type.value);
      break;
    default:
      return failure(typeKw.rest, "expected layer type");
  }
  return cut(context(`LAYER ${n}`, body))(s.rest);
};
