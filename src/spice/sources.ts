import { angle, current, frequency, hws, node, number, spiceIdentifier, time, voltage } from "../parse/lexeme.js";
import { type ParseResult, type Parser, alt, char, context, cut, failure, map, mismatch, ok, opt, tagNoCase } from "../parse/result.js";
import { type Angle, type Quantity, type UnitValue, unit } from "../units/value.js";
import type { Pulse, Pwl, PwlPoint, Sine, Source, SourceKind, SourceValue } from "./model.js";

/**
 * An optional `KW=` / `KW` keyword followed by `p`. Once the keyword is seen `p` is committed;
 * a bare value stays a plain mismatch so other forms can be tried.
 */
function keyworded<T>(keyword: string, p: Parser<T>): Parser<T> {
  const kw = opt(alt(hws(tagNoCase(`${keyword}=`)), hws(tagNoCase(keyword))));
  return (input) => {
    const k = kw(input);
    if (!k.ok) return k;
    return k.value === undefined ? p(k.rest) : cut(p)(k.rest);
  };
}

function dcValue<Q extends Quantity>(q: Parser<UnitValue<Q>>): Parser<UnitValue<Q>> {
  return context("dc", keyworded("DC", hws(q)));
}

function acValue<Q extends Quantity>(q: Parser<UnitValue<Q>>): Parser<{ magnitude: UnitValue<Q>; phase: Angle }> {
  const body: Parser<{ magnitude: UnitValue<Q>; phase: Angle }> = (input) => {
    const magnitude = hws(q)(input);
    if (!magnitude.ok) return magnitude;
    const phase = hws(angle)(magnitude.rest);
    if (!phase.ok) return phase;
    return ok(phase.rest, { magnitude: magnitude.value, phase: phase.value });
  };
  return (input) => {
    const kw = opt(alt(hws(tagNoCase("AC=")), hws(tagNoCase("AC"))))(input);
    if (!kw.ok) return kw;
    if (kw.value === undefined) return body(kw.rest);
    // After the keyword each field commits on its own.
    const magnitude = cut(hws(q))(kw.rest);
    if (!magnitude.ok) return magnitude;
    const phase = cut(hws(angle))(magnitude.rest);
    if (!phase.ok) return phase;
    return ok(phase.rest, { magnitude: magnitude.value, phase: phase.value });
  };
}

/** `NAME (` with the parenthesis committed. */
function opening(name: string): Parser<string> {
  return (input) => {
    const kw = hws(tagNoCase(name))(input);
    if (!kw.ok) return kw;
    return cut(hws(char("(")))(kw.rest);
  };
}

const closing = cut(context("closing parenthesis", hws(char(")"))));

function field<T>(label: string, p: Parser<T>): Parser<T> {
  return cut(context(label, hws(p)));
}

/** `SIN(vo va freq [td [damping [phase]]])` */
export const sine: Parser<Sine> = context<Sine>("SIN", (input) => {
  const open = opening("SIN")(input);
  if (!open.ok) return open;
  const offset = field("vo", voltage)(open.rest);
  if (!offset.ok) return offset;
  const amplitude = field("va", voltage)(offset.rest);
  if (!amplitude.ok) return amplitude;
  const freq = field("freq", frequency)(amplitude.rest);
  if (!freq.ok) return freq;
  const delay = context("td", opt(hws(time)))(freq.rest);
  if (!delay.ok) return delay;
  const damping = context("a", opt(hws(frequency)))(delay.rest);
  if (!damping.ok) return damping;
  const phase = context("phase", opt(hws(number)))(damping.rest);
  if (!phase.ok) return phase;
  const close = closing(phase.rest);
  if (!close.ok) return close;
  return ok(close.rest, {
    kind: "sin",
    offset: offset.value,
    amplitude: amplitude.value,
    frequency: freq.value,
    delay: delay.value ?? unit("time", 0),
    damping: damping.value ?? unit("frequency", 0),
    phase: phase.value ?? unit("number", 0),
  });
});

/** `PWL(t1 v1 t2 v2 ...)`, at least one pair. */
export const pwl: Parser<Pwl> = context<Pwl>("PWL", (input) => {
  const open = opening("PWL")(input);
  if (!open.ok) return open;
  const points: PwlPoint[] = [];
  let rest = open.rest;
  for (;;) {
    const t = cut(hws(time))(rest);
    if (!t.ok) return t;
    const v = cut(hws(voltage))(t.rest);
    if (!v.ok) return v;
    points.push({ time: t.value, value: v.value });
    rest = v.rest;
    const end = opt(hws(char(")")))(rest);
    if (!end.ok) return end;
    rest = end.rest;
    if (end.value !== undefined) break;
  }
  return ok(rest, { kind: "pwl", points });
});

/** `PULSE(v0 v1 td tr tf pw per)` */
export const pulse: Parser<Pulse> = context<Pulse>("PULSE", (input) => {
  const open = opening("PULSE")(input);
  if (!open.ok) return open;
  const initial = field("v0", voltage)(open.rest);
  if (!initial.ok) return initial;
  const pulsed = field("v1", voltage)(initial.rest);
  if (!pulsed.ok) return pulsed;

  const times: UnitValue<"time">[] = [];
  let rest = pulsed.rest;
  for (const label of ["td", "tr", "tf", "tw", "to"]) {
    const r = field(label, time)(rest);
    if (!r.ok) return r;
    times.push(r.value);
    rest = r.rest;
  }
  const close = closing(rest);
  if (!close.ok) return close;
  const [delay, rise, fall, width, period] = times;
  return ok(close.rest, { kind: "pulse", initial: initial.value, pulsed: pulsed.value, delay, rise, fall, width, period });
});

const voltageValue: Parser<SourceValue> = alt<SourceValue>(
  map(dcValue(voltage), (value): SourceValue => ({ kind: "dcVoltage", value })),
  map(context("ac voltage", acValue(voltage)), (v): SourceValue => ({ kind: "acVoltage", ...v })),
  sine,
  pwl,
  pulse,
);

const currentValue: Parser<SourceValue> = alt<SourceValue>(
  map(dcValue(current), (value): SourceValue => ({ kind: "dcCurrent", value })),
  map(context("ac current", acValue(current)), (v): SourceValue => ({ kind: "acCurrent", ...v })),
  sine,
  pwl,
  pulse,
);

export function sourceValue(kind: SourceKind): Parser<SourceValue> {
  return context("source_value", kind === "voltage" ? voltageValue : currentValue);
}

/** `Vname n+ n- value` or `Iname n+ n- value` */
export const source: Parser<Source> = context<Source>("source", (input): ParseResult<Source> => {
  const name = context("name", hws(spiceIdentifier))(input);
  if (!name.ok) return name;
  const letter = name.value[0]?.toUpperCase();
  const kind: SourceKind | undefined = letter === "V" ? "voltage" : letter === "I" ? "current" : undefined;
  if (!kind) return mismatch(name.rest, "Source must begin with V or I");
  if (name.value.length === 1) return failure(name.rest, "empty name");

  const pos = cut(context("node_pos", hws(node)))(name.rest);
  if (!pos.ok) return pos;
  const neg = cut(context("node_neg", hws(node)))(pos.rest);
  if (!neg.ok) return neg;
  const value = cut(context("source_value", hws(sourceValue(kind))))(neg.rest);
  if (!value.ok) return value;
  return ok(value.rest, {
    name: name.value.slice(1),
    kind,
    nodePos: pos.value,
    nodeNeg: neg.value,
    value: value.value,
  });
});
