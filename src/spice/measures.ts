import { current, hws, skipSpiceSpace, spiceIdentifier, time, unsignedInt, voltage } from "../parse/lexeme.js";
import {
  type Parser,
  alt,
  char,
  context,
  cut,
  map,
  mismatch,
  ok,
  preceded,
  tag,
  tagNoCase,
} from "../parse/result.js";
import type { Dimensionless, UnitValue } from "../units/value.js";
import type {
  AnalysisType,
  EdgeType,
  MeasureBasicStat,
  MeasureCommand,
  MeasureFindWhen,
  MeasureFunction,
  MeasureRise,
  OutputSuffix,
  OutputVariable,
  TrigTargCondition,
} from "./model.js";

function outputSuffix(text: string): OutputSuffix | undefined {
  if (text.endsWith("M")) return "magnitude";
  if (text.endsWith("DB")) return "decibel";
  if (text.endsWith("P")) return "phase";
  if (text.endsWith("R")) return "real";
  if (text.endsWith("I")) return "imag";
  return undefined;
}

/** `V(n1[,n2])` or `I(element)` */
export const outputVariable: Parser<OutputVariable> = (input) => {
  const kind = hws(alt(tagNoCase("V"), tagNoCase("I")))(input);
  if (!kind.ok) return kind;
  const open = hws(char("("))(kind.rest);
  if (!open.ok) return open;
  const close = open.rest.indexOf(")");
  if (close === -1) return mismatch(open.rest, "')'");
  const text = open.rest.slice(0, close);
  const rest = open.rest.slice(close + 1);

  const suffix = outputSuffix(text);
  let variable: OutputVariable;
  if (kind.value.toUpperCase() === "V") {
    const [node1 = "", node2] = text.split(",").map((s) => s.trim());
    variable = { kind: "voltage", node1 };
    if (node2 !== undefined) variable.node2 = node2;
  } else {
    variable = { kind: "current", elementName: text };
  }
  if (suffix) variable.suffix = suffix;
  return ok(skipSpiceSpace(rest), variable);
};

/** A level for `variable`, read with the voltage or current suffix table to match it. */
function levelFor(variable: OutputVariable): Parser<Dimensionless> {
  const q: Parser<UnitValue<"voltage" | "current">> = variable.kind === "voltage" ? voltage : current;
  return map(hws(q), (v) => v.as("number"));
}

const edge: Parser<EdgeType> = alt<EdgeType>(
  map(tagNoCase("RISE"), (): EdgeType => "rise"),
  map(tagNoCase("FALL"), (): EdgeType => "fall"),
);

/** `V(1) VAL=0.2 RISE=1` */
export const trigTargCondition: Parser<TrigTargCondition> = (input) => {
  const variable = hws(outputVariable)(input);
  if (!variable.ok) return variable;
  const val = hws(tagNoCase("VAL="))(variable.rest);
  if (!val.ok) return val;
  const value = levelFor(variable.value)(val.rest);
  if (!value.ok) return value;
  const e = hws(edge)(value.rest);
  if (!e.ok) return e;
  const eq = hws(tag("="))(e.rest);
  if (!eq.ok) return eq;
  const n = hws(unsignedInt)(eq.rest);
  if (!n.ok) return n;
  return ok(n.rest, { variable: variable.value, value: value.value, edge: e.value, number: n.value });
};

const STAT_FUNCTIONS: ReadonlyArray<readonly [string, MeasureFunction]> = [
  ["AVG", "avg"],
  ["RMS", "rms"],
  ["MIN", "min"],
  ["MAX", "max"],
  ["PP", "pp"],
  ["DERIV", "deriv"],
  ["INTEGRATE", "integrate"],
];

const measureFunction: Parser<MeasureFunction> = alt(
  ...STAT_FUNCTIONS.map(([token, fn]) => map(tagNoCase(token), (): MeasureFunction => fn)),
);

const analysisType: Parser<AnalysisType> = alt<AnalysisType>(
  map(tagNoCase("TRAN"), (): AnalysisType => "tran"),
  map(tagNoCase("AC"), (): AnalysisType => "ac"),
  map(tagNoCase("DC"), (): AnalysisType => "dc"),
);

type Header = { name: string; analysis: AnalysisType };

/** `TRIG <cond> TARG <cond>` */
function measureRise({ name, analysis }: Header): Parser<MeasureRise> {
  return (input) => {
    const trigKw = context("TRIG keyword", hws(tagNoCase("TRIG")))(input);
    if (!trigKw.ok) return trigKw;
    const trig = cut(context("trigger_condition", hws(trigTargCondition)))(trigKw.rest);
    if (!trig.ok) return trig;
    const targKw = cut(context("TARG keyword", hws(tagNoCase("TARG"))))(trig.rest);
    if (!targKw.ok) return targKw;
    const targ = cut(context("target_condition", hws(trigTargCondition)))(targKw.rest);
    if (!targ.ok) return targ;
    return ok(targ.rest, { kind: "rise", name, analysis, trig: trig.value, targ: targ.value });
  };
}

/** `AVG V(1) FROM=10n TO=55n` */
function measureBasicStat({ name, analysis }: Header): Parser<MeasureBasicStat> {
  return (input) => {
    const stat = context("stat_function", hws(measureFunction))(input);
    if (!stat.ok) return stat;
    const variable = cut(context("variable", hws(outputVariable)))(stat.rest);
    if (!variable.ok) return variable;
    const from = cut(context("FROM value", preceded(hws(tagNoCase("FROM=")), hws(time))))(variable.rest);
    if (!from.ok) return from;
    const to = cut(context("TO value", preceded(hws(tagNoCase("TO=")), hws(time))))(from.rest);
    if (!to.ok) return to;
    return ok(to.rest, {
      kind: "basicStat",
      name,
      analysis,
      stat: stat.value,
      variable: variable.value,
      from: from.value,
      to: to.value,
    });
  };
}

const findWhenCondition: Parser<MeasureFindWhen["when"]> = (input) => {
  const variable = hws(outputVariable)(input);
  if (!variable.ok) return variable;
  const eq = hws(tag("="))(variable.rest);
  if (!eq.ok) return eq;
  const value = levelFor(variable.value)(eq.rest);
  if (!value.ok) return value;
  return ok(value.rest, { variable: variable.value, value: value.value });
};

/** `FIND I(Vmeas) WHEN V(1)=1V` */
function measureFindWhen({ name, analysis }: Header): Parser<MeasureFindWhen> {
  return (input) => {
    const find = context("FIND keyword", hws(tagNoCase("FIND")))(input);
    if (!find.ok) return find;
    const variable = cut(context("variable", hws(outputVariable)))(find.rest);
    if (!variable.ok) return variable;
    const when = cut(context("WHEN keyword", hws(tagNoCase("WHEN"))))(variable.rest);
    if (!when.ok) return when;
    const cond = cut(context("condition", hws(findWhenCondition)))(when.rest);
    if (!cond.ok) return cond;
    return ok(cond.rest, { kind: "findWhen", name, analysis, variable: variable.value, when: cond.value });
  };
}

/** `.MEAS[URE] TRAN|AC|DC <name> ...` */
export const measureCommand: Parser<MeasureCommand> = context<MeasureCommand>("measure_command", (input) => {
  const kw = context("keyword", hws(alt(tagNoCase(".MEASURE"), tagNoCase(".MEAS"))))(input);
  if (!kw.ok) return kw;
  const analysis = cut(context("analysis_type", hws(analysisType)))(kw.rest);
  if (!analysis.ok) return analysis;
  const name = cut(context("measure_name", hws(spiceIdentifier)))(analysis.rest);
  if (!name.ok) return name;

  const header: Header = { name: name.value, analysis: analysis.value };
  return cut(
    alt<MeasureCommand>(
      context("measure_rise", measureRise(header)),
      context("measure_basic_stat", measureBasicStat(header)),
      context("measure_find_when", measureFindWhen(header)),
    ),
  )(name.rest);
});
