import { type ParseResult, type Parser, alt, context, cut, failure, map, ok } from "../parse/result.js";
import type { LefBusBitChars, LefDividerChar, LefUnits, LefUseMinSpacing } from "./model.js";
import { clause, float, ident, kw, semi, terminated, uint } from "./tokens.js";

/** `VERSION 5.8 ;` */
export const version: Parser<number> = (input) => {
  const k = context("VERSION", kw("VERSION"))(input);
  if (!k.ok) return k;
  return cut(context("VERSION", terminated(float)))(k.rest);
};

const BUSBIT_CHARS: readonly LefBusBitChars[] = ["[]", "{}", "<>"];
const DIVIDER_CHARS: readonly LefDividerChar[] = ["/", "\\", "%", "$"];

function quotedChoice<T extends string>(choices: readonly T[], label: string): Parser<T> {
  return context(label, alt(...choices.map((c) => map(kw(`"${c}"`), (): T => c))));
}

/** `BUSBITCHARS "[]" ;` */
export const busbitChars: Parser<LefBusBitChars> = (input) => {
  const k = context("BUSBITCHARS", kw("BUSBITCHARS"))(input);
  if (!k.ok) return k;
  return cut(context("BUSBITCHARS", terminated(quotedChoice(BUSBIT_CHARS, "bus bit characters"))))(k.rest);
};

/** `DIVIDERCHAR "/" ;` */
export const dividerChar: Parser<LefDividerChar> = (input) => {
  const k = context("DIVIDERCHAR", kw("DIVIDERCHAR"))(input);
  if (!k.ok) return k;
  return cut(context("DIVIDERCHAR", terminated(quotedChoice(DIVIDER_CHARS, "divider character"))))(k.rest);
};

type UnitField = keyof LefUnits;

const UNIT_CLAUSES: ReadonlyArray<readonly [string, string, UnitField]> = [
  ["TIME", "NANOSECONDS", "time"],
  ["CAPACITANCE", "PICOFARADS", "capacitance"],
  ["RESISTANCE", "OHMS", "resistance"],
  ["POWER", "MILLIWATTS", "power"],
  ["CURRENT", "MILLIAMPS", "current"],
  ["VOLTAGE", "VOLTS", "voltage"],
  ["DATABASE", "MICRONS", "databaseMicrons"],
  ["FREQUENCY", "MEGAHERTZ", "frequency"],
];

function unitClause(scale: string, field: UnitField): Parser<number> {
  const value = field === "databaseMicrons" ? uint : float;
  return (input) => {
    const s = context(scale, kw(scale))(input);
    if (!s.ok) return s;
    return terminated(value)(s.rest);
  };
}

/**
 * `UNITS ... END UNITS`. Each conversion clause may appear at most once, in any order.
 */
export const units: Parser<LefUnits> = (input) => {
  const k = context("UNITS", kw("UNITS"))(input);
  if (!k.ok) return k;

  const result: LefUnits = {};
  let rest = k.rest;
  outer: for (;;) {
    for (const [keyword, scale, field] of UNIT_CLAUSES) {
      const c = clause(keyword, unitClause(scale, field))(rest);
      if (!c.ok) return c;
      if (c.value === undefined) continue;
      if (result[field] !== undefined) return failure(rest, `duplicate ${keyword} in UNITS`);
      result[field] = c.value;
      rest = c.rest;
      continue outer;
    }
    break;
  }

  const end = cut(context("END UNITS", kw("END")))(rest);
  if (!end.ok) return end;
  const name = cut(context("END UNITS", kw("UNITS")))(end.rest);
  if (!name.ok) return name;
  return ok(name.rest, result);
};

/** `MANUFACTURINGGRID 0.005 ;` */
export const manufacturingGrid: Parser<number | undefined> = clause("MANUFACTURINGGRID", terminated(float));

/**
 * `USEMINSPACING ON|OFF ;`. Both words currently map to ON.
 */
export const useMinSpacing: Parser<LefUseMinSpacing | undefined> = clause(
  "USEMINSPACING",
  (input): ParseResult<LefUseMinSpacing> => {
    const word = ident(input);
    if (!word.ok) return word;
    if (word.value !== "ON" && word.value !== "OFF") {
      return failure(input, "expected USEMINSPACING ON or OFF");
    }
    const s = context("';'", semi)(word.rest);
    if (!s.ok) return s;
    return ok(s.rest, "ON");
  },
);
