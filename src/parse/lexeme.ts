import { type Quantity, type Suffix, UnitValue } from "../units/value.js";
import { type Parser, mismatch, ok, takeWhile } from "./result.js";

/**
 * Skip spaces, tabs and carriage returns on the current logical line. A newline ends the
 * line unless the next physical line starts with `+`, which continues it.
 */
export function skipSpiceSpace(input: string): string {
  let i = 0;
  for (;;) {
    const c = input[i];
    if (c === " " || c === "\t" || c === "\r") {
      i++;
    } else if (c === "\n" && input[i + 1] === "+") {
      i += 2;
      while (input[i] === " " || input[i] === "\t") i++;
    } else {
      break;
    }
  }
  return i === 0 ? input : input.slice(i);
}

/** Skip any whitespace including newlines, and `#` comments. */
export function skipLefSpace(input: string): string {
  let i = 0;
  for (;;) {
    const c = input[i];
    if (c === " " || c === "\t" || c === "\r" || c === "\n") {
      i++;
    } else if (c === "#") {
      while (i < input.length && input[i] !== "\n") i++;
    } else {
      break;
    }
  }
  return i === 0 ? input : input.slice(i);
}

export function hws<T>(p: Parser<T>): Parser<T> {
  return (input) => {
    const r = p(skipSpiceSpace(input));
    if (!r.ok) return r;
    return ok(skipSpiceSpace(r.rest), r.value);
  };
}

export function ws<T>(p: Parser<T>): Parser<T> {
  return (input) => {
    const r = p(skipLefSpace(input));
    if (!r.ok) return r;
    return ok(skipLefSpace(r.rest), r.value);
  };
}

const isAlpha = (c: string) => /[A-Za-z]/.test(c);
const isDigit = (c: string) => c >= "0" && c <= "9";
const isWordChar = (c: string) => isAlpha(c) || isDigit(c) || c === "_";

function identifierWith(rest: (c: string) => boolean, label: string): Parser<string> {
  return (input) => {
    const c = input[0];
    if (c === undefined || !(isAlpha(c) || c === "_")) return mismatch(input, label);
    let i = 1;
    while (i < input.length && rest(input[i])) i++;
    return ok(input.slice(i), input.slice(0, i));
  };
}

export const spiceIdentifier: Parser<string> = identifierWith((c) => isWordChar(c) || c === ".", "identifier");

export const lefIdentifier: Parser<string> = identifierWith(isWordChar, "identifier");

export const node: Parser<string> = takeWhile((c) => isWordChar(c) || c === ".", 1, "node");

export const unsignedInt: Parser<number> = (input) => {
  const m = /^\d+/.exec(input);
  if (!m) return mismatch(input, "unsigned integer");
  const n = Number(m[0]);
  if (n > 0xffffffff) return mismatch(input, "unsigned integer");
  return ok(input.slice(m[0].length), n);
};

export const spiceFloat: Parser<number> = (input) => {
  const m = /^-?\d+(?:\.\d*)?/.exec(input);
  if (!m) return mismatch(input, "number");
  return ok(input.slice(m[0].length), Number(m[0]));
};

/** Like {@link spiceFloat} but `_` may separate digits. */
export const lefFloat: Parser<number> = (input) => {
  const m = /^-?\d[\d_]*(?:\.(?:\d[\d_]*)?)?/.exec(input);
  if (!m) return mismatch(input, "number");
  return ok(input.slice(m[0].length), Number(m[0].replace(/_/g, "")));
};

export const qstring: Parser<string> = (input) => {
  if (input[0] !== '"') return mismatch(input, "quoted string");
  const end = input.indexOf('"', 1);
  if (end === -1) return mismatch(input, "quoted string");
  return ok(input.slice(end + 1), input.slice(1, end));
};

/** `*` or `;` up to the end of the line; the line ending is consumed. */
export const comment: Parser<string> = (input) => {
  if (input[0] !== "*" && input[0] !== ";") return mismatch(input, "comment");
  let i = 1;
  while (input[i] === " " || input[i] === "\t") i++;
  const nl = input.indexOf("\n", i);
  const end = nl === -1 ? input.length : nl;
  const text = input.slice(i, end).trimEnd();
  return ok(input.slice(nl === -1 ? end : end + 1), text);
};

const MULTIPLIERS: ReadonlyArray<readonly [string, Suffix]> = [
  ["g", "mega"],
  ["meg", "mega"],
  ["k", "kilo"],
  ["m", "milli"],
  ["u", "micro"],
  ["n", "nano"],
  ["p", "pico"],
];

const UNIT_LETTER: Partial<Record<Quantity, string>> = {
  voltage: "v",
  current: "a",
  resistance: "Ω",
  capacitance: "f",
  inductance: "h",
  time: "s",
  frequency: "hz",
};

/**
 * Suffix tokens in the order they are tried: unit-qualified multipliers, bare multipliers,
 * then the bare unit letter.
 */
export function suffixTable(quantity: Quantity): ReadonlyArray<readonly [string, Suffix]> {
  const letter = UNIT_LETTER[quantity];
  if (!letter) return MULTIPLIERS;
  return [
    ...MULTIPLIERS.map(([t, s]) => [t + letter, s] as const),
    ...MULTIPLIERS,
    [letter, "none"] as const,
  ];
}

export function quantity<Q extends Quantity>(q: Q): Parser<UnitValue<Q>> {
  const table = suffixTable(q);
  return (input) => {
    const n = spiceFloat(input);
    if (!n.ok) return mismatch(input, q === "number" ? "number" : `${q} value`);
    let rest = n.rest;
    let suffix: Suffix = "none";
    for (const [token, s] of table) {
      if (rest.slice(0, token.length).toLowerCase() === token.toLowerCase()) {
        rest = rest.slice(token.length);
        suffix = s;
        break;
      }
    }
    return ok(rest, new UnitValue(q, n.value, suffix));
  };
}

export const number = quantity("number");
export const voltage = quantity("voltage");
export const current = quantity("current");
export const resistance = quantity("resistance");
export const capacitance = quantity("capacitance");
export const inductance = quantity("inductance");
export const time = quantity("time");
export const frequency = quantity("frequency");
export const angle = quantity("angle");
