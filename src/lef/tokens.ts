import { lefFloat, lefIdentifier, qstring, unsignedInt, ws } from "../parse/lexeme.js";
import { type Parser, context, cut, ok, tag } from "../parse/result.js";

export const kw = (t: string): Parser<string> => ws(tag(t));
export const semi = kw(";");
export const float = ws(lefFloat);
export const uint = ws(unsignedInt);
export const ident = ws(lefIdentifier);
export const quoted = ws(qstring);

/**
 * `KEYWORD <body>` where the body is committed once the keyword matched. Without the keyword
 * the result is `undefined` and nothing is consumed.
 */
export function clause<T>(keyword: string, body: Parser<T>): Parser<T | undefined> {
  return (input) => {
    const k = kw(keyword)(input);
    if (!k.ok) return ok(input, undefined);
    return cut(context(keyword, body))(k.rest);
  };
}

/** `<value> ;` */
export function terminated<T>(p: Parser<T>): Parser<T> {
  return (input) => {
    const r = p(input);
    if (!r.ok) return r;
    const s = context("';'", semi)(r.rest);
    if (!s.ok) return s;
    return ok(s.rest, r.value);
  };
}

/** Zero or more `KEYWORD <body>` clauses. */
export function repeated<T>(keyword: string, body: Parser<T>): Parser<T[]> {
  const one = clause(keyword, body);
  return (input) => {
    const out: T[] = [];
    let rest = input;
    for (;;) {
      const r = one(rest);
      if (!r.ok) return r;
      if (r.value === undefined) return ok(rest, out);
      out.push(r.value);
      rest = r.rest;
    }
  };
}
