/**
 * Parser results and the combinators shared by the SPICE and LEF grammars.
 *
 * A parser is a pure function from the remaining input to a result. The remaining input is
 * always a suffix of the full text, so a position is recovered from its length alone.
 */

export type Frame = { input: string; label: string };

export type Ok<T> = { ok: true; rest: string; value: T };

/**
 * `fatal: false` is a mismatch: the caller may backtrack and try something else.
 * `fatal: true` means the grammar had committed; alternation stops and the error surfaces.
 * Frames are innermost first.
 */
export type Fail = { ok: false; fatal: boolean; trace: Frame[] };

export type ParseResult<T> = Ok<T> | Fail;

export type Parser<T> = (input: string) => ParseResult<T>;

export function ok<T>(rest: string, value: T): Ok<T> {
  return { ok: true, rest, value };
}

export function mismatch(input: string, label: string): Fail {
  return { ok: false, fatal: false, trace: [{ input, label }] };
}

export function failure(input: string, label: string): Fail {
  return { ok: false, fatal: true, trace: [{ input, label }] };
}

export function context<T>(label: string, p: Parser<T>): Parser<T> {
  return (input) => {
    const r = p(input);
    if (r.ok) return r;
    return { ok: false, fatal: r.fatal, trace: [...r.trace, { input, label }] };
  };
}

/** Promote a mismatch to a fatal failure. */
export function cut<T>(p: Parser<T>): Parser<T> {
  return (input) => {
    const r = p(input);
    if (r.ok || r.fatal) return r;
    return { ok: false, fatal: true, trace: r.trace };
  };
}

export function alt<T>(...ps: Parser<T>[]): Parser<T> {
  return (input) => {
    let last: Fail = mismatch(input, "alternative");
    for (const p of ps) {
      const r = p(input);
      if (r.ok || r.fatal) return r;
      last = r;
    }
    return last;
  };
}

export function opt<T>(p: Parser<T>): Parser<T | undefined> {
  return (input) => {
    const r = p(input);
    if (r.ok || r.fatal) return r;
    return ok(input, undefined);
  };
}

export function many0<T>(p: Parser<T>): Parser<T[]> {
  return (input) => {
    const out: T[] = [];
    let rest = input;
    for (;;) {
      const r = p(rest);
      if (!r.ok) {
        if (r.fatal) return r;
        return ok(rest, out);
      }
      if (r.rest.length === rest.length) return ok(rest, out);
      out.push(r.value);
      rest = r.rest;
    }
  };
}

export function map<T, U>(p: Parser<T>, f: (value: T) => U): Parser<U> {
  return (input) => {
    const r = p(input);
    if (!r.ok) return r;
    return ok(r.rest, f(r.value));
  };
}

/** Run `first`, discard its value, then run `second`. */
export function preceded<A, B>(first: Parser<A>, second: Parser<B>): Parser<B> {
  return (input) => {
    const a = first(input);
    if (!a.ok) return a;
    return second(a.rest);
  };
}

export function tag(t: string): Parser<string> {
  return (input) => (input.startsWith(t) ? ok(input.slice(t.length), t) : mismatch(input, `"${t}"`));
}

export function tagNoCase(t: string): Parser<string> {
  const lower = t.toLowerCase();
  return (input) => {
    const head = input.slice(0, t.length);
    return head.toLowerCase() === lower ? ok(input.slice(t.length), head) : mismatch(input, `"${t}"`);
  };
}

export function char(c: string): Parser<string> {
  return (input) => (input[0] === c ? ok(input.slice(1), c) : mismatch(input, `'${c}'`));
}

/** Longest run of characters matching `pred`; at least `min` of them. */
export function takeWhile(pred: (c: string) => boolean, min: number, label: string): Parser<string> {
  return (input) => {
    let i = 0;
    while (i < input.length && pred(input[i])) i++;
    if (i < min) return mismatch(input, label);
    return ok(input.slice(i), input.slice(0, i));
  };
}

export function offsetOf(full: string, rest: string): number {
  return full.length - rest.length;
}

export function lineOf(full: string, rest: string): number {
  const offset = offsetOf(full, rest);
  let line = 1;
  for (let i = 0; i < offset && i < full.length; i++) {
    if (full[i] === "\n") line++;
  }
  return line;
}

export function renderTrace(full: string, trace: Frame[]): string {
  return trace
    .map((frame, i) => {
      if (!full.endsWith(frame.input)) return `${i}: in ${frame.label}`;
      const offset = offsetOf(full, frame.input);
      const lineStart = offset === 0 ? 0 : full.lastIndexOf("\n", offset - 1) + 1;
      const nl = full.indexOf("\n", offset);
      const lineEnd = nl === -1 ? full.length : nl;
      const text = full.slice(lineStart, lineEnd).replace(/\r$/, "");
      const caret = `${" ".repeat(offset - lineStart)}^`;
      return `${i}: at line ${lineOf(full, frame.input)}, in ${frame.label}:\n${text}\n${caret}\n`;
    })
    .join("\n");
}
