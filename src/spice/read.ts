import { comment, hws } from "../parse/lexeme.js";
import { type Parser, alt, lineOf, map, mismatch, ok, renderTrace, tagNoCase } from "../parse/result.js";
import { readText } from "../util/io.js";
import { type Logger, silentLogger } from "../util/logger.js";
import { simCommand } from "./commands.js";
import { component, model } from "./components.js";
import { measureCommand } from "./measures.js";
import {
  type Component,
  type Instance,
  type MeasureCommand,
  type Model,
  type SimCommand,
  type Source,
  type SpiceDocument,
  type Subckt,
  emptyDocument,
} from "./model.js";
import { source } from "./sources.js";
import { instance, subckt } from "./subckt.js";

export type SpiceReadErrorKind = "io" | "parse";

export class SpiceReadError extends Error {
  readonly kind: SpiceReadErrorKind;
  readonly line?: number;

  constructor(kind: SpiceReadErrorKind, message: string, opts: { line?: number; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "SpiceReadError";
    this.kind = kind;
    if (opts.line !== undefined) this.line = opts.line;
  }
}

export type Statement =
  | { kind: "component"; value: Component }
  | { kind: "source"; value: Source }
  | { kind: "simulation"; value: SimCommand }
  | { kind: "measure"; value: MeasureCommand }
  | { kind: "instance"; value: Instance }
  | { kind: "subckt"; value: Subckt }
  | { kind: "model"; value: Model }
  | { kind: "title"; value: string }
  | { kind: "end" };

const title: Parser<string> = (input) => {
  const kw = tagNoCase(".TITLE")(input);
  if (!kw.ok) return kw;
  if (kw.rest && !/^[ \t\r\n]/.test(kw.rest)) return mismatch(input, ".TITLE");
  const nl = kw.rest.indexOf("\n");
  const line = nl === -1 ? kw.rest : kw.rest.slice(0, nl);
  return ok(nl === -1 ? "" : kw.rest.slice(nl), line.trim());
};

/** `.END` on its own; `.ENDS` is not a match. */
const end: Parser<null> = (input) => {
  const kw = tagNoCase(".END")(input);
  if (!kw.ok) return kw;
  if (kw.rest && !/^[ \t\r\n]/.test(kw.rest)) return mismatch(input, ".END");
  return ok(kw.rest, null);
};

export const statement: Parser<Statement> = alt<Statement>(
  map(hws(component), (value): Statement => ({ kind: "component", value })),
  map(hws(source), (value): Statement => ({ kind: "source", value })),
  map(hws(simCommand), (value): Statement => ({ kind: "simulation", value })),
  map(hws(measureCommand), (value): Statement => ({ kind: "measure", value })),
  map(hws(instance), (value): Statement => ({ kind: "instance", value })),
  map(hws(subckt), (value): Statement => ({ kind: "subckt", value })),
  map(hws(model), (value): Statement => ({ kind: "model", value })),
  map(hws(title), (value): Statement => ({ kind: "title", value })),
  map(hws(end), (): Statement => ({ kind: "end" })),
);

function addStatement(doc: SpiceDocument, s: Statement): void {
  switch (s.kind) {
    case "component":
      doc.components.push(s.value);
      break;
    case "source":
      doc.sources.push(s.value);
      break;
    case "simulation":
      doc.simulation.push(s.value);
      break;
    case "measure":
      doc.measures.push(s.value);
      break;
    case "instance":
      doc.instances.push(s.value);
      break;
    case "subckt":
      doc.subckts.push(s.value);
      break;
    case "model":
      doc.models.push(s.value);
      break;
    case "title":
      doc.title = s.value;
      break;
    case "end":
      break;
  }
}

/** Skip blank lines and whole-line comments. */
function skipBlankOrComments(input: string): string {
  let rest = input;
  for (;;) {
    rest = rest.trimStart();
    const c = comment(rest);
    if (!c.ok) return rest;
    rest = c.rest;
  }
}

/**
 * Parse a whole netlist. Statements are collected in source order; the first error aborts
 * with a {@link SpiceReadError} naming the line.
 */
export function readSpice(text: string): SpiceDocument {
  const doc = emptyDocument();
  let input = text;
  for (;;) {
    input = skipBlankOrComments(input);
    if (!input) break;

    const r = statement(input);
    if (!r.ok) {
      if (r.fatal) {
        const at = r.trace[0]?.input ?? input;
        const line = lineOf(text, at);
        throw new SpiceReadError("parse", `Error at line ${line}:\n${renderTrace(text, r.trace)}`, { line });
      }
      const line = lineOf(text, input);
      const first = input.split("\n")[0].trim();
      throw new SpiceReadError("parse", `At line ${line}: Unknown statement: ${first}`, { line });
    }
    addStatement(doc, r.value);
    input = r.rest;
    if (r.value.kind === "end") break;
  }
  return doc;
}

export async function loadSpice(filePath: string, logger: Logger = silentLogger): Promise<SpiceDocument> {
  let text: string;
  try {
    text = await readText(filePath);
  } catch (e: unknown) {
    throw new SpiceReadError("io", e instanceof Error ? e.message : String(e), { cause: e });
  }
  const doc = readSpice(text);
  logger.debug(
    `${filePath}: ${doc.components.length} components, ${doc.sources.length} sources, ${doc.subckts.length} subckts`,
  );
  return doc;
}
