import { skipLefSpace } from "../parse/lexeme.js";
import { type Frame, type Parser, context, cut, failure, lineOf, many0, ok, renderTrace } from "../parse/result.js";
import { readText } from "../util/io.js";
import { type Logger, silentLogger } from "../util/logger.js";
import { busbitChars, dividerChar, manufacturingGrid, units, useMinSpacing, version } from "./header.js";
import { layer } from "./layers.js";
import type { LefTechLibrary } from "./model.js";
import { kw } from "./tokens.js";

export type LefReadErrorKind = "io" | "parse";

export class LefReadError extends Error {
  readonly kind: LefReadErrorKind;
  readonly line?: number;

  constructor(kind: LefReadErrorKind, message: string, opts: { line?: number; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "LefReadError";
    this.kind = kind;
    if (opts.line !== undefined) this.line = opts.line;
  }
}

/** `END LIBRARY`, optional at the end of a technology file. */
const endLibrary: Parser<boolean> = (input) => {
  const end = kw("END")(input);
  if (!end.ok) return ok(input, false);
  const lib = cut(context("END LIBRARY", kw("LIBRARY")))(end.rest);
  if (!lib.ok) return lib;
  return ok(lib.rest, true);
};

/**
 * Header statements in their fixed order, then the layers. Parsing stops at the first thing
 * that is not a layer; {@link readLef} decides whether what is left is acceptable.
 */
export const techLibrary: Parser<LefTechLibrary> = (input) => {
  const v = cut(version)(skipLefSpace(input));
  if (!v.ok) return v;
  const bb = cut(busbitChars)(v.rest);
  if (!bb.ok) return bb;
  const dc = cut(dividerChar)(bb.rest);
  if (!dc.ok) return dc;
  const u = cut(units)(dc.rest);
  if (!u.ok) return u;
  const grid = manufacturingGrid(u.rest);
  if (!grid.ok) return grid;
  const minSpacing = useMinSpacing(grid.rest);
  if (!minSpacing.ok) return minSpacing;
  const layers = many0(layer)(minSpacing.rest);
  if (!layers.ok) return layers;

  const lib: LefTechLibrary = {
    version: v.value,
    busbitchars: bb.value,
    dividerchar: dc.value,
    units: u.value,
    layers: layers.value,
  };
  if (grid.value !== undefined) lib.manufacturingGrid = grid.value;
  if (minSpacing.value !== undefined) lib.useMinSpacing = minSpacing.value;
  return ok(layers.rest, lib);
};

function parseError(text: string, trace: Frame[], fallback: string): LefReadError {
  const line = lineOf(text, trace[0]?.input ?? fallback);
  return new LefReadError("parse", `Error at line ${line}:\n${renderTrace(text, trace)}`, { line });
}

/**
 * Parse a technology LEF file. `END LIBRARY` is optional; anything after the last layer
 * (or after `END LIBRARY`) is an error.
 */
export function readLef(text: string): LefTechLibrary {
  const r = techLibrary(text);
  if (!r.ok) throw parseError(text, r.trace, text);
  const end = endLibrary(r.rest);
  if (!end.ok) throw parseError(text, end.trace, r.rest);
  const rest = skipLefSpace(end.rest);
  if (rest !== "") throw parseError(text, failure(rest, "unexpected content").trace, rest);
  return r.value;
}

export async function loadLef(filePath: string, logger: Logger = silentLogger): Promise<LefTechLibrary> {
  let text: string;
  try {
    text = await readText(filePath);
  } catch (e: unknown) {
    throw new LefReadError("io", e instanceof Error ? e.message : String(e), { cause: e });
  }
  const lib = readLef(text);
  logger.debug(`${filePath}: LEF ${lib.version}, ${lib.layers.length} layers`);
  return lib;
}
