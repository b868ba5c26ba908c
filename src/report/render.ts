import type { LefTechLibrary } from "../lef/model.js";
import { netlistToDot } from "../netlist/graph.js";
import { documentToSpice } from "../spice/emit.js";
import type { SpiceDocument } from "../spice/model.js";
import { writeText } from "../util/io.js";
import type { Logger } from "../util/logger.js";
import type { OutputFormat } from "../util/runConfig.js";
import { summarizeLef, summarizeSpice } from "./summary.js";

export function renderSpice(doc: SpiceDocument, format: OutputFormat, pretty: number): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(doc, null, pretty)}\n`;
    case "spice":
      return documentToSpice(doc);
    case "dot":
      return netlistToDot(doc);
    case "summary":
      return summarizeSpice(doc);
  }
}

/** A technology library has no netlist or graph form; only `json` and `summary` render. */
export function renderLef(lib: LefTechLibrary, format: OutputFormat, pretty: number): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(lib, null, pretty)}\n`;
    case "summary":
      return summarizeLef(lib);
    default:
      throw new Error(`Unsupported format for lef: ${format}`);
  }
}

/** Print to stdout, or write `out` (creating its directory) and log the path. */
export async function writeOutput(text: string, out: string | undefined, log: Logger): Promise<void> {
  if (!out) {
    process.stdout.write(text);
    return;
  }
  await writeText(out, text);
  log.info(`wrote ${out}`);
}
