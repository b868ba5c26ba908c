export * from "./units/value.js";
export * from "./parse/result.js";
export * from "./spice/model.js";
export { readSpice, loadSpice, SpiceReadError, type SpiceReadErrorKind, type Statement } from "./spice/read.js";
export * from "./spice/emit.js";
export * from "./spice/waveforms.js";
export * from "./lef/model.js";
export { readLef, loadLef, LefReadError, type LefReadErrorKind } from "./lef/read.js";
export { netlistToDot, documentElements, type Element } from "./netlist/graph.js";
export { summarizeSpice, summarizeLef } from "./report/summary.js";
export { renderSpice, renderLef } from "./report/render.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./util/logger.js";
