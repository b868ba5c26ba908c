import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import fs from "fs-extra";
import { afterEach, describe, expect, it, vi } from "vitest";
import { readLef } from "../../src/lef/read.js";
import { netlistToDot } from "../../src/netlist/graph.js";
import { renderLef, renderSpice, writeOutput } from "../../src/report/render.js";
import { summarizeLef, summarizeSpice } from "../../src/report/summary.js";
import { documentToSpice } from "../../src/spice/emit.js";
import { loadSpice } from "../../src/spice/read.js";
import { type Logger, silentLogger } from "../../src/util/logger.js";

const fixture = (name: string) => fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));

const lef = [
  "VERSION 5.8 ;",
  'BUSBITCHARS "[]" ;',
  'DIVIDERCHAR "/" ;',
  "UNITS",
  "  DATABASE MICRONS 1000 ;",
  "END UNITS",
  "END LIBRARY",
  "",
].join("\n");

afterEach(() => {
  vi.restoreAllMocks();
});

describe("renderSpice", () => {
  it("dispatches on the format", async () => {
    const doc = await loadSpice(fixture("rc_filter.cir"));
    expect(renderSpice(doc, "summary", 2)).toBe(summarizeSpice(doc));
    expect(renderSpice(doc, "spice", 2)).toBe(documentToSpice(doc));
    expect(renderSpice(doc, "dot", 2)).toBe(netlistToDot(doc));
    expect(renderSpice(doc, "json", 0)).toBe(`${JSON.stringify(doc)}\n`);
  });
});

describe("renderLef", () => {
  const lib = readLef(lef);

  it("renders json and summary", () => {
    expect(renderLef(lib, "summary", 2)).toBe(summarizeLef(lib));
    expect(renderLef(lib, "json", 2)).toBe(`${JSON.stringify(lib, null, 2)}\n`);
  });

  it("rejects netlist formats", () => {
    expect(() => renderLef(lib, "spice", 2)).toThrow("Unsupported format for lef: spice");
    expect(() => renderLef(lib, "dot", 2)).toThrow("Unsupported format for lef: dot");
  });
});

describe("writeOutput", () => {
  it("prints to stdout without an output path", async () => {
    const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
    await writeOutput("Components: 0\n", undefined, silentLogger);
    expect(write).toHaveBeenCalledWith("Components: 0\n");
  });

  it("writes the file and logs its path", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "edaparse-out-"));
    const info = vi.fn();
    const log: Logger = { ...silentLogger, info };
    const out = path.join(dir, "nested", "graph.dot");
    try {
      await writeOutput("graph netlist {}\n", out, log);
      expect(await fs.readFile(out, "utf-8")).toBe("graph netlist {}\n");
      expect(info).toHaveBeenCalledWith(`wrote ${out}`);
    } finally {
      await fs.remove(dir);
    }
  });
});
