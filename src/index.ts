#!/usr/bin/env node
import "dotenv/config";
import { Command } from "commander";
import chalk from "chalk";

import { loadLef } from "./lef/read.js";
import { renderLef, renderSpice, writeOutput } from "./report/render.js";
import { loadSpice } from "./spice/read.js";
import { createLogger, resolveLogLevel } from "./util/logger.js";
import { type RunConfig, mergeRunConfig, readRunConfig } from "./util/runConfig.js";

type CommonOpts = { format?: string; pretty?: string; out?: string; config?: string };

async function resolveOptions(opts: CommonOpts): Promise<RunConfig> {
  const cfg = opts.config ? await readRunConfig(opts.config) : {};
  return mergeRunConfig(opts, cfg);
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

const program = new Command();

program
  .name("edaparse")
  .description("Parse SPICE netlists and LEF technology libraries into typed documents.")
  .version("0.1.0");

program
  .command("spice")
  .description("Parse a SPICE netlist.")
  .argument("<file>", "netlist file (.cir/.sp)")
  .option("--format <format>", "json|summary|spice|dot")
  .option("--pretty <n>", "JSON indentation")
  .option("--out <path>", "write output to a file instead of stdout")
  .option("--config <path>", "JSON config file")
  .action(async (file: string, opts: CommonOpts) => {
    try {
      const cfg = await resolveOptions(opts);
      const log = createLogger("spice", cfg.logLevel ?? resolveLogLevel());
      const doc = await loadSpice(file, log);
      const text = renderSpice(doc, cfg.format ?? "summary", cfg.pretty ?? 2);
      await writeOutput(text, cfg.out, log);
    } catch (e: unknown) {
      console.error(chalk.red(errorMessage(e)));
      process.exitCode = 2;
    }
  });

program
  .command("lef")
  .description("Parse a LEF technology library.")
  .argument("<file>", "technology LEF file")
  .option("--format <format>", "json|summary")
  .option("--pretty <n>", "JSON indentation")
  .option("--out <path>", "write output to a file instead of stdout")
  .option("--config <path>", "JSON config file")
  .action(async (file: string, opts: CommonOpts) => {
    try {
      const cfg = await resolveOptions(opts);
      const log = createLogger("lef", cfg.logLevel ?? resolveLogLevel());
      const format = cfg.format ?? "summary";
      if (format !== "json" && format !== "summary") throw new Error(`Unsupported format for lef: ${format}`);

      const lib = await loadLef(file, log);
      await writeOutput(renderLef(lib, format, cfg.pretty ?? 2), cfg.out, log);
    } catch (e: unknown) {
      console.error(chalk.red(errorMessage(e)));
      process.exitCode = 2;
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? (err.stack ?? err.message) : String(err)));
  process.exit(1);
});
