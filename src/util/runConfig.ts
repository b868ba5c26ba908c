import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";

export const OUTPUT_FORMATS = ["json", "summary", "spice", "dot"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const RunConfigSchema = z
  .object({
    format: z.enum(OUTPUT_FORMATS).optional(),
    pretty: z.number().int().min(0).max(10).optional(),
    out: z.string().optional(),
    logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
  })
  .strict();

export type RunConfig = z.infer<typeof RunConfigSchema>;

function cleanString(v: unknown): string | undefined {
  if (typeof v !== "string") return undefined;
  const s = v.trim();
  return s ? s : undefined;
}

export function isOutputFormat(v: unknown): v is OutputFormat {
  return typeof v === "string" && OUTPUT_FORMATS.some((f) => f === v);
}

export async function readRunConfig(configPath: string): Promise<RunConfig> {
  const abs = path.resolve(configPath);
  const ok = await fs.pathExists(abs);
  if (!ok) throw new Error(`Config file not found: ${configPath}`);

  const raw: unknown = await fs.readJson(abs);
  const parsed = RunConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new Error(`Invalid config JSON: ${msg}`);
  }

  // Blank strings count as unset.
  const cfg = parsed.data;
  const out: RunConfig = { ...cfg };
  const o = cleanString(cfg.out);
  if (o) out.out = o;
  else delete out.out;
  return out;
}

/** CLI flags win over the file when they were given. An unknown `--format` is an error. */
export function mergeRunConfig(
  cli: { format?: unknown; pretty?: unknown; out?: unknown },
  cfg: RunConfig,
): RunConfig {
  const merged: RunConfig = { ...cfg };

  if (isOutputFormat(cli.format)) merged.format = cli.format;
  else if (cli.format !== undefined) {
    throw new Error(`Unsupported format: ${String(cli.format)} (expected ${OUTPUT_FORMATS.join("|")})`);
  }

  const pretty = typeof cli.pretty === "string" ? Number.parseInt(cli.pretty, 10) : cli.pretty;
  if (typeof pretty === "number" && Number.isInteger(pretty) && pretty >= 0) merged.pretty = pretty;

  const out = cleanString(cli.out);
  if (out) merged.out = out;

  return merged;
}
