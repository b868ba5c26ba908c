import fs from "fs-extra";

export async function readTextIfExists(filePath?: string): Promise<string | undefined> {
  if (!filePath) return undefined;
  const ok = await fs.pathExists(filePath);
  if (!ok) return undefined;
  return fs.readFile(filePath, "utf-8");
}

/** Like {@link readTextIfExists} but a missing file is an error. */
export async function readText(filePath: string): Promise<string> {
  const text = await readTextIfExists(filePath);
  if (text === undefined) throw new Error(`File not found: ${filePath}`);
  return text;
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await fs.outputFile(filePath, content, "utf-8");
}
