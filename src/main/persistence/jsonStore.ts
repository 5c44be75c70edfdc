import crypto from "crypto";
import fs from "fs/promises";
import path from "path";

async function ensureDir(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Reads and parses a JSON file. A missing file yields `fallback`; any other
 * read or parse failure is thrown so callers never mistake a damaged file for
 * an empty one.
 */
export async function readJsonFile(filePath: string, fallback: unknown): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return fallback;
    throw err;
  }
  return JSON.parse(raw);
}

/** Writes through a temp file and a rename, so readers see the old or the new file, never half of one. */
export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await writeTextFile(filePath, JSON.stringify(value, null, 2));
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  await ensureDir(filePath);
  const tmpPath = `${filePath}.${process.pid}.${crypto.randomBytes(4).toString("hex")}.tmp`;
  try {
    await fs.writeFile(tmpPath, text, "utf-8");
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}
