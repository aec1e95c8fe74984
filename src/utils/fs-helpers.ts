import * as fs from "node:fs/promises";
import { SliceError } from "../errors.js";

/** Read a JSON file and parse it */
export async function readJSON(filePath: string): Promise<unknown> {
  const content = await fs.readFile(filePath, "utf-8");
  return JSON.parse(content);
}

async function statOrNull(p: string) {
  try {
    return await fs.stat(p);
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Fail unless `p` is absent or a directory */
export async function assertDirectoryOrAbsent(p: string): Promise<void> {
  const st = await statOrNull(p);
  if (st && !st.isDirectory()) {
    throw new SliceError("precondition", `Output path exists and is not a directory: ${p}`);
  }
}

/** Fail unless `p` is an existing regular file */
export async function assertFile(p: string, what: string): Promise<void> {
  const st = await statOrNull(p);
  if (!st || !st.isFile()) {
    throw new SliceError("precondition", `${what} not found: ${p}`);
  }
}

/** Create a directory and its parents if missing */
export async function ensureDirectory(p: string): Promise<void> {
  await fs.mkdir(p, { recursive: true });
}
