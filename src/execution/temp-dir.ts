import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

/**
 * Run `fn` with a fresh directory under the OS temp dir. The directory is
 * removed however `fn` exits.
 */
export async function withTempDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

/** Contents of a report a tool may or may not have written; null when absent. */
export async function readReport(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}
