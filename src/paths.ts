import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Nearest ancestor of this module holding a package.json. Sources run from
 * `src/` under vitest and from `dist/src/` once built; both resolve here.
 */
export function packageRoot(): string {
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (!fs.existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error("package.json not found above " + fileURLToPath(import.meta.url));
    dir = parent;
  }
  return dir;
}

export const CONFIG_DIR_NAME = "config";
export const SCHEMA_DIR_NAME = "schemas";
