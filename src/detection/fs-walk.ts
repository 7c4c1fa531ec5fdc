import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";

export const DEFAULT_MAX_SCAN_FILES = 5000;

const SKIPPED_DIRS = new Set(["node_modules"]);

export type WalkOptions = {
  /** Stop after this many files have been yielded. */
  maxFiles?: number;
  /** Directory names not entered, on top of hidden and dependency directories. */
  skipDirs?: readonly string[];
};

/**
 * Files under `root`, depth-first in directory-listing order. Hidden
 * entries and dependency directories are not entered. Unreadable
 * directories are skipped.
 */
export function* walkFiles(root: string, opts: WalkOptions = {}): Generator<string> {
  const maxFiles = opts.maxFiles ?? DEFAULT_MAX_SCAN_FILES;
  const skipDirs = new Set([...SKIPPED_DIRS, ...(opts.skipDirs ?? [])]);
  let yielded = 0;
  const stack: string[] = [root];

  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;

    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true }).sort((a, b) => a.name.localeCompare(b.name));
    } catch {
      continue;
    }

    const subdirs: string[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!skipDirs.has(entry.name)) subdirs.push(full);
        continue;
      }
      if (!entry.isFile()) continue;
      yield full;
      if (++yielded >= maxFiles) return;
    }
    // Reverse so the first subdirectory is visited first.
    for (let i = subdirs.length - 1; i >= 0; i--) stack.push(subdirs[i]);
  }
}

/** Relative path with forward slashes, for glob matching. */
export function toPosixRelative(root: string, file: string): string {
  return path.relative(root, file).split(path.sep).join("/");
}

/** True when any file under `root` matches one of the glob patterns. */
export function hasMatchingFile(root: string, patterns: readonly string[], opts: WalkOptions = {}): boolean {
  for (const file of walkFiles(root, opts)) {
    const rel = toPosixRelative(root, file);
    if (patterns.some((p) => minimatch(rel, p))) return true;
  }
  return false;
}

/** Read a file as UTF-8, or null when it is missing or unreadable. */
export function readTextOrNull(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf8");
  } catch {
    return null;
  }
}

/** Read at most `bytes` bytes from the start of a file. */
export function readPrefix(filePath: string, bytes: number): string | null {
  let fd: number | undefined;
  try {
    fd = fs.openSync(filePath, "r");
    const buf = Buffer.alloc(bytes);
    const read = fs.readSync(fd, buf, 0, bytes, 0);
    return buf.subarray(0, read).toString("utf8");
  } catch {
    return null;
  } finally {
    if (fd !== undefined) fs.closeSync(fd);
  }
}

export function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

export function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}
