import path from "node:path";
import { hasMatchingFile, readPrefix, readTextOrNull, walkFiles, type WalkOptions } from "./fs-walk.js";

/** Only this much of each source file is searched for include statements. */
export const SOURCE_SCAN_PREFIX_BYTES = 8192;

export type ConfigMarkerProbe = {
  /** Config file relative to the project root, e.g. `CMakeLists.txt`. */
  file: string;
  /** Lower-case framework name that must appear in the file. */
  name: string;
  /** Lower-case build-system markers; at least one must also appear. */
  markers: readonly string[];
};

export type IncludeProbe = {
  extensions: ReadonlySet<string>;
  pattern: RegExp;
};

/**
 * Framework name plus a real build marker. A config that only mentions the
 * name (say, in a comment) does not count.
 */
export function configHasMarkers(root: string, probe: ConfigMarkerProbe): boolean {
  const content = readTextOrNull(path.join(root, probe.file));
  if (content === null) return false;
  const normalized = content.toLowerCase();
  if (!normalized.includes(probe.name)) return false;
  return probe.markers.some((m) => normalized.includes(m));
}

/** Some allow-listed source file has a matching include/import near its top. */
export function sourceHasInclude(root: string, probe: IncludeProbe, opts: WalkOptions = {}): boolean {
  for (const file of walkFiles(root, opts)) {
    if (!probe.extensions.has(path.extname(file).toLowerCase())) continue;
    const snippet = readPrefix(file, SOURCE_SCAN_PREFIX_BYTES);
    if (snippet !== null && probe.pattern.test(snippet)) return true;
  }
  return false;
}

export function hasTestFiles(root: string, patterns: readonly string[], opts: WalkOptions = {}): boolean {
  return hasMatchingFile(root, patterns, opts);
}

/** Files with the given extension whose content matches `pattern`. */
export function findFilesMatching(
  root: string,
  extension: string,
  pattern: RegExp,
  opts: WalkOptions = {},
): string[] {
  const found: string[] = [];
  for (const file of walkFiles(root, opts)) {
    if (path.extname(file).toLowerCase() !== extension) continue;
    const content = readTextOrNull(file);
    if (content !== null && pattern.test(content)) found.push(file);
  }
  return found;
}

export const CPP_SOURCE_EXTENSIONS: ReadonlySet<string> = new Set([
  ".cpp",
  ".cc",
  ".cxx",
  ".h",
  ".hh",
  ".hpp",
  ".hxx",
]);
