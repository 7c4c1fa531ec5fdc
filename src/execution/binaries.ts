import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { CommandOutcome, RunResult, RunTally } from "../types/result.js";
import { emptyTally, failedRun, finalizeRun, mergeRuns } from "../core/run-result.js";
import { walkFiles, type WalkOptions } from "../detection/fs-walk.js";
import { createLogger } from "../logging/logger.js";
import type { CommandRunner, Transcript } from "./command.js";
import { stemOf } from "./cmake.js";
import { readReport } from "./temp-dir.js";

const log = createLogger("binaries");

/** Sources and build metadata that glob patterns like `*test*` also hit. */
const NON_BINARY_EXTENSIONS = new Set([".cpp", ".cc", ".cxx", ".h", ".hpp", ".txt", ".cmake"]);

export function isExecutableFile(file: string): boolean {
  if (NON_BINARY_EXTENSIONS.has(path.extname(file).toLowerCase())) return false;
  try {
    const st = fs.statSync(file);
    return st.isFile() && (st.mode & 0o111) !== 0;
  } catch {
    return false;
  }
}

function resolveReal(file: string): string {
  try {
    return fs.realpathSync(file);
  } catch {
    return path.resolve(file);
  }
}

/** CMake's per-target object and dependency directories. */
const BUILD_METADATA_DIRS = ["CMakeFiles"];

/**
 * Executables whose base name matches one of `patterns`, from the build
 * directory first and then the whole project. Each binary appears once,
 * at its first discovery position. The walk is unbounded unless `opts`
 * sets a limit.
 */
export function discoverBinaries(
  projectRoot: string,
  buildDir: string | null,
  patterns: readonly string[],
  opts: WalkOptions = {},
): string[] {
  const walk: WalkOptions = {
    maxFiles: opts.maxFiles ?? Number.POSITIVE_INFINITY,
    skipDirs: [...BUILD_METADATA_DIRS, ...(opts.skipDirs ?? [])],
  };
  const roots = buildDir === null ? [projectRoot] : [buildDir, projectRoot];
  const seen = new Set<string>();
  const ordered: string[] = [];

  for (const root of roots) {
    for (const pattern of patterns) {
      for (const file of walkFiles(root, walk)) {
        if (!minimatch(path.basename(file), pattern)) continue;
        if (!isExecutableFile(file)) continue;
        const real = resolveReal(file);
        if (seen.has(real)) continue;
        seen.add(real);
        ordered.push(real);
      }
    }
  }
  return ordered;
}

/**
 * Keep binaries whose stem matches a requested test file's stem,
 * case-insensitively. When nothing matches, run everything.
 */
export function selectBinaries(binaries: readonly string[], testFiles: readonly string[]): string[] {
  if (testFiles.length === 0) return [...binaries];
  const wanted = new Set(testFiles.map((f) => stemOf(f).toLowerCase()));
  const filtered = binaries.filter((b) => wanted.has(stemOf(b).toLowerCase()));
  return filtered.length > 0 ? filtered : [...binaries];
}

/** How one framework's test binaries are invoked and read. */
export type DirectRunProfile = {
  /** Human-readable framework name used in transcript notes. */
  label: string;
  reportName: (index: number) => string;
  command: (binary: string, reportPath: string) => string[];
  parseReport: (text: string, transcript: string) => RunResult;
  /** Consulted when a binary wrote no report. */
  parseConsole?: (output: string, transcript: string) => RunResult;
};

export type DirectRunOptions = {
  binaries: readonly string[];
  reportDir: string;
  timeoutMs: number;
  runner: CommandRunner;
  transcript: Transcript;
  profile: DirectRunProfile;
};

/**
 * Run each binary in turn, in its own directory, with its own timeout.
 * A binary that times out counts as one error and the loop moves on.
 */
export async function runBinaries(opts: DirectRunOptions): Promise<RunResult> {
  const { binaries, profile, transcript, runner, timeoutMs } = opts;
  if (binaries.length === 0) {
    transcript.note(`No ${profile.label} binaries found for direct execution.`);
    return failedRun(transcript.toString());
  }

  const tally = emptyTally();
  for (const [index, binary] of binaries.entries()) {
    const reportPath = path.join(opts.reportDir, profile.reportName(index));
    const cmd = profile.command(binary, reportPath);
    const outcome = await runner(cmd, { cwd: path.dirname(binary), timeoutMs });
    transcript.record(cmd, outcome);

    if (outcome.timed_out) {
      log.warn("test binary timed out", { binary, timeout_ms: timeoutMs });
      tally.errors++;
      continue;
    }

    const report = await readReport(reportPath);
    if (report !== null) {
      mergeRuns(tally, profile.parseReport(report, ""));
      continue;
    }
    if (profile.parseConsole) mergeConsoleSummary(tally, outcome, profile.parseConsole);
  }
  return finalizeRun(tally, transcript.toString());
}

function mergeConsoleSummary(
  tally: RunTally,
  outcome: CommandOutcome,
  parse: (output: string, transcript: string) => RunResult,
): void {
  const parsed = parse(`${outcome.stdout}\n${outcome.stderr}`, "");
  if (parsed.total > 0) mergeRuns(tally, parsed);
  else if (outcome.returncode !== 0) tally.errors++;
}
