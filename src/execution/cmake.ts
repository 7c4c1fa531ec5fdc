import path from "node:path";
import type { RunResult } from "../types/result.js";
import { failedRun } from "../core/run-result.js";
import { isDirectory, isFile } from "../detection/fs-walk.js";
import { createLogger } from "../logging/logger.js";
import type { CommandRunner, Transcript } from "./command.js";
import { readReport } from "./temp-dir.js";

const log = createLogger("cmake");

/** Probed in order; the project root itself is tried last. */
export const BUILD_DIR_CANDIDATES = ["build", "cmake-build-debug", "cmake-build-release"] as const;

export const CTEST_REPORT_NAME = "ctest-results.xml";

export function looksLikeCmakeBuildDir(dir: string): boolean {
  if (!isDirectory(dir)) return false;
  return (
    isFile(path.join(dir, "CMakeCache.txt")) ||
    isFile(path.join(dir, "CTestTestfile.cmake")) ||
    isDirectory(path.join(dir, "Testing"))
  );
}

export function findCmakeBuildDir(projectRoot: string): string | null {
  for (const name of BUILD_DIR_CANDIDATES) {
    const candidate = path.join(projectRoot, name);
    if (looksLikeCmakeBuildDir(candidate)) return candidate;
  }
  return looksLikeCmakeBuildDir(projectRoot) ? projectRoot : null;
}

/** File name without its last extension. */
export function stemOf(file: string): string {
  return path.parse(file).name;
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** `-R` pattern selecting the tests named after the given files; "" for none. */
export function ctestRegexFromTestFiles(testFiles: readonly string[]): string {
  return testFiles
    .map(stemOf)
    .filter((stem) => stem !== "")
    .map(escapeRegex)
    .join("|");
}

/**
 * Result of the primary strategy: either a final answer (parsed report or
 * terminal timeout) or a request to try the fallback.
 */
export type PrimaryOutcome = { kind: "done"; result: RunResult } | { kind: "fallback"; reason: string };

export type CtestRunOptions = {
  buildDir: string | null;
  reportDir: string;
  testFiles: readonly string[];
  timeoutMs: number;
  runner: CommandRunner;
  transcript: Transcript;
  parse: (reportText: string, transcript: string) => RunResult;
};

/**
 * Build the `test` target, then run CTest with a JUnit report.
 *
 * A timeout in either step is terminal, and so is a build that exits
 * non-zero. A missing build tool or a missing report hands over to the
 * fallback.
 */
export async function runViaCtest(opts: CtestRunOptions): Promise<PrimaryOutcome> {
  const { buildDir, transcript, runner, timeoutMs } = opts;
  if (buildDir === null) return { kind: "fallback", reason: "no CMake build directory" };

  const buildCmd = ["cmake", "--build", ".", "--target", "test"];
  const build = await runner(buildCmd, { cwd: buildDir, timeoutMs });
  transcript.record(buildCmd, build);

  if (build.timed_out) {
    log.warn("build timed out", { build_dir: buildDir, timeout_ms: timeoutMs });
    return { kind: "done", result: failedRun(transcript.toString()) };
  }
  if (build.not_found) return { kind: "fallback", reason: "cmake not found" };
  if (build.returncode !== 0) {
    log.warn("build failed", { build_dir: buildDir, exit_code: build.returncode });
    return { kind: "done", result: failedRun(transcript.toString()) };
  }

  const reportPath = path.join(opts.reportDir, CTEST_REPORT_NAME);
  const ctestCmd = ["ctest", "--output-on-failure", "--output-junit", reportPath];
  const regex = ctestRegexFromTestFiles(opts.testFiles);
  if (regex) ctestCmd.push("-R", regex);

  const ctest = await runner(ctestCmd, { cwd: buildDir, timeoutMs });
  transcript.record(ctestCmd, ctest);

  if (ctest.timed_out) {
    log.warn("ctest timed out", { build_dir: buildDir, timeout_ms: timeoutMs });
    return { kind: "done", result: failedRun(transcript.toString()) };
  }

  const report = await readReport(reportPath);
  if (report === null) return { kind: "fallback", reason: "ctest wrote no JUnit report" };

  return { kind: "done", result: opts.parse(report, transcript.toString()) };
}
