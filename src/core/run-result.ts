import type { CaseResult, CoverageReport, RunResult, RunTally } from "../types/result.js";

export function emptyTally(): RunTally {
  return { passed: 0, failed: 0, skipped: 0, errors: 0, duration_ms: 0, test_cases: [] };
}

/** Count one case under its status and add its duration. */
export function tallyCase(tally: RunTally, testCase: CaseResult): void {
  switch (testCase.status) {
    case "passed":
      tally.passed++;
      break;
    case "failed":
      tally.failed++;
      break;
    case "skipped":
      tally.skipped++;
      break;
    case "error":
      tally.errors++;
      break;
  }
  tally.duration_ms += testCase.duration_ms;
  tally.test_cases.push(testCase);
}

/**
 * Fold `source` into `target`. Counts and durations are summed, cases are
 * appended, so merge order never changes the final counts.
 */
export function mergeRuns(target: RunTally, source: RunTally | RunResult): void {
  target.passed += source.passed;
  target.failed += source.failed;
  target.skipped += source.skipped;
  target.errors += source.errors;
  target.duration_ms += source.duration_ms;
  target.test_cases.push(...source.test_cases);
}

export function totalOf(tally: Pick<RunTally, "passed" | "failed" | "skipped" | "errors">): number {
  return tally.passed + tally.failed + tally.skipped + tally.errors;
}

/**
 * Freeze a tally into a RunResult. `success` is decided here and only here:
 * nothing failed, nothing errored, and at least one case ran.
 */
export function finalizeRun(tally: RunTally, rawOutput: string): RunResult {
  const total = totalOf(tally);
  return Object.freeze({
    passed: tally.passed,
    failed: tally.failed,
    skipped: tally.skipped,
    errors: tally.errors,
    total,
    duration_ms: tally.duration_ms,
    success: tally.failed === 0 && tally.errors === 0 && total > 0,
    raw_output: rawOutput,
    test_cases: Object.freeze([...tally.test_cases]),
  });
}

/** A run that produced no usable signal. */
export function failedRun(rawOutput: string): RunResult {
  return finalizeRun(emptyTally(), rawOutput);
}

export function withCoverage(result: RunResult, coverage: CoverageReport): RunResult {
  return Object.freeze({ ...result, coverage });
}

/** Merge several results and finalize once. */
export function aggregateRuns(results: readonly RunResult[], rawOutput: string): RunResult {
  const tally = emptyTally();
  for (const result of results) mergeRuns(tally, result);
  return finalizeRun(tally, rawOutput);
}
