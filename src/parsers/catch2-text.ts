import type { RunResult } from "../types/result.js";
import { emptyTally, finalizeRun, totalOf } from "../core/run-result.js";

const ALL_PASSED = /All tests passed \(\d+ assertions? in (\d+) test cases?\)/i;
const SUMMARY =
  /test cases:\s*(\d+)\s*\|\s*(\d+)\s*passed\s*\|\s*(\d+)\s*failed(?:\s*\|\s*(\d+)\s*skipped)?/i;

/**
 * Counts from Catch2's console summary. No per-case detail is available,
 * so `test_cases` stays empty. Cases the summary totals but does not
 * classify are counted as errors.
 */
export function parseCatch2Text(output: string, transcript: string): RunResult {
  const tally = emptyTally();

  const allPassed = ALL_PASSED.exec(output);
  if (allPassed) {
    tally.passed = Number(allPassed[1]);
    return finalizeRun(tally, transcript);
  }

  const summary = SUMMARY.exec(output);
  if (summary) {
    tally.passed = Number(summary[2]);
    tally.failed = Number(summary[3]);
    tally.skipped = summary[4] === undefined ? 0 : Number(summary[4]);
    const declared = Number(summary[1]);
    const counted = totalOf(tally);
    if (declared > counted) tally.errors = declared - counted;
  }
  return finalizeRun(tally, transcript);
}
