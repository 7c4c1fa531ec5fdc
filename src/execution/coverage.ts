import type { CoverageReport, RunResult } from "../types/result.js";
import { withCoverage } from "../core/run-result.js";
import { createLogger } from "../logging/logger.js";

const log = createLogger("coverage");

export type CoverageRunOptions = {
  testFiles: readonly string[];
  timeoutMs: number;
};

/** External coverage tool (gcov, coverage.py, coverlet). */
export type CoverageAdapter = {
  runCoverage(projectPath: string, opts: CoverageRunOptions): Promise<CoverageReport>;
};

/**
 * Attach coverage to a finished run. A failing collector is logged and
 * the run is returned unchanged.
 */
export async function attachCoverage(
  result: RunResult,
  adapter: CoverageAdapter,
  projectPath: string,
  opts: CoverageRunOptions,
): Promise<RunResult> {
  try {
    const report = await adapter.runCoverage(projectPath, opts);
    log.info("coverage collected", { overall_line_coverage: report.overall_line_coverage });
    return withCoverage(result, report);
  } catch (e: unknown) {
    log.warn("coverage collection failed", { error: e instanceof Error ? e.message : String(e) });
    return result;
  }
}
