/** Canonical result model shared by every adapter, parser and consumer. */

export type CaseStatus = "passed" | "failed" | "skipped" | "error";

export type CaseResult = {
  /** Framework-specific fully-qualified identifier, often `suite.test`. */
  name: string;
  status: CaseStatus;
  duration_ms: number;
  /** Empty unless the case failed or errored. */
  failure_message: string;
  /** Best-effort; empty when the report does not say. */
  file_path: string;
};

export type LineCoverage = {
  line_number: number;
  execution_count: number;
};

export type FileCoverage = {
  file_path: string;
  lines: LineCoverage[];
};

/** Produced by an external coverage collaborator and carried opaquely. */
export type CoverageReport = {
  files: Record<string, FileCoverage>;
  overall_line_coverage: number;
};

/**
 * Mutable counters used while a report is parsed or several partial runs
 * are merged. Never handed to callers; see `finalizeRun`.
 */
export type RunTally = {
  passed: number;
  failed: number;
  skipped: number;
  errors: number;
  duration_ms: number;
  test_cases: CaseResult[];
};

export type RunResult = {
  readonly passed: number;
  readonly failed: number;
  readonly skipped: number;
  readonly errors: number;
  readonly total: number;
  readonly duration_ms: number;
  readonly success: boolean;
  /** Full diagnostic transcript of every command the run issued. */
  readonly raw_output: string;
  readonly test_cases: readonly CaseResult[];
  readonly coverage?: CoverageReport;
};

export type ValidationResult = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

/** Outcome of one subprocess invocation. */
export type CommandOutcome = {
  returncode: number;
  stdout: string;
  stderr: string;
  timed_out: boolean;
  not_found: boolean;
};
