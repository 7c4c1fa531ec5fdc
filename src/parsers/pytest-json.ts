import type { CaseResult, CaseStatus, RunResult } from "../types/result.js";
import { emptyTally, failedRun, finalizeRun, tallyCase } from "../core/run-result.js";
import { extractJsonObject, isJsonObject } from "./json-extract.js";

const OUTCOMES: Readonly<Record<string, CaseStatus>> = {
  passed: "passed",
  xpassed: "passed",
  failed: "failed",
  skipped: "skipped",
  xfailed: "skipped",
  error: "error",
};

export function pytestOutcomeToStatus(outcome: string): CaseStatus {
  return OUTCOMES[outcome] ?? "error";
}

function seconds(value: unknown): number {
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
}

/**
 * Parse a pytest-json-report document. The report may be surrounded by
 * other runner output; the first balanced object is used.
 *
 * The run's `duration_ms` is the report's own root duration, not the sum
 * of its cases.
 */
export function parsePytestJson(output: string, transcript: string): RunResult {
  const report = extractJsonObject(output);
  if (report === null) return failedRun(transcript);

  const tally = emptyTally();
  const tests = Array.isArray(report.tests) ? report.tests : [];
  for (const entry of tests) {
    tallyCase(tally, toCase(isJsonObject(entry) ? entry : {}));
  }
  tally.duration_ms = seconds(report.duration) * 1000;
  return finalizeRun(tally, transcript);
}

function toCase(test: Record<string, unknown>): CaseResult {
  const nodeid = typeof test.nodeid === "string" ? test.nodeid : "unknown";
  const call = isJsonObject(test.call) ? test.call : undefined;

  let durationS = seconds(test.duration);
  if (durationS === 0 && call) durationS = seconds(call.duration);

  const sep = nodeid.indexOf("::");
  return {
    name: nodeid,
    status: pytestOutcomeToStatus(typeof test.outcome === "string" ? test.outcome : "error"),
    duration_ms: durationS * 1000,
    failure_message: call ? callFailure(call) : "",
    file_path: sep === -1 ? "" : nodeid.slice(0, sep),
  };
}

function callFailure(call: Record<string, unknown>): string {
  if (typeof call.longrepr === "string" && call.longrepr) return call.longrepr;
  if (isJsonObject(call.crash)) {
    const message = call.crash.message;
    return typeof message === "string" ? message : "";
  }
  return "";
}
