import type { CaseResult, CaseStatus, RunResult } from "../types/result.js";
import { emptyTally, failedRun, finalizeRun, tallyCase } from "../core/run-result.js";
import { toMillis } from "../core/duration.js";
import { isJsonObject } from "./json-extract.js";

type JsonObject = Record<string, unknown>;

/** Keys under which gtest-style JSON nests suites and cases. */
const CHILD_KEYS = ["testsuites", "testsuite", "testcases", "tests", "children"] as const;

const FAILED = new Set(["failed", "failure", "fail"]);
const SKIPPED = new Set(["skipped", "notrun", "disabled", "pending"]);
const PASSED = new Set(["passed", "run", "ok", "success"]);

function str(value: unknown): string {
  return typeof value === "string" ? value : "";
}

export function parseGtestJson(json: string, transcript: string): RunResult {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch {
    return failedRun(transcript);
  }
  if (!isJsonObject(payload)) return failedRun(transcript);

  const tally = emptyTally();
  for (const c of collectCases(payload)) tallyCase(tally, c);
  return finalizeRun(tally, transcript);
}

/**
 * Walk the tree collecting leaves. A case is named by the dotted chain of
 * its ancestors' names. Traversal continues below leaves.
 */
export function collectCases(root: JsonObject): CaseResult[] {
  const cases: CaseResult[] = [];

  const walk = (node: unknown, parents: string[]): void => {
    if (Array.isArray(node)) {
      for (const item of node) walk(item, parents);
      return;
    }
    if (!isJsonObject(node)) return;

    const own = str(node.name);
    const chain = own ? [...parents, own] : parents;

    if (isLeaf(node)) {
      const [status, failure] = statusOf(node);
      cases.push({
        name: chain.length > 0 ? chain.join(".") : "unknown",
        status,
        duration_ms: toMillis(node.time ?? node.duration ?? 0),
        failure_message: failure,
        file_path: str(node.file),
      });
    }

    for (const key of CHILD_KEYS) {
      if (node[key] !== undefined && node[key] !== null) walk(node[key], chain);
    }
  };

  walk(root, []);
  return cases;
}

function isLeaf(node: JsonObject): boolean {
  return "status" in node || "result" in node || Array.isArray(node.failures);
}

function statusOf(node: JsonObject): [CaseStatus, string] {
  const failure = formatFailures(node.failures);
  const raw = (str(node.status) || str(node.result)).toLowerCase();
  if (failure || FAILED.has(raw)) return ["failed", failure];
  if (SKIPPED.has(raw)) return ["skipped", ""];
  if (PASSED.has(raw)) return ["passed", ""];
  return ["error", failure];
}

function formatFailures(failures: unknown): string {
  if (!Array.isArray(failures)) return "";
  const messages: string[] = [];
  for (const entry of failures) {
    if (typeof entry === "string") {
      messages.push(entry);
      continue;
    }
    if (!isJsonObject(entry)) continue;
    const first = [entry.failure, entry.message, entry.value].find((v) => typeof v === "string" && v !== "");
    if (typeof first === "string") messages.push(first);
  }
  return messages.join("\n");
}
