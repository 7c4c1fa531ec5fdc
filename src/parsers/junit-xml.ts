import type { CaseResult, CaseStatus, RunResult } from "../types/result.js";
import { emptyTally, failedRun, finalizeRun, tallyCase } from "../core/run-result.js";
import { toMillis } from "../core/duration.js";
import {
  attr,
  children,
  collectElements,
  composeFailureMessage,
  createXmlParser,
  hasChild,
  parseXml,
  text,
  type XmlElement,
} from "./xml.js";

/**
 * JUnit producers disagree on how a skipped case is marked. gtest also
 * reports it through `status`; CTest and Catch2 only emit `<skipped>`.
 */
export type JunitDialect = {
  name: string;
  skipStatuses: ReadonlySet<string>;
};

export const GTEST_JUNIT: JunitDialect = {
  name: "gtest",
  skipStatuses: new Set(["notrun", "disabled", "skipped"]),
};

export const CATCH2_JUNIT: JunitDialect = {
  name: "catch2",
  skipStatuses: new Set(),
};

const parser = createXmlParser(new Set(["testsuite", "testcase", "failure", "error", "skipped"]));

/**
 * Parse JUnit XML into a RunResult. Every `<testcase>` counts, however
 * deeply nested; suite-level totals are ignored.
 */
export function parseJunitXml(xml: string, transcript: string, dialect: JunitDialect = GTEST_JUNIT): RunResult {
  if (!xml.trim()) return failedRun(transcript);
  const doc = parseXml(parser, xml);
  if (doc === null) return failedRun(transcript);

  const tally = emptyTally();
  for (const el of collectElements(doc, "testcase")) {
    tallyCase(tally, toCase(el, dialect));
  }
  return finalizeRun(tally, transcript);
}

function toCase(el: XmlElement, dialect: JunitDialect): CaseResult {
  const name = attr(el, "name") || "unknown";
  const classname = attr(el, "classname") ?? "";
  const [status, failure] = statusOf(el, dialect);
  return {
    name: classname ? `${classname}.${name}` : name,
    status,
    duration_ms: toMillis(attr(el, "time") ?? 0),
    failure_message: failure,
    file_path: attr(el, "file") ?? "",
  };
}

function statusOf(el: XmlElement, dialect: JunitDialect): [CaseStatus, string] {
  const failure = children(el, "failure")[0];
  if (failure) return ["failed", messageOf(failure)];

  const error = children(el, "error")[0];
  if (error) return ["error", messageOf(error)];

  const status = (attr(el, "status") ?? "run").toLowerCase();
  if (hasChild(el, "skipped") || dialect.skipStatuses.has(status)) return ["skipped", ""];

  return ["passed", ""];
}

function messageOf(el: XmlElement): string {
  return composeFailureMessage(attr(el, "message") ?? "", text(el));
}
