import fs from "node:fs";
import path from "node:path";
import type { RunResult } from "../types/result.js";
import { CATCH2_JUNIT, GTEST_JUNIT, parseJunitXml } from "./junit-xml.js";
import { parseGtestJson } from "./gtest-json.js";
import { parseTrx } from "./trx.js";
import { parsePytestJson } from "./pytest-json.js";
import { parseCatch2Text } from "./catch2-text.js";
import { extractJsonObject } from "./json-extract.js";

export { CATCH2_JUNIT, GTEST_JUNIT, parseJunitXml, type JunitDialect } from "./junit-xml.js";
export { parseGtestJson } from "./gtest-json.js";
export { parseTrx, trxOutcomeToStatus } from "./trx.js";
export { parsePytestJson, pytestOutcomeToStatus } from "./pytest-json.js";
export { parseCatch2Text } from "./catch2-text.js";
export { extractJsonObject, findBalancedObject } from "./json-extract.js";

export const REPORT_FORMATS = [
  "junit_xml",
  "gtest_xml",
  "gtest_json",
  "catch2_junit",
  "catch2_text",
  "trx",
  "pytest_json",
] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value);
}

/** Route raw report text to its parser. Never throws. */
export function parseReport(format: ReportFormat, text: string, transcript: string): RunResult {
  switch (format) {
    case "junit_xml":
    case "gtest_xml":
      return parseJunitXml(text, transcript, GTEST_JUNIT);
    case "catch2_junit":
      return parseJunitXml(text, transcript, CATCH2_JUNIT);
    case "gtest_json":
      return parseGtestJson(text, transcript);
    case "catch2_text":
      return parseCatch2Text(text, transcript);
    case "trx":
      return parseTrx(text, transcript);
    case "pytest_json":
      return parsePytestJson(text, transcript);
  }
}

/**
 * Infer a format from the file extension. JSON is told apart by content:
 * pytest-json-report entries carry a `nodeid`.
 */
export function detectFormat(filePath: string, text: string): ReportFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === ".trx") return "trx";
  if (ext === ".xml") return "junit_xml";
  if (ext === ".json") return looksLikePytestReport(text) ? "pytest_json" : "gtest_json";
  if (ext === ".txt" || ext === ".log") return "catch2_text";
  return null;
}

function looksLikePytestReport(text: string): boolean {
  const obj = extractJsonObject(text);
  if (obj === null) return false;
  if (!Array.isArray(obj.tests)) return false;
  return obj.tests.some((t: unknown) => typeof t === "object" && t !== null && "nodeid" in t);
}

export type ParseFileResult =
  | { ok: true; format: ReportFormat; result: RunResult }
  | { ok: false; error: string };

/** Read a report from disk and parse it; the file content doubles as the transcript. */
export function parseReportFile(filePath: string, format?: ReportFormat): ParseFileResult {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (e: unknown) {
    return { ok: false, error: `Cannot read report ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
  }

  const resolved = format ?? detectFormat(filePath, text);
  if (resolved === null) {
    return { ok: false, error: `Cannot infer report format from ${path.basename(filePath)}` };
  }
  return { ok: true, format: resolved, result: parseReport(resolved, text, text) };
}
