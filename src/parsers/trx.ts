import type { CaseStatus, RunResult } from "../types/result.js";
import { emptyTally, failedRun, finalizeRun, tallyCase } from "../core/run-result.js";
import { trxDurationToMillis } from "../core/duration.js";
import { attr, children, collectElements, createXmlParser, parseXml, text, type XmlElement } from "./xml.js";

const parser = createXmlParser(new Set(["UnitTestResult", "Output", "ErrorInfo", "Message", "StackTrace"]));

/**
 * Map a TRX outcome. `Error` is reported as a failure: the canonical model
 * does not distinguish the two for .NET runs.
 */
export function trxOutcomeToStatus(outcome: string): CaseStatus {
  switch (outcome) {
    case "Passed":
      return "passed";
    case "Failed":
    case "Error":
      return "failed";
    case "NotExecuted":
    case "Skipped":
    case "Ignored":
      return "skipped";
    default:
      return "error";
  }
}

/** Parse a Visual Studio test results (TRX) document. */
export function parseTrx(xml: string, transcript: string): RunResult {
  if (!xml.trim()) return failedRun(transcript);
  const doc = parseXml(parser, xml);
  if (doc === null) return failedRun(transcript);

  const tally = emptyTally();
  for (const el of collectElements(doc, "UnitTestResult")) {
    tallyCase(tally, {
      name: attr(el, "testName") ?? "unknown",
      status: trxOutcomeToStatus((attr(el, "outcome") ?? "").trim()),
      duration_ms: trxDurationToMillis(attr(el, "duration") ?? "0"),
      failure_message: failureMessage(el),
      file_path: attr(el, "computerName") ?? "",
    });
  }
  return finalizeRun(tally, transcript);
}

/** `Output/ErrorInfo/Message`, then its `StackTrace`, then a direct `Message`. */
function failureMessage(result: XmlElement): string {
  const errorInfo = children(result, "Output").flatMap((o) => children(o, "ErrorInfo"))[0];
  if (errorInfo) {
    return firstText(children(errorInfo, "Message")) || firstText(children(errorInfo, "StackTrace"));
  }
  return firstText(children(result, "Message"));
}

function firstText(elements: XmlElement[]): string {
  for (const el of elements) {
    const t = text(el).trim();
    if (t) return t;
  }
  return "";
}
