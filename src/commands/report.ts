import path from "node:path";
import type { RunResult } from "../types/result.js";
import { isReportFormat, parseReportFile, REPORT_FORMATS, type ReportFormat } from "../parsers/index.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type ReportCommandResult =
  | { ok: true; format: ReportFormat; result: RunResult; exitCode: ExitCode }
  | { ok: false; error: string; exitCode: ExitCode };

/** Normalize a report that was produced outside testsmith. */
export function parseReportCommand(opts: { file: string; format?: string }): ReportCommandResult {
  let format: ReportFormat | undefined;
  if (opts.format !== undefined) {
    if (!isReportFormat(opts.format)) {
      return { ok: false, error: `Unknown format: ${opts.format} (expected ${REPORT_FORMATS.join("|")})`, exitCode: EXIT.INVALID_ARGS };
    }
    format = opts.format;
  }

  const parsed = parseReportFile(path.resolve(opts.file), format);
  if (!parsed.ok) return { ok: false, error: parsed.error, exitCode: EXIT.INVALID_ARGS };
  return {
    ok: true,
    format: parsed.format,
    result: parsed.result,
    exitCode: parsed.result.success ? EXIT.SUCCESS : EXIT.FAILED,
  };
}
