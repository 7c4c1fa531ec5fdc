import path from "node:path";
import type { RunResult } from "../types/result.js";
import { failedRun } from "../core/run-result.js";
import { isDirectory, isFile, readTextOrNull } from "../detection/fs-walk.js";
import { readReport } from "../execution/temp-dir.js";
import { parsePytestJson } from "../parsers/pytest-json.js";
import { BaseAdapter, type RunContext } from "./base.js";

const TEST_FILE_PATTERNS = ["**/test_*.py", "**/*_test.py"];
const VENV_DIRS = [".venv", "venv", "virtualenv", "env"] as const;
const REPORT_FILE_NAME = "report.json";

/** pyproject.toml names pytest on some line that is not a table header. */
export function pyprojectListsPytest(content: string): boolean {
  return content.split(/\r?\n/).some((line) => {
    const stripped = line.trim().replace(/^["']+|["']+$/g, "");
    if (stripped.startsWith("[")) return false;
    return stripped.toLowerCase().includes("pytest") && !stripped.includes("tool.pytest");
  });
}

/**
 * `pytest` from the first project virtualenv that has one (`bin/` or
 * `Scripts/`), else the bare command for PATH lookup.
 */
export function findPytestExecutable(projectRoot: string): string {
  for (const name of VENV_DIRS) {
    const venv = path.join(projectRoot, name);
    if (!isDirectory(venv)) continue;
    for (const binDir of ["bin", "Scripts"]) {
      for (const exe of ["pytest", "pytest.exe"]) {
        const candidate = path.join(venv, binDir, exe);
        if (isFile(candidate)) return candidate;
      }
    }
  }
  return "pytest";
}

export class PytestAdapter extends BaseAdapter {
  readonly name = "pytest";
  readonly language = "python" as const;
  protected readonly builtinTimeoutMs = 120_000;

  detect(projectRoot: string): boolean {
    if (isFile(path.join(projectRoot, "conftest.py")) || isFile(path.join(projectRoot, "pytest.ini"))) return true;

    const pyproject = readTextOrNull(path.join(projectRoot, "pyproject.toml"));
    if (pyproject !== null && pyproject.includes("[tool.pytest")) return true;

    const setupCfg = readTextOrNull(path.join(projectRoot, "setup.cfg"));
    if (setupCfg !== null && setupCfg.includes("[tool:pytest]")) return true;

    return pyproject !== null && pyprojectListsPytest(pyproject);
  }

  getTestPattern(): string[] {
    return [...TEST_FILE_PATTERNS];
  }

  getRequiredPackages(): string[] {
    return ["pytest", "pytest-json-report"];
  }

  getRequiredCommands(): string[] {
    return ["python"];
  }

  protected async execute(ctx: RunContext): Promise<RunResult> {
    const reportPath = path.join(ctx.reportDir, REPORT_FILE_NAME);
    const cmd = [findPytestExecutable(ctx.projectRoot), "--json-report", `--json-report-file=${reportPath}`, "-q"];
    cmd.push(...ctx.testFiles);

    const outcome = await ctx.runner(cmd, { cwd: ctx.projectRoot, timeoutMs: ctx.timeoutMs });
    ctx.transcript.record(cmd, outcome);

    if (outcome.timed_out || outcome.not_found) {
      this.log.warn(outcome.timed_out ? "pytest timed out" : "pytest not found", { project: ctx.projectRoot });
      return failedRun(ctx.transcript.toString());
    }

    // Without a report file the plugin may still have printed the report.
    const report = (await readReport(reportPath)) ?? outcome.stdout;
    return parsePytestJson(report, ctx.transcript.toString());
  }
}
