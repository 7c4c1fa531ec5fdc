import fs from "node:fs";
import path from "node:path";
import type { RunResult } from "../types/result.js";
import { failedRun } from "../core/run-result.js";
import { findFilesMatching, hasTestFiles, sourceHasInclude } from "../detection/heuristics.js";
import { stemOf } from "../execution/cmake.js";
import { readReport } from "../execution/temp-dir.js";
import { parseTrx } from "../parsers/trx.js";
import { BaseAdapter, type RunContext } from "./base.js";

const XUNIT_PACKAGE_REF = /PackageReference\s+Include\s*=\s*["']([^"']*xunit[^"']*)["']/i;
const XUNIT_USING = /using\s+Xunit\s*;/;
const TEST_FILE_PATTERNS = ["**/*Tests.cs", "**/*Test.cs"];
const TRX_FILE_NAME = "results.trx";

function rootEntriesWithExtension(root: string, ext: string): string[] {
  try {
    return fs
      .readdirSync(root, { withFileTypes: true })
      .filter((e) => e.isFile() && !e.name.startsWith(".") && path.extname(e.name).toLowerCase() === ext)
      .map((e) => path.join(root, e.name))
      .sort();
  } catch {
    return [];
  }
}

/** `--filter` expression selecting the classes named after the given `.cs` files; "" for none. */
export function dotnetFilterFromTestFiles(testFiles: readonly string[]): string {
  return testFiles
    .filter((f) => path.extname(f) === ".cs")
    .map(stemOf)
    .filter((stem) => stem !== "")
    .map((stem) => `FullyQualifiedName~${stem}`)
    .join("|");
}

export class XUnitAdapter extends BaseAdapter {
  readonly name = "xunit";
  readonly language = "csharp" as const;
  protected readonly builtinTimeoutMs = 180_000;

  detect(projectRoot: string): boolean {
    const walk = { maxFiles: this.maxScanFiles };
    if (this.xunitProjects(projectRoot).length > 0) {
      this.log.debug("detected via .csproj", { project: projectRoot });
      return true;
    }
    return (
      sourceHasInclude(projectRoot, { extensions: new Set([".cs"]), pattern: XUNIT_USING }, walk) &&
      hasTestFiles(projectRoot, TEST_FILE_PATTERNS, walk)
    );
  }

  getTestPattern(): string[] {
    return [...TEST_FILE_PATTERNS];
  }

  getRequiredPackages(): string[] {
    return ["xunit", "xunit.runner.visualstudio", "Microsoft.NET.Test.Sdk"];
  }

  getRequiredCommands(): string[] {
    return ["dotnet"];
  }

  /** A root `.sln`, else an xunit `.csproj` anywhere, else any root `.csproj`. */
  findTestTarget(projectRoot: string): string | null {
    return (
      rootEntriesWithExtension(projectRoot, ".sln")[0] ??
      this.xunitProjects(projectRoot)[0] ??
      rootEntriesWithExtension(projectRoot, ".csproj")[0] ??
      null
    );
  }

  private xunitProjects(projectRoot: string): string[] {
    return findFilesMatching(projectRoot, ".csproj", XUNIT_PACKAGE_REF, { maxFiles: this.maxScanFiles });
  }

  protected async execute(ctx: RunContext): Promise<RunResult> {
    const target = this.findTestTarget(ctx.projectRoot);
    if (target === null) {
      ctx.transcript.note("No .sln or .csproj found");
      return failedRun(ctx.transcript.toString());
    }

    const trxPath = path.join(ctx.reportDir, TRX_FILE_NAME);
    const cmd = ["dotnet", "test", target, "--logger", `trx;LogFileName=${trxPath}`];
    const filter = dotnetFilterFromTestFiles(ctx.testFiles);
    if (filter) cmd.push("--filter", filter);

    const outcome = await ctx.runner(cmd, { cwd: ctx.projectRoot, timeoutMs: ctx.timeoutMs });
    ctx.transcript.record(cmd, outcome);

    if (outcome.timed_out || outcome.not_found) {
      this.log.warn(outcome.timed_out ? "dotnet test timed out" : "dotnet not found", { project: ctx.projectRoot });
      return failedRun(ctx.transcript.toString());
    }

    const trx = await readReport(trxPath);
    if (trx === null) return failedRun(ctx.transcript.toString());
    return parseTrx(trx, ctx.transcript.toString());
  }
}
