import type { RunResult } from "../types/result.js";
import {
  configHasMarkers,
  CPP_SOURCE_EXTENSIONS,
  hasTestFiles,
  sourceHasInclude,
  type ConfigMarkerProbe,
} from "../detection/heuristics.js";
import { discoverBinaries, runBinaries, selectBinaries, type DirectRunProfile } from "../execution/binaries.js";
import { findCmakeBuildDir, runViaCtest } from "../execution/cmake.js";
import { BaseAdapter, type RunContext } from "./base.js";

const CPP_TIMEOUT_MS = 180_000;

/**
 * C++ frameworks driven through CMake: CTest with a JUnit report first,
 * the test binaries themselves as the fallback.
 */
export abstract class CmakeAdapter extends BaseAdapter {
  readonly language = "cpp" as const;
  protected readonly builtinTimeoutMs = CPP_TIMEOUT_MS;

  protected abstract readonly cmakeProbe: ConfigMarkerProbe;
  protected abstract readonly includePattern: RegExp;
  protected abstract readonly testFilePatterns: readonly string[];
  protected abstract readonly binaryPatterns: readonly string[];
  protected abstract readonly directRun: DirectRunProfile;
  protected abstract parseJunit(xml: string, transcript: string): RunResult;

  detect(projectRoot: string): boolean {
    const walk = { maxFiles: this.maxScanFiles };
    if (configHasMarkers(projectRoot, this.cmakeProbe)) {
      this.log.debug("detected via CMakeLists.txt", { project: projectRoot });
      return true;
    }
    if (sourceHasInclude(projectRoot, { extensions: CPP_SOURCE_EXTENSIONS, pattern: this.includePattern }, walk)) {
      this.log.debug("detected via include", { project: projectRoot });
      return true;
    }
    return hasTestFiles(projectRoot, this.testFilePatterns, walk);
  }

  getTestPattern(): string[] {
    return [...this.testFilePatterns];
  }

  getRequiredPackages(): string[] {
    return [];
  }

  getRequiredCommands(): string[] {
    return ["cmake"];
  }

  protected async execute(ctx: RunContext): Promise<RunResult> {
    const buildDir = findCmakeBuildDir(ctx.projectRoot);
    const primary = await runViaCtest({
      buildDir,
      reportDir: ctx.reportDir,
      testFiles: ctx.testFiles,
      timeoutMs: ctx.timeoutMs,
      runner: ctx.runner,
      transcript: ctx.transcript,
      parse: (xml, transcript) => this.parseJunit(xml, transcript),
    });
    if (primary.kind === "done") return primary.result;

    this.log.info("falling back to direct binaries", { project: ctx.projectRoot, reason: primary.reason });
    const discovered = discoverBinaries(ctx.projectRoot, buildDir, this.binaryPatterns);
    return runBinaries({
      binaries: selectBinaries(discovered, ctx.testFiles),
      reportDir: ctx.reportDir,
      timeoutMs: ctx.timeoutMs,
      runner: ctx.runner,
      transcript: ctx.transcript,
      profile: this.directRun,
    });
  }
}
