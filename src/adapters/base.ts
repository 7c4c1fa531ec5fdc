import path from "node:path";
import type { RunResult, ValidationResult } from "../types/result.js";
import { failedRun } from "../core/run-result.js";
import { DEFAULT_MAX_SCAN_FILES } from "../detection/fs-walk.js";
import { runCommand, Transcript, type CommandRunner } from "../execution/command.js";
import { attachCoverage, type CoverageAdapter } from "../execution/coverage.js";
import { withTempDir } from "../execution/temp-dir.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { validateSource } from "../validation/gate.js";
import { TreeSitterSyntaxChecker, type SyntaxChecker, type SyntaxLanguage } from "../validation/syntax-checker.js";

export type RunTestsOptions = {
  /** Restrict the run to these test sources. Empty or absent runs everything. */
  testFiles?: readonly string[];
  timeoutMs?: number;
  /** Defaults to true; only honored when a coverage adapter is configured. */
  collectCoverage?: boolean;
};

/** Collaborators injected into an adapter. Every field has a working default. */
export type AdapterOptions = {
  runner?: CommandRunner;
  coverage?: CoverageAdapter;
  syntaxChecker?: SyntaxChecker;
  maxScanFiles?: number;
  defaultTimeoutMs?: number;
};

/** Names the prompt template for the generation layer; no prompt text lives here. */
export type PromptTemplateRef = {
  framework: string;
  language: SyntaxLanguage;
  template: string;
};

export type TestFrameworkAdapter = {
  readonly name: string;
  readonly language: SyntaxLanguage;
  detect(projectRoot: string): boolean;
  getTestPattern(): string[];
  getPromptTemplate(): PromptTemplateRef;
  runTests(projectRoot: string, opts?: RunTestsOptions): Promise<RunResult>;
  validateTest(source: string): Promise<ValidationResult>;
  getRequiredPackages(): string[];
  getRequiredCommands(): string[];
};

/** Everything one `runTests` call owns. */
export type RunContext = {
  projectRoot: string;
  /** Scoped temp directory; removed when the call returns. */
  reportDir: string;
  testFiles: readonly string[];
  timeoutMs: number;
  transcript: Transcript;
  runner: CommandRunner;
};

/**
 * Common shape of every adapter: a scoped temp directory per call, an
 * exception boundary around execution, optional coverage afterwards.
 */
export abstract class BaseAdapter implements TestFrameworkAdapter {
  abstract readonly name: string;
  abstract readonly language: SyntaxLanguage;

  protected readonly runner: CommandRunner;
  protected readonly coverage: CoverageAdapter | undefined;
  protected readonly maxScanFiles: number;
  private readonly checker: SyntaxChecker;
  private readonly timeoutOverrideMs: number | undefined;

  constructor(opts: AdapterOptions = {}) {
    this.runner = opts.runner ?? runCommand;
    this.coverage = opts.coverage;
    // Grammars load on first use, so an unused checker costs nothing.
    this.checker = opts.syntaxChecker ?? new TreeSitterSyntaxChecker();
    this.maxScanFiles = opts.maxScanFiles ?? DEFAULT_MAX_SCAN_FILES;
    this.timeoutOverrideMs = opts.defaultTimeoutMs;
  }

  /** Per-framework default when neither the call nor the options set one. */
  protected abstract readonly builtinTimeoutMs: number;

  get defaultTimeoutMs(): number {
    return this.timeoutOverrideMs ?? this.builtinTimeoutMs;
  }

  protected get log(): Logger {
    return createLogger(`adapter.${this.name}`);
  }

  abstract detect(projectRoot: string): boolean;
  abstract getTestPattern(): string[];
  abstract getRequiredPackages(): string[];
  abstract getRequiredCommands(): string[];

  getPromptTemplate(): PromptTemplateRef {
    return { framework: this.name, language: this.language, template: `${this.name}-unit-test` };
  }

  /** Run the framework's strategies; never called outside the exception boundary. */
  protected abstract execute(ctx: RunContext): Promise<RunResult>;

  /** Whether a finished run should be followed by coverage collection. */
  protected coverageEligible(result: RunResult): boolean {
    return result.total > 0;
  }

  /** Source rewrite applied before syntax checking. */
  protected prepareForValidation(source: string): string {
    return source;
  }

  async runTests(projectRoot: string, opts: RunTestsOptions = {}): Promise<RunResult> {
    const root = path.resolve(projectRoot);
    const testFiles = opts.testFiles ?? [];
    const timeoutMs = opts.timeoutMs ?? this.defaultTimeoutMs;
    const transcript = new Transcript();

    let result: RunResult;
    try {
      result = await withTempDir(`testsmith-${this.name}-`, (reportDir) =>
        this.execute({ projectRoot: root, reportDir, testFiles, timeoutMs, transcript, runner: this.runner }),
      );
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : String(e);
      this.log.error("test run failed", { project: root, error: message });
      transcript.note(`error: ${message}`);
      return failedRun(transcript.toString());
    }

    if (opts.collectCoverage === false || !this.coverage || !this.coverageEligible(result)) return result;
    return attachCoverage(result, this.coverage, root, { testFiles, timeoutMs });
  }

  async validateTest(source: string): Promise<ValidationResult> {
    return validateSource(this.checker, this.prepareForValidation(source), this.language);
  }
}
