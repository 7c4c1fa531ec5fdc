export type {
  CaseResult,
  CaseStatus,
  CommandOutcome,
  CoverageReport,
  FileCoverage,
  LineCoverage,
  RunResult,
  RunTally,
  ValidationResult,
} from "./types/result.js";
export type { FrameworkConfig, TestsmithConfig } from "./types/config.js";

export { aggregateRuns, emptyTally, failedRun, finalizeRun, mergeRuns, tallyCase, withCoverage } from "./core/run-result.js";
export { clockToMillis, toMillis, trxDurationToMillis } from "./core/duration.js";

export {
  BaseAdapter,
  type AdapterOptions,
  type PromptTemplateRef,
  type RunContext,
  type RunTestsOptions,
  type TestFrameworkAdapter,
} from "./adapters/base.js";
export { GTestAdapter } from "./adapters/gtest.js";
export { Catch2Adapter } from "./adapters/catch2.js";
export { XUnitAdapter } from "./adapters/xunit.js";
export { PytestAdapter } from "./adapters/pytest.js";
export { AdapterRegistry, BUILTIN_FRAMEWORKS, createDefaultRegistry, type BuiltinFramework } from "./adapters/registry.js";

export {
  parseReport,
  parseReportFile,
  REPORT_FORMATS,
  type ParseFileResult,
  type ReportFormat,
} from "./parsers/index.js";

export { runCommand, Transcript, type CommandOptions, type CommandRunner } from "./execution/command.js";
export type { CoverageAdapter, CoverageRunOptions } from "./execution/coverage.js";

export {
  TreeSitterSyntaxChecker,
  type ErrorRange,
  type SyntaxChecker,
  type SyntaxLanguage,
  type SyntaxNode,
  type SyntaxTree,
} from "./validation/syntax-checker.js";
export { validateSource } from "./validation/gate.js";

export { loadConfig, resolveTimeoutMs } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { createLogger, setLogLevel, setLogSink, type LogLevel, type LogRecord } from "./logging/logger.js";
