import path from "node:path";
import type { RunResult } from "../types/result.js";
import { isDirectory } from "../detection/fs-walk.js";
import { createRegistry } from "../schema/registry.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { loadContext, type ContextOptions } from "./context.js";

export type RunOptions = {
  project: string;
  framework: string;
  files?: readonly string[];
  timeoutSeconds?: number;
  /** Check the result against run-result.schema.json before returning it. */
  checkSchema?: boolean;
  schemaDir?: string;
} & ContextOptions;

export type RunCommandResult =
  | { ok: true; result: RunResult; exitCode: ExitCode }
  | { ok: false; error: string; exitCode: ExitCode };

export async function run(opts: RunOptions): Promise<RunCommandResult> {
  const project = path.resolve(opts.project);
  if (!isDirectory(project)) {
    return { ok: false, error: `Project directory not found: ${project}`, exitCode: EXIT.INVALID_ARGS };
  }
  if (opts.timeoutSeconds !== undefined && !(opts.timeoutSeconds > 0)) {
    return { ok: false, error: "--timeout must be a positive number of seconds", exitCode: EXIT.INVALID_ARGS };
  }

  const ctx = await loadContext(opts);
  if (!ctx.ok) return { ok: false, error: ctx.error, exitCode: EXIT.INVALID_ARGS };

  const adapter = ctx.registry.get(opts.framework);
  if (!adapter) {
    const known = ctx.registry.names().join(", ");
    return { ok: false, error: `Unknown or disabled framework: ${opts.framework} (available: ${known})`, exitCode: EXIT.INVALID_ARGS };
  }

  const result = await adapter.runTests(project, {
    testFiles: opts.files?.map((f) => path.resolve(project, f)),
    timeoutMs: opts.timeoutSeconds === undefined ? undefined : opts.timeoutSeconds * 1000,
    collectCoverage: ctx.config.collect_coverage ?? true,
  });

  if (opts.checkSchema) {
    const schemas = await createRegistry(opts.schemaDir);
    const check = await schemas.validate("run-result", result);
    if (!check.valid) {
      return { ok: false, error: `Result does not match run-result schema: ${check.errors}`, exitCode: EXIT.FAILED };
    }
  }

  return { ok: true, result, exitCode: result.success ? EXIT.SUCCESS : EXIT.FAILED };
}

/** One-line summary followed by failing cases. */
export function formatRunSummary(framework: string, result: RunResult): string {
  const status = result.success ? "PASS" : "FAIL";
  const lines = [
    `${status} ${framework}: ${result.passed} passed, ${result.failed} failed, ${result.skipped} skipped, ` +
      `${result.errors} errors (${result.total} total) in ${Math.round(result.duration_ms)}ms`,
  ];
  for (const c of result.test_cases) {
    if (c.status !== "failed" && c.status !== "error") continue;
    lines.push(`  ${c.status.toUpperCase()} ${c.name}`);
    const first = c.failure_message.split("\n")[0];
    if (first) lines.push(`    ${first}`);
  }
  return lines.join("\n");
}
