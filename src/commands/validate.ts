import fs from "node:fs";
import path from "node:path";
import type { ValidationResult } from "../types/result.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { loadContext, type ContextOptions } from "./context.js";

export type ValidateCommandResult =
  | { ok: true; file: string; validation: ValidationResult; exitCode: ExitCode }
  | { ok: false; error: string; exitCode: ExitCode };

/** Syntax-check a candidate test file with the named framework's adapter. */
export async function validateTestFile(opts: { file: string; framework: string } & ContextOptions): Promise<ValidateCommandResult> {
  const file = path.resolve(opts.file);
  let source: string;
  try {
    source = fs.readFileSync(file, "utf8");
  } catch {
    return { ok: false, error: `Cannot read test file: ${file}`, exitCode: EXIT.INVALID_ARGS };
  }

  const ctx = await loadContext(opts);
  if (!ctx.ok) return { ok: false, error: ctx.error, exitCode: EXIT.INVALID_ARGS };

  const adapter = ctx.registry.get(opts.framework);
  if (!adapter) return { ok: false, error: `Unknown or disabled framework: ${opts.framework}`, exitCode: EXIT.INVALID_ARGS };

  const validation = await adapter.validateTest(source);
  return { ok: true, file, validation, exitCode: validation.valid ? EXIT.SUCCESS : EXIT.FAILED };
}
