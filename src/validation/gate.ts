import type { ValidationResult } from "../types/result.js";
import { createLogger } from "../logging/logger.js";
import type { SyntaxChecker, SyntaxLanguage, SyntaxNode } from "./syntax-checker.js";

const log = createLogger("validation");

const encoder = new TextEncoder();

export function formatErrorRange(start: number, end: number): string {
  return `Syntax error at line ${start}-${end}`;
}

/**
 * Purely syntactic check of candidate test source. Never runs the code and
 * never throws: a checker failure becomes a single error message.
 */
export async function validateSource(
  checker: SyntaxChecker,
  source: string,
  language: SyntaxLanguage,
): Promise<ValidationResult> {
  let root: SyntaxNode;
  try {
    root = (await checker.parse(encoder.encode(source), language)).rootNode;
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    log.warn("syntax checker unavailable", { language, error: message });
    return { valid: false, errors: [message], warnings: [] };
  }

  if (!checker.hasErrors(root)) return { valid: true, errors: [], warnings: [] };

  const errors = checker.errorRanges(root).map(([start, end]) => formatErrorRange(start, end));
  return { valid: false, errors, warnings: [] };
}

/**
 * Rewrite Catch2 macro blocks into plain C++ the grammar accepts:
 * `TEST_CASE(...) {` opens a function, `SECTION(...) {` a bare block.
 */
export function normalizeCatch2Source(source: string): string {
  return source
    .replace(/\bTEST_CASE\s*\([^)]*\)\s*\{/g, "void __catch2_case() {")
    .replace(/\bSECTION\s*\([^)]*\)\s*\{/g, "{");
}
