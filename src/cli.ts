#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { detect } from "./commands/detect.js";
import { formatRunSummary, run } from "./commands/run.js";
import { validateTestFile } from "./commands/validate.js";
import { showConfig } from "./commands/config.js";
import { parseReportCommand } from "./commands/report.js";
import { EXIT } from "./commands/exit-codes.js";

type Format = "human" | "jsonl";

function parseFormat(value: string): Format {
  if (value !== "human" && value !== "jsonl") throw new InvalidArgumentError("expected human or jsonl");
  return value;
}

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError("expected a positive number of seconds");
  return n;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(format: Format, error: string, exitCode: number): never {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "error", error }) + "\n");
  } else {
    console.error(error);
  }
  process.exit(exitCode);
}

const program = new Command();

program
  .name("testsmith")
  .description("Detect, run and normalize third-party test frameworks")
  .version("0.1.0")
  .exitOverride((err) => {
    // Usage errors map to INVALID_ARGS; help and version exit cleanly.
    process.exit(err.exitCode === 0 ? EXIT.SUCCESS : EXIT.INVALID_ARGS);
  });

program
  .command("detect")
  .description("List the test frameworks a project uses")
  .argument("<project>", "Project root")
  .option("--config <path>", "Config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (project: string, opts: { config?: string; env?: string; format: Format }) => {
    const res = await detect({ project, configDir: opts.config, envName: opts.env });
    if (!res.ok) fail(opts.format, res.error, EXIT.INVALID_ARGS);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ project: res.project, frameworks: res.frameworks }) + "\n");
    } else if (res.frameworks.length === 0) {
      console.log("No supported test framework detected.");
    } else {
      for (const name of res.frameworks) console.log(name);
    }
  });

program
  .command("run")
  .description("Run a project's tests through one adapter")
  .argument("<project>", "Project root")
  .requiredOption("--framework <name>", "Adapter name: gtest|catch2|xunit|pytest")
  .option("--file <path>", "Restrict to a test file (repeatable)", collect, [])
  .option("--timeout <seconds>", "Per-command timeout", parseSeconds)
  .option("--config <path>", "Config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(
    async (
      project: string,
      opts: { framework: string; file: string[]; timeout?: number; config?: string; env?: string; format: Format },
    ) => {
      const res = await run({
        project,
        framework: opts.framework,
        files: opts.file,
        timeoutSeconds: opts.timeout,
        configDir: opts.config,
        envName: opts.env,
        checkSchema: opts.format === "jsonl",
      });
      if (!res.ok) fail(opts.format, res.error, res.exitCode);

      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(res.result) + "\n");
      } else {
        console.log(formatRunSummary(opts.framework, res.result));
        if (!res.result.success && res.result.total === 0) console.log(res.result.raw_output);
      }
      process.exitCode = res.exitCode;
    },
  );

program
  .command("validate")
  .description("Syntax-check a candidate test file")
  .argument("<file>", "Test source file")
  .requiredOption("--framework <name>", "Adapter name: gtest|catch2|xunit|pytest")
  .option("--config <path>", "Config directory")
  .option("--format <format>", "Output format: human|jsonl", parseFormat, "human")
  .action(async (file: string, opts: { framework: string; config?: string; format: Format }) => {
    const res = await validateTestFile({ file, framework: opts.framework, configDir: opts.config });
    if (!res.ok) fail(opts.format, res.error, res.exitCode);

    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify({ file: res.file, ...res.validation }) + "\n");
    } else if (res.validation.valid) {
      console.log("OK");
    } else {
      for (const err of res.validation.errors) console.error(err);
    }
    process.exitCode = res.exitCode;
  });

program
  .command("parse")
  .description("Normalize an existing report file")
  .argument("<report>", "Report file (.xml, .trx, .json, .txt)")
  .option("--report-format <format>", "Report format; inferred from the extension when omitted")
  .action((report: string, opts: { reportFormat?: string }) => {
    const res = parseReportCommand({ file: report, format: opts.reportFormat });
    if (!res.ok) fail("human", res.error, res.exitCode);
    process.stdout.write(JSON.stringify({ format: res.format, ...res.result }) + "\n");
    process.exitCode = res.exitCode;
  });

program
  .command("config")
  .description("Print the merged, validated configuration")
  .option("--config <path>", "Config directory")
  .option("--env <name>", "Config environment overlay")
  .action(async (opts: { config?: string; env?: string }) => {
    const res = await showConfig({ configDir: opts.config, envName: opts.env });
    if (!res.ok) fail("human", `Invalid config: ${res.error}`, EXIT.FAILED);
    console.log(JSON.stringify(res.config, null, 2));
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
