import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { CommandOptions, CommandRunner } from "../src/execution/command.js";
import type { CommandOutcome } from "../src/types/result.js";

export const FIXTURES = path.resolve(import.meta.dirname, "fixtures");

export function fixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES, name), "utf8");
}

export type RecordedCall = { cmd: readonly string[]; opts: CommandOptions };

export type FakeRunner = {
  runner: CommandRunner;
  calls: RecordedCall[];
};

/** In-process stand-in for `runCommand`; every call is recorded. */
export function fakeRunner(
  handler: (cmd: readonly string[], opts: CommandOptions) => CommandOutcome | Promise<CommandOutcome>,
): FakeRunner {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (cmd, opts) => {
    calls.push({ cmd, opts });
    return handler(cmd, opts);
  };
  return { runner, calls };
}

export function ok(stdout = ""): CommandOutcome {
  return { returncode: 0, stdout, stderr: "", timed_out: false, not_found: false };
}

export function exited(returncode: number, stdout = "", stderr = ""): CommandOutcome {
  return { returncode, stdout, stderr, timed_out: false, not_found: false };
}

export function timedOut(): CommandOutcome {
  return { returncode: 1, stdout: "", stderr: "Command timed out", timed_out: true, not_found: false };
}

export function notFound(command: string): CommandOutcome {
  return { returncode: 127, stdout: "", stderr: `Command not found: ${command}`, timed_out: false, not_found: true };
}

export function makeTempDir(prefix = "testsmith-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write `files` (relative path → content) under `root`, creating directories. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = path.join(root, rel);
    fs.mkdirSync(path.dirname(full), { recursive: true });
    fs.writeFileSync(full, content);
  }
}

/** A file the binary discovery treats as an executable. */
export function writeExecutable(root: string, rel: string): string {
  const full = path.join(root, rel);
  fs.mkdirSync(path.dirname(full), { recursive: true });
  fs.writeFileSync(full, "#!/bin/sh\nexit 0\n");
  fs.chmodSync(full, 0o755);
  return full;
}

/** The value after `flag=` or after a standalone `flag` in `cmd`. */
export function argValue(cmd: readonly string[], flag: string): string {
  const eq = cmd.find((a) => a.startsWith(`${flag}=`));
  if (eq !== undefined) return eq.slice(flag.length + 1);
  const i = cmd.indexOf(flag);
  if (i === -1 || i + 1 >= cmd.length) throw new Error(`missing ${flag} in ${cmd.join(" ")}`);
  return cmd[i + 1] ?? "";
}

export function junitXml(cases: ReadonlyArray<{ name: string; failure?: string }>): string {
  const body = cases
    .map((c) =>
      c.failure === undefined
        ? `<testcase classname="Suite" name="${c.name}" time="0.001" status="run"/>`
        : `<testcase classname="Suite" name="${c.name}" time="0.001" status="run"><failure message="${c.failure}"/></testcase>`,
    )
    .join("\n");
  return `<?xml version="1.0"?>\n<testsuites><testsuite name="Suite">\n${body}\n</testsuite></testsuites>\n`;
}
