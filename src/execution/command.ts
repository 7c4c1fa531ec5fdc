import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { CommandOutcome } from "../types/result.js";

const pExecFile = promisify(execFile);

const MAX_OUTPUT_BYTES = 50 * 1024 * 1024;

export type CommandOptions = {
  cwd: string;
  timeoutMs: number;
};

/** Seam for tests: every adapter spawns through one of these. */
export type CommandRunner = (cmd: readonly string[], opts: CommandOptions) => Promise<CommandOutcome>;

type ExecFailure = Error & {
  code?: number | string | null;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
};

function isExecFailure(e: unknown): e is ExecFailure {
  return e instanceof Error;
}

/**
 * Run a command without a shell and capture everything. Never rejects:
 * timeouts and missing executables come back as flagged outcomes.
 */
export const runCommand: CommandRunner = async (cmd, opts) => {
  const [command, ...args] = cmd;
  if (command === undefined) {
    return { returncode: 127, stdout: "", stderr: "Command not found: <empty>", timed_out: false, not_found: true };
  }

  try {
    const { stdout, stderr } = await pExecFile(command, args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs,
      killSignal: "SIGKILL",
      maxBuffer: MAX_OUTPUT_BYTES,
      shell: false,
      encoding: "utf8",
    });
    return { returncode: 0, stdout, stderr, timed_out: false, not_found: false };
  } catch (e: unknown) {
    if (!isExecFailure(e)) {
      return { returncode: 1, stdout: "", stderr: String(e), timed_out: false, not_found: false };
    }
    if (e.code === "ENOENT") {
      return { returncode: 127, stdout: "", stderr: `Command not found: ${command}`, timed_out: false, not_found: true };
    }
    if (e.killed && e.code !== "ERR_CHILD_PROCESS_STDIO_MAXBUFFER") {
      return {
        returncode: 1,
        stdout: "",
        stderr: `Command timed out after ${(opts.timeoutMs / 1000).toFixed(1)}s`,
        timed_out: true,
        not_found: false,
      };
    }
    return {
      returncode: typeof e.code === "number" ? e.code : 1,
      stdout: e.stdout ?? "",
      stderr: e.stderr || e.message,
      timed_out: false,
      not_found: false,
    };
  }
};

/** `$ cmd`, `exit_code=n`, then whichever streams are non-empty. */
export function formatCommandOutput(cmd: readonly string[], outcome: CommandOutcome): string {
  const parts = [`$ ${cmd.join(" ")}`, `exit_code=${outcome.returncode}`];
  if (outcome.stdout) parts.push(outcome.stdout);
  if (outcome.stderr) parts.push(outcome.stderr);
  return parts.join("\n");
}

/** Running log of one `runTests` call; every stage appends, nothing is dropped. */
export class Transcript {
  private readonly parts: string[] = [];

  record(cmd: readonly string[], outcome: CommandOutcome): void {
    this.parts.push(formatCommandOutput(cmd, outcome));
  }

  note(text: string): void {
    this.parts.push(text);
  }

  toString(): string {
    return this.parts.join("\n\n");
  }
}
