/*
Purpose: describe one renderer run as a structured argv, and run it through a port.
Assumptions: the renderer exits 0 on success and writes its artifact into the output dir.
Usage: runner.run(buildCompilerInvocation(job, { sourceRoot, compiler }), { timeoutMs }).
*/

import path from "node:path";

import { execa } from "execa";

import type { CompilerConfig } from "./config.js";
import type { Job } from "./jobs.js";
import { errnoCode, truncateTail } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type CompilerInvocation = {
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd: string;
};

export type CommandRunOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type CommandOutcome =
  | { kind: "exited"; exitCode: number; stderr: string }
  | { kind: "timed_out"; stderr: string }
  | { kind: "cancelled" }
  | { kind: "signaled"; signal: string; stderr: string }
  | { kind: "launch_failed"; code: string; message: string };

export interface CommandRunner {
  run(invocation: CompilerInvocation, options: CommandRunOptions): Promise<CommandOutcome>;
}

const STDERR_TAIL_LINES = 20;

// =============================================================================
// INVOCATION
// =============================================================================

export function buildCompilerInvocation(
  job: Job,
  input: { sourceRoot: string; compiler: CompilerConfig },
): CompilerInvocation {
  const { compiler, sourceRoot } = input;

  return {
    command: compiler.command,
    args: [...compiler.args, `${compiler.output_dir_flag}=${job.outputDir}`, job.sourcePath],
    // Trailing delimiter keeps the renderer's built-in search path after sourceRoot.
    env: { [compiler.search_path_env]: `${sourceRoot}${path.delimiter}` },
    cwd: job.outputDir,
  };
}

export function formatInvocation(invocation: CompilerInvocation): string {
  const env = Object.entries(invocation.env).map(([k, v]) => `${k}=${quoteArg(v)}`);
  return [...env, invocation.command, ...invocation.args.map(quoteArg)].join(" ");
}

function quoteArg(value: string): string {
  return /^[\w@%+=:,./-]+$/.test(value) ? value : `'${value.replace(/'/g, `'\\''`)}'`;
}

// =============================================================================
// LIVE RUNNER
// =============================================================================

export class ExecaCommandRunner implements CommandRunner {
  async run(invocation: CompilerInvocation, options: CommandRunOptions): Promise<CommandOutcome> {
    if (options.signal?.aborted) {
      return { kind: "cancelled" };
    }

    try {
      const res = await execa(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        env: invocation.env,
        extendEnv: true,
        stdin: "ignore",
        stdout: "ignore",
        stderr: "pipe",
        timeout: options.timeoutMs,
        signal: options.signal,
      });
      return { kind: "exited", exitCode: res.exitCode, stderr: tail(res.stderr) };
    } catch (err) {
      return classifyFailure(err);
    }
  }
}

function classifyFailure(err: unknown): CommandOutcome {
  if (!err || typeof err !== "object") {
    return { kind: "launch_failed", code: "UNKNOWN", message: String(err) };
  }

  const fields = readExecaFields(err);
  if (fields.isCanceled) return { kind: "cancelled" };
  if (fields.timedOut) return { kind: "timed_out", stderr: tail(fields.stderr) };
  if (typeof fields.exitCode === "number") {
    return { kind: "exited", exitCode: fields.exitCode, stderr: tail(fields.stderr) };
  }
  if (fields.signal) {
    return { kind: "signaled", signal: fields.signal, stderr: tail(fields.stderr) };
  }

  const message = err instanceof Error ? err.message : String(err);
  return { kind: "launch_failed", code: errnoCode(err) ?? "UNKNOWN", message };
}

type ExecaFailureFields = {
  exitCode?: number;
  signal?: string;
  stderr: string;
  timedOut: boolean;
  isCanceled: boolean;
};

function readExecaFields(err: object): ExecaFailureFields {
  const record: Record<string, unknown> = { ...err };
  return {
    exitCode: typeof record.exitCode === "number" ? record.exitCode : undefined,
    signal: typeof record.signal === "string" ? record.signal : undefined,
    stderr: typeof record.stderr === "string" ? record.stderr : "",
    timedOut: record.timedOut === true,
    isCanceled: record.isCanceled === true,
  };
}

function tail(stderr: string | undefined): string {
  return truncateTail(stderr ?? "", STDERR_TAIL_LINES);
}
