/**
 * Dispatcher: compile every job in the worklist with bounded parallelism.
 *
 * Unit failures are recorded and never stop sibling or queued jobs. Only a renderer
 * that cannot be launched at all is fatal ({@link PoolExecutorError}); in that case no
 * partial results are returned.
 */

import {
  buildCompilerInvocation,
  ExecaCommandRunner,
  type CommandOutcome,
  type CommandRunner,
  type CompilerInvocation,
} from "./compiler.js";
import type { CompilerConfig } from "./config.js";
import { PoolExecutorError } from "./errors.js";
import type { Job, JobResult } from "./jobs.js";
import { assertConcurrency, runWithConcurrency } from "./pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type DispatchOptions = {
  sourceRoot: string;
  concurrency: number;
  compiler: CompilerConfig;
  runner?: CommandRunner;
  timeoutMs?: number;
  signal?: AbortSignal;
  now?: () => number;
  onJobStart?: (job: Job, invocation: CompilerInvocation) => void;
  onJobComplete?: (result: JobResult) => void;
};

export type DispatchReport = {
  /** One result per job, in worklist order. */
  results: JobResult[];
  elapsedMs: number;
  succeeded: number;
  failed: number;
  cancelled: number;
};

// =============================================================================
// DISPATCH
// =============================================================================

export async function dispatchJobs(
  worklist: readonly Job[],
  options: DispatchOptions,
): Promise<DispatchReport> {
  assertConcurrency(options.concurrency);

  if (worklist.length === 0) {
    return summarizeResults([], 0);
  }

  const runner = options.runner ?? new ExecaCommandRunner();
  const now = options.now ?? (() => performance.now());
  const startedAt = now();

  const slots = await runWithConcurrency(
    worklist,
    async (job) => {
      const invocation = buildCompilerInvocation(job, {
        sourceRoot: options.sourceRoot,
        compiler: options.compiler,
      });
      options.onJobStart?.(job, invocation);

      const jobStartedAt = now();
      const outcome = await runner.run(invocation, {
        timeoutMs: options.timeoutMs,
        signal: options.signal,
      });

      if (outcome.kind === "launch_failed") {
        throw new PoolExecutorError(
          `Failed to launch ${invocation.command} for ${job.sourcePath} (${outcome.code}): ${outcome.message}`,
          invocation.command,
        );
      }

      const result = toJobResult(job, outcome, now() - jobStartedAt);
      options.onJobComplete?.(result);
      return result;
    },
    { concurrency: options.concurrency, signal: options.signal },
  );

  const elapsedMs = now() - startedAt;

  const results = slots.map((slot, index): JobResult => {
    if (slot.status === "done") return slot.value;

    const skipped: JobResult = { job: worklist[index], status: "cancelled", durationMs: 0 };
    options.onJobComplete?.(skipped);
    return skipped;
  });

  return summarizeResults(results, elapsedMs);
}

// =============================================================================
// INTERNALS
// =============================================================================

function toJobResult(
  job: Job,
  outcome: Exclude<CommandOutcome, { kind: "launch_failed" }>,
  durationMs: number,
): JobResult {
  switch (outcome.kind) {
    case "exited":
      return outcome.exitCode === 0
        ? { job, status: "succeeded", durationMs }
        : {
            job,
            status: "failed",
            reason: "exit",
            exitCode: outcome.exitCode,
            stderrTail: outcome.stderr,
            durationMs,
          };
    case "timed_out":
      return { job, status: "failed", reason: "timeout", stderrTail: outcome.stderr, durationMs };
    case "signaled":
      return {
        job,
        status: "failed",
        reason: "exit",
        signal: outcome.signal,
        stderrTail: outcome.stderr,
        durationMs,
      };
    case "cancelled":
      return { job, status: "cancelled", durationMs };
  }
}

function summarizeResults(results: JobResult[], elapsedMs: number): DispatchReport {
  let succeeded = 0;
  let failed = 0;
  let cancelled = 0;

  for (const result of results) {
    if (result.status === "succeeded") succeeded += 1;
    else if (result.status === "failed") failed += 1;
    else cancelled += 1;
  }

  return { results, elapsedMs, succeeded, failed, cancelled };
}
