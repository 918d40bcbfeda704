import path from "node:path";

import type { CommandRunner, CompilerInvocation } from "./compiler.js";
import type { BuildConfig } from "./config.js";
import { dispatchJobs, type DispatchReport } from "./dispatcher.js";
import { BuildCancelledError } from "./errors.js";
import type { FailedJobResult, Job, JobResult } from "./jobs.js";
import { JsonlLogger, logBuildEvent } from "./logger.js";
import { mirrorDirectoryStructure, type MirroredDirectory, type MirrorSummary } from "./mirror.js";
import { findStaleUnits } from "./scanner.js";
import { millisecondsFromSeconds, secondsFromMs } from "./time.js";
import { defaultRunId } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildPhase = "mirror" | "scan" | "dispatch";

export interface BuildReporter {
  onPhase?(phase: BuildPhase): void;
  onDirectory?(directory: MirroredDirectory): void;
  onStaleUnit?(job: Job): void;
  onJobStart?(job: Job, invocation: CompilerInvocation): void;
  onJobComplete?(result: JobResult): void;
}

export type BuildOptions = {
  sourceRoot: string;
  outputRoot: string;
  config: BuildConfig;
  runId?: string;
  dryRun?: boolean;
  runner?: CommandRunner;
  signal?: AbortSignal;
  reporter?: BuildReporter;
  debug?: boolean;
};

export type BuildReport = {
  runId: string;
  sourceRoot: string;
  outputRoot: string;
  mirror: MirrorSummary;
  worklist: Job[];
  dispatch: DispatchReport;
  dryRun: boolean;
};

// =============================================================================
// BUILD
// =============================================================================

export async function runBuild(options: BuildOptions): Promise<BuildReport> {
  const runId = options.runId ?? defaultRunId();
  const sourceRoot = path.resolve(options.sourceRoot);
  const outputRoot = path.resolve(options.outputRoot);
  const { config, reporter = {} } = options;

  const logger = config.log_file
    ? new JsonlLogger(config.log_file, { runId }, options.debug ?? false)
    : undefined;

  try {
    logBuildEvent(logger, "build.start", {
      source_root: sourceRoot,
      output_root: outputRoot,
      jobs: config.jobs,
      dry_run: options.dryRun ?? false,
    });

    reporter.onPhase?.("mirror");
    const mirror = await mirrorDirectoryStructure(sourceRoot, outputRoot, {
      onDirectory: (directory) => reporter.onDirectory?.(directory),
    });
    logBuildEvent(logger, "mirror.complete", {
      created: mirror.created,
      existing: mirror.existing,
    });

    reporter.onPhase?.("scan");
    const worklist = await findStaleUnits(sourceRoot, outputRoot, {
      unitExtension: config.unit_extension,
      artifactExtension: config.artifact_extension,
      onStaleUnit: (job) => reporter.onStaleUnit?.(job),
    });
    logBuildEvent(logger, "scan.complete", {
      stale: worklist.length,
      units: worklist.map((job) => job.sourcePath),
    });

    if (options.dryRun || worklist.length === 0) {
      const dispatch: DispatchReport = {
        results: [],
        elapsedMs: 0,
        succeeded: 0,
        failed: 0,
        cancelled: 0,
      };
      logBuildEvent(logger, "build.complete", { stale: worklist.length, dispatched: 0 });
      return { runId, sourceRoot, outputRoot, mirror, worklist, dispatch, dryRun: options.dryRun ?? false };
    }

    throwIfAborted(options.signal);

    reporter.onPhase?.("dispatch");
    const dispatch = await dispatchJobs(worklist, {
      sourceRoot,
      concurrency: config.jobs,
      compiler: config.compiler,
      runner: options.runner,
      timeoutMs: millisecondsFromSeconds(config.timeout_seconds),
      signal: options.signal,
      onJobStart: (job, invocation) => {
        logBuildEvent(logger, "job.start", { unit: job.sourcePath, args: invocation.args });
        reporter.onJobStart?.(job, invocation);
      },
      onJobComplete: (result) => {
        logBuildEvent(logger, "job.complete", {
          unit: result.job.sourcePath,
          status: result.status,
          duration_seconds: secondsFromMs(result.durationMs),
          ...(result.status === "failed" ? failurePayload(result) : {}),
        });
        reporter.onJobComplete?.(result);
      },
    });

    logBuildEvent(logger, "dispatch.complete", {
      elapsed_seconds: secondsFromMs(dispatch.elapsedMs),
      succeeded: dispatch.succeeded,
      failed: dispatch.failed,
      cancelled: dispatch.cancelled,
    });
    logBuildEvent(logger, "build.complete", { stale: worklist.length, dispatched: worklist.length });

    return { runId, sourceRoot, outputRoot, mirror, worklist, dispatch, dryRun: false };
  } catch (err) {
    logBuildEvent(logger, "build.error", {
      name: err instanceof Error ? err.name : "Error",
      message: err instanceof Error ? err.message : String(err),
    });
    throw err;
  } finally {
    logger?.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new BuildCancelledError("Build cancelled before compilation started.");
  }
}

function failurePayload(result: FailedJobResult): {
  reason: string;
  exit_code: number | null;
  signal: string | null;
} {
  return {
    reason: result.reason,
    exit_code: result.exitCode ?? null,
    signal: result.signal ?? null,
  };
}
