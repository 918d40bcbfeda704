/*
Build job types shared by the scanner, dispatcher and CLI.
A Job is created once by the scanner and never mutated afterwards.
*/

export type StaleReason = "missing" | "outdated";

export type Unit = {
  readonly sourcePath: string;
  /** Directory of the unit relative to the source root, "/"-separated ("." for the root). */
  readonly relativeDir: string;
  /** File name without the unit extension. */
  readonly baseName: string;
};

export type Job = Unit & {
  readonly outputDir: string;
  readonly artifactPath: string;
  readonly reason: StaleReason;
};

export type JobFailureReason = "exit" | "timeout";

export type JobResult =
  | { readonly job: Job; readonly status: "succeeded"; readonly durationMs: number }
  | {
      readonly job: Job;
      readonly status: "failed";
      readonly reason: JobFailureReason;
      readonly exitCode?: number;
      readonly signal?: string;
      readonly stderrTail: string;
      readonly durationMs: number;
    }
  | { readonly job: Job; readonly status: "cancelled"; readonly durationMs: number };

export type FailedJobResult = Extract<JobResult, { status: "failed" }>;

export function isFailedJob(result: JobResult): result is FailedJobResult {
  return result.status === "failed";
}

export function unitLabel(job: Job): string {
  const fileName = job.sourcePath.split(/[\\/]/).pop() ?? job.sourcePath;
  return job.relativeDir === "." ? fileName : `${job.relativeDir}/${fileName}`;
}
