import path from "node:path";

import { describe, expect, it } from "vitest";

import { FakeCommandRunner, makeJob, succeed } from "../__tests__/helpers/fake-runner.js";

import { defaultBuildConfig } from "./config.js";
import { dispatchJobs, type DispatchOptions } from "./dispatcher.js";
import { PoolExecutorError } from "./errors.js";
import type { JobResult } from "./jobs.js";

const compiler = defaultBuildConfig().compiler;

function options(overrides: Partial<DispatchOptions> = {}): DispatchOptions {
  return { sourceRoot: "/src", concurrency: 2, compiler, ...overrides };
}

describe("dispatchJobs", () => {
  it("returns an empty report without invoking the renderer", async () => {
    const runner = new FakeCommandRunner();

    const report = await dispatchJobs([], options({ runner }));

    expect(report).toEqual({ results: [], elapsedMs: 0, succeeded: 0, failed: 0, cancelled: 0 });
    expect(runner.invocations).toHaveLength(0);
  });

  it("keeps at most the configured number of renderers running", async () => {
    const runner = new FakeCommandRunner(succeed, 10);
    const jobs = ["a", "b", "c", "d", "e", "f"].map((name) => makeJob(`${name}.tex`));

    const report = await dispatchJobs(jobs, options({ runner, concurrency: 2 }));

    expect(runner.maxActive).toBe(2);
    expect(report.succeeded).toBe(6);
    expect(runner.sources()).toEqual(jobs.map((job) => job.sourcePath));
  });

  it("records a failing unit without stopping the others", async () => {
    const jobs = [makeJob("a.tex"), makeJob("b.tex"), makeJob("c.tex")];
    const runner = new FakeCommandRunner((invocation) =>
      invocation.args.at(-1) === jobs[1].sourcePath
        ? { kind: "exited", exitCode: 1, stderr: "! Undefined control sequence." }
        : { kind: "exited", exitCode: 0, stderr: "" },
    );

    const report = await dispatchJobs(jobs, options({ runner, concurrency: 1 }));

    expect(report.results.map((r) => r.status)).toEqual(["succeeded", "failed", "succeeded"]);
    expect(report.results[1]).toMatchObject({
      status: "failed",
      reason: "exit",
      exitCode: 1,
      stderrTail: "! Undefined control sequence.",
    });
    expect(report).toMatchObject({ succeeded: 2, failed: 1, cancelled: 0 });
  });

  it("marks a unit that ran past the timeout as failed", async () => {
    const runner = new FakeCommandRunner((_invocation, runOptions) =>
      runOptions.timeoutMs === 250
        ? { kind: "timed_out", stderr: "" }
        : { kind: "exited", exitCode: 0, stderr: "" },
    );

    const report = await dispatchJobs([makeJob("slow.tex")], options({ runner, timeoutMs: 250 }));

    expect(report.results[0]).toMatchObject({ status: "failed", reason: "timeout" });
    expect(report.failed).toBe(1);
  });

  it("records a unit killed by a signal as failed", async () => {
    const runner = new FakeCommandRunner(() => ({ kind: "signaled", signal: "SIGKILL", stderr: "" }));

    const report = await dispatchJobs([makeJob("a.tex")], options({ runner }));

    expect(report.results[0]).toMatchObject({ status: "failed", reason: "exit", signal: "SIGKILL" });
  });

  it("raises a pool error when the renderer cannot be launched", async () => {
    const runner = new FakeCommandRunner(() => ({
      kind: "launch_failed",
      code: "ENOENT",
      message: "spawn lualatex ENOENT",
    }));
    const jobs = [makeJob("a.tex"), makeJob("b.tex"), makeJob("c.tex")];

    const run = dispatchJobs(jobs, options({ runner, concurrency: 1 }));

    await expect(run).rejects.toBeInstanceOf(PoolExecutorError);
    await expect(run).rejects.toThrow(
      `Failed to launch lualatex for ${jobs[0].sourcePath} (ENOENT): spawn lualatex ENOENT`,
    );
    expect(runner.invocations).toHaveLength(1);
  });

  it("reports queued units as cancelled once the signal aborts", async () => {
    const controller = new AbortController();
    const runner = new FakeCommandRunner(() => {
      controller.abort();
      return { kind: "exited", exitCode: 0, stderr: "" };
    });
    const completed: JobResult[] = [];
    const jobs = [makeJob("a.tex"), makeJob("b.tex"), makeJob("c.tex")];

    const report = await dispatchJobs(
      jobs,
      options({
        runner,
        concurrency: 1,
        signal: controller.signal,
        onJobComplete: (result) => completed.push(result),
      }),
    );

    expect(report.results.map((r) => r.status)).toEqual(["succeeded", "cancelled", "cancelled"]);
    expect(report).toMatchObject({ succeeded: 1, failed: 0, cancelled: 2 });
    expect(completed.map((r) => r.job.baseName)).toEqual(["a", "b", "c"]);
    expect(runner.invocations).toHaveLength(1);
  });

  it("measures elapsed time and per-unit duration with the injected clock", async () => {
    const ticks = [1000, 1000, 1100, 1100, 1150, 1150];
    const now = (): number => ticks.shift() ?? 0;

    const report = await dispatchJobs(
      [makeJob("a.tex"), makeJob("b.tex")],
      options({ runner: new FakeCommandRunner(), concurrency: 1, now }),
    );

    expect(report.elapsedMs).toBe(150);
    expect(report.results.map((r) => r.durationMs)).toEqual([100, 50]);
  });

  it("announces each job with its invocation before it runs", async () => {
    const starts: string[] = [];

    await dispatchJobs(
      [makeJob("fig/a.tex")],
      options({
        runner: new FakeCommandRunner(),
        onJobStart: (job, invocation) =>
          starts.push(`${job.baseName}:${invocation.cwd}:${invocation.env.TEXINPUTS}`),
      }),
    );

    expect(starts).toEqual([`a:${path.resolve("/out", "fig")}:/src${path.delimiter}`]);
  });
});
