import path from "node:path";

import { beforeEach, describe, expect, it, vi } from "vitest";

import { makeJob } from "../__tests__/helpers/fake-runner.js";

import {
  buildCompilerInvocation,
  ExecaCommandRunner,
  formatInvocation,
  type CompilerInvocation,
} from "./compiler.js";
import { defaultBuildConfig } from "./config.js";

const { execaMock } = vi.hoisted(() => ({ execaMock: vi.fn() }));

vi.mock("execa", () => ({ execa: execaMock }));

const compiler = defaultBuildConfig().compiler;

describe("buildCompilerInvocation", () => {
  it("directs output into the mirrored directory and adds the source root to the search path", () => {
    const job = makeJob("fig/plot.tex");

    const invocation = buildCompilerInvocation(job, { sourceRoot: "/src", compiler });

    expect(invocation).toEqual<CompilerInvocation>({
      command: "lualatex",
      args: [
        "-interaction=batchmode",
        "-halt-on-error",
        `-output-directory=${path.resolve("/out", "fig")}`,
        path.resolve("/src", "fig/plot.tex"),
      ],
      env: { TEXINPUTS: `/src${path.delimiter}` },
      cwd: path.resolve("/out", "fig"),
    });
  });

  it("passes paths with spaces as single arguments", () => {
    const job = makeJob("my figs/first plot.tex", { source: "/data/src", output: "/data/out" });

    const invocation = buildCompilerInvocation(job, { sourceRoot: "/data/src", compiler });

    expect(invocation.args.slice(-2)).toEqual([
      `-output-directory=${path.resolve("/data/out", "my figs")}`,
      path.resolve("/data/src", "my figs/first plot.tex"),
    ]);
  });

  it("uses a configured renderer and search path variable", () => {
    const job = makeJob("a.tex");

    const invocation = buildCompilerInvocation(job, {
      sourceRoot: "/src",
      compiler: {
        command: "pdflatex",
        args: [],
        output_dir_flag: "--output-directory",
        search_path_env: "FIGINPUTS",
      },
    });

    expect(invocation.command).toBe("pdflatex");
    expect(invocation.args).toEqual([`--output-directory=${path.resolve("/out")}`, path.resolve("/src", "a.tex")]);
    expect(invocation.env).toEqual({ FIGINPUTS: `/src${path.delimiter}` });
  });
});

describe("formatInvocation", () => {
  it("quotes only the arguments that need it", () => {
    const text = formatInvocation({
      command: "lualatex",
      args: ["-halt-on-error", "-output-directory=/out/my figs", "/src/it's.tex"],
      env: { TEXINPUTS: "/src:" },
      cwd: "/out",
    });

    expect(text).toBe(
      "TEXINPUTS=/src: lualatex -halt-on-error '-output-directory=/out/my figs' '/src/it'\\''s.tex'",
    );
  });
});

describe("ExecaCommandRunner", () => {
  const invocation: CompilerInvocation = {
    command: "lualatex",
    args: ["/src/a.tex"],
    env: { TEXINPUTS: "/src:" },
    cwd: "/out",
  };

  beforeEach(() => {
    execaMock.mockReset();
  });

  it("runs the renderer with piped stderr and the requested timeout", async () => {
    execaMock.mockResolvedValue({ exitCode: 0, stderr: "Output written on a.pdf" });
    const controller = new AbortController();

    const outcome = await new ExecaCommandRunner().run(invocation, {
      timeoutMs: 5000,
      signal: controller.signal,
    });

    expect(outcome).toEqual({ kind: "exited", exitCode: 0, stderr: "Output written on a.pdf" });
    expect(execaMock).toHaveBeenCalledWith("lualatex", ["/src/a.tex"], {
      cwd: "/out",
      env: { TEXINPUTS: "/src:" },
      extendEnv: true,
      stdin: "ignore",
      stdout: "ignore",
      stderr: "pipe",
      timeout: 5000,
      signal: controller.signal,
    });
  });

  it("reports a non-zero exit with the tail of stderr", async () => {
    const stderr = Array.from({ length: 25 }, (_, i) => `line ${i + 1}`).join("\n");
    execaMock.mockRejectedValue(
      Object.assign(new Error("Command failed with exit code 1"), {
        exitCode: 1,
        stderr,
        timedOut: false,
        isCanceled: false,
      }),
    );

    const outcome = await new ExecaCommandRunner().run(invocation, {});

    expect(outcome).toEqual({
      kind: "exited",
      exitCode: 1,
      stderr: Array.from({ length: 20 }, (_, i) => `line ${i + 6}`).join("\n"),
    });
  });

  it("reports a timeout", async () => {
    execaMock.mockRejectedValue(
      Object.assign(new Error("Command timed out"), {
        timedOut: true,
        isCanceled: false,
        signal: "SIGTERM",
        stderr: "still running\n",
      }),
    );

    const outcome = await new ExecaCommandRunner().run(invocation, { timeoutMs: 10 });

    expect(outcome).toEqual({ kind: "timed_out", stderr: "still running" });
  });

  it("reports cancellation", async () => {
    execaMock.mockRejectedValue(
      Object.assign(new Error("Command was canceled"), { isCanceled: true, timedOut: false }),
    );

    const outcome = await new ExecaCommandRunner().run(invocation, {});

    expect(outcome).toEqual({ kind: "cancelled" });
  });

  it("reports a run killed by a signal", async () => {
    execaMock.mockRejectedValue(
      Object.assign(new Error("Command was killed with SIGKILL"), { signal: "SIGKILL", stderr: "" }),
    );

    const outcome = await new ExecaCommandRunner().run(invocation, {});

    expect(outcome).toEqual({ kind: "signaled", signal: "SIGKILL", stderr: "" });
  });

  it("reports a renderer that cannot be launched", async () => {
    execaMock.mockRejectedValue(
      Object.assign(new Error("spawn lualatex ENOENT"), { code: "ENOENT", errno: -2 }),
    );

    const outcome = await new ExecaCommandRunner().run(invocation, {});

    expect(outcome).toEqual({
      kind: "launch_failed",
      code: "ENOENT",
      message: "spawn lualatex ENOENT",
    });
  });

  it("does not launch when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await new ExecaCommandRunner().run(invocation, { signal: controller.signal });

    expect(outcome).toEqual({ kind: "cancelled" });
    expect(execaMock).not.toHaveBeenCalled();
  });
});
