import path from "node:path";

import { runBuild, type BuildReport } from "../core/build.js";
import type { CommandRunner } from "../core/compiler.js";
import { applyConfigOverrides, loadBuildConfig } from "../core/config.js";
import { BuildCancelledError } from "../core/errors.js";

import { createBuildOutput } from "./output.js";
import { createStopSignalHandler } from "./signal-handlers.js";

export type BuildCommandOptions = {
  jobs?: number;
  compiler?: string;
  timeout?: number;
  failOnError?: boolean;
  dryRun?: boolean;
  logFile?: string;
  config?: string;
  debug?: boolean;
};

export type BuildCommandDeps = {
  runner?: CommandRunner;
  signal?: AbortSignal;
  write?: (line: string) => void;
};

export const EXIT_CODES = {
  ok: 0,
  fatal: 1,
  unitsFailed: 2,
} as const;

export async function buildCommand(
  sourceRoot: string,
  outputRoot: string,
  opts: BuildCommandOptions,
  deps: BuildCommandDeps = {},
): Promise<number> {
  const sourceAbs = path.resolve(sourceRoot);
  const outputAbs = path.resolve(outputRoot);

  const { config: fileConfig, configPath } = loadBuildConfig({
    sourceRoot: sourceAbs,
    explicitConfigPath: opts.config,
  });
  const config = applyConfigOverrides(fileConfig, {
    jobs: opts.jobs,
    compiler: opts.compiler,
    timeoutSeconds: opts.timeout,
    failOnError: opts.failOnError,
    logFile: opts.logFile,
  });

  const output = createBuildOutput(config, { write: deps.write, debug: opts.debug });
  output.header({ sourceRoot: sourceAbs, outputRoot: outputAbs, config });
  if (configPath) {
    (deps.write ?? console.log)(`Config file      : ${configPath}`);
  }

  const stopHandler = deps.signal
    ? null
    : createStopSignalHandler({
        onSignal: (signal) =>
          console.warn(`Received ${signal}. Stopping running units; queued units will not start.`),
      });
  const signal = deps.signal ?? stopHandler?.signal;

  let report: BuildReport;
  try {
    report = await runBuild({
      sourceRoot: sourceAbs,
      outputRoot: outputAbs,
      config,
      dryRun: opts.dryRun,
      runner: deps.runner,
      signal,
      reporter: output,
      debug: opts.debug,
    });
  } finally {
    stopHandler?.cleanup();
  }

  output.summary(report);

  if (signal?.aborted) {
    const { succeeded, cancelled } = report.dispatch;
    throw new BuildCancelledError(
      `Stopped after ${succeeded} of ${report.worklist.length} unit(s) compiled; ${cancelled} cancelled.`,
    );
  }

  return resolveBuildExitCode(report, config.fail_on_error);
}

export function resolveBuildExitCode(report: BuildReport, failOnError: boolean): number {
  if (report.dispatch.failed > 0 && failOnError) {
    return EXIT_CODES.unitsFailed;
  }
  return EXIT_CODES.ok;
}
