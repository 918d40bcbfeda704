import { Command, InvalidArgumentError } from "commander";

import { buildCommand } from "./build.js";

export type CliRunState = {
  exitCode: number;
};

type CliOptions = {
  jobs?: number;
  compiler?: string;
  timeout?: number;
  failOnError?: boolean;
  dryRun: boolean;
  logFile?: string;
  config?: string;
  debug: boolean;
};

export function buildCli(state: CliRunState = { exitCode: 0 }): Command {
  const program = new Command();

  program
    .name("figbuild")
    .description(
      "Incrementally compile standalone figure sources in parallel, mirroring the source tree",
    )
    .version("0.1.0")
    .argument("<sourceRoot>", "Root directory containing standalone sources (.tex by default)")
    .argument("<outputRoot>", "Output directory for compiled artifacts (created if missing)")
    .option("-j, --jobs <n>", "Maximum number of parallel renderer processes (default: 32)", parsePositiveInt)
    .option("--compiler <command>", "Renderer executable (default: lualatex)")
    .option("--timeout <seconds>", "Kill a unit's renderer after this many seconds", parsePositiveNumber)
    .option("--fail-on-error", "Exit with status 2 when any unit fails (default)")
    .option("--no-fail-on-error", "Exit with status 0 even when units fail")
    .option("--dry-run", "List stale units without compiling them", false)
    .option("--log-file <path>", "Append JSONL build events to this file")
    .option("--config <path>", "Build config file (default: <sourceRoot>/figbuild.yaml when present)")
    .option("--debug", "Show error codes, causes and stacks", false)
    .action(async (sourceRoot: string, outputRoot: string, opts: CliOptions) => {
      state.exitCode = await buildCommand(sourceRoot, outputRoot, {
        jobs: opts.jobs,
        compiler: opts.compiler,
        timeout: opts.timeout,
        failOnError: opts.failOnError,
        dryRun: opts.dryRun,
        logFile: opts.logFile,
        config: opts.config,
        debug: opts.debug,
      });
    });

  return program;
}

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }
  return parsed;
}
