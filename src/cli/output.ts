/*
Purpose: render build progress, summaries and errors for the terminal.
Assumptions: progress goes to stdout, errors to stderr; non-TTY output disables color.
Usage: const out = createBuildOutput({ write: console.log }); out.header(...);
*/

import path from "node:path";

import type { BuildPhase, BuildReport, BuildReporter } from "../core/build.js";
import type { BuildConfig } from "../core/config.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import { formatInvocation } from "../core/compiler.js";
import { isFailedJob, unitLabel, type FailedJobResult, type JobResult } from "../core/jobs.js";
import { formatSeconds } from "../core/time.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export type BuildOutputOptions = {
  write?: (line: string) => void;
  /** Echo each renderer command line before it runs. */
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export type BuildOutput = BuildReporter & {
  header(input: { sourceRoot: string; outputRoot: string; config: BuildConfig }): void;
  summary(report: BuildReport): void;
};

const PHASE_BANNERS: Record<BuildPhase, (config: BuildConfig) => string> = {
  mirror: () => "=== Step 1: Mirroring directory structure ===",
  scan: (config) => `=== Step 2: Detecting outdated ${config.unit_extension} files ===`,
  dispatch: () => "=== Step 3: Compiling ===",
};

// =============================================================================
// BUILD OUTPUT
// =============================================================================

export function createBuildOutput(
  config: BuildConfig,
  options: BuildOutputOptions = {},
): BuildOutput {
  const write = options.write ?? ((line: string) => console.log(line));
  const stream = options.stream ?? process.stdout;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
  let staleCount = 0;

  return {
    header({ sourceRoot, outputRoot }) {
      write(`Source directory : ${sourceRoot}`);
      write(`Output directory : ${outputRoot}`);
      write(`Parallel jobs    : ${config.jobs}`);
    },

    onPhase(phase) {
      if (phase === "dispatch") {
        write("");
        write(format(PHASE_BANNERS[phase](config), ["bold"]));
        write(
          `Found ${staleCount} ${config.unit_extension} file(s) to compile. ` +
            `Launching parallel compilation with maximum allowed ${config.jobs} jobs.`,
        );
        return;
      }
      write("");
      write(format(PHASE_BANNERS[phase](config), ["bold"]));
    },

    onDirectory(directory) {
      write(
        directory.created
          ? `Created directory: ${directory.outputPath}`
          : format(`Directory already exists: ${directory.outputPath}`, ["dim"]),
      );
    },

    onStaleUnit(job) {
      staleCount += 1;
      const why = job.reason === "missing" ? "no output yet" : "source is newer";
      write(`Needs compile: ${job.sourcePath} (${why})`);
    },

    onJobStart(_job, invocation) {
      if (options.debug) {
        write(format(`$ ${formatInvocation(invocation)}`, ["dim"]));
      }
    },

    onJobComplete(result) {
      write(renderJobResult(result, format));
    },

    summary(report) {
      const { dispatch, worklist } = report;

      if (worklist.length === 0) {
        write("No files need recompilation.");
        return;
      }

      if (report.dryRun) {
        write("");
        write(`Dry run: ${worklist.length} unit(s) would be compiled.`);
        return;
      }

      write("");
      write("Compilation finished.");
      write(`Elapsed time: ${formatSeconds(dispatch.elapsedMs)}`);

      const failedLabel = dispatch.failed > 0 ? format(`${dispatch.failed}`, ["red", "bold"]) : "0";
      const parts = [`Succeeded: ${dispatch.succeeded}`, `Failed: ${failedLabel}`];
      if (dispatch.cancelled > 0) {
        parts.push(`Cancelled: ${dispatch.cancelled}`);
      }
      write(parts.join(", "));

      const failures = dispatch.results.filter(isFailedJob);
      if (failures.length > 0) {
        write("Failed units:");
        for (const failure of failures) {
          write(`  ${failure.job.sourcePath}`);
        }
      }
    },
  };
}

export function renderJobResult(result: JobResult, format: AnsiFormatter = (t) => t): string {
  const label = unitLabel(result.job);
  const duration = `${(result.durationMs / 1000).toFixed(2)}s`;

  switch (result.status) {
    case "succeeded":
      return `${format("OK", ["cyan"])}        ${label} (${duration})`;
    case "cancelled":
      return `${format("CANCELLED", ["yellow"])} ${label}`;
    case "failed": {
      const lines = [
        `${format("FAILED", ["red", "bold"])}    ${label}: ${describeFailure(result)}; see ${rendererLogPath(result)}`,
      ];
      if (result.stderrTail.length > 0) {
        lines.push(...result.stderrTail.split("\n").map((line) => `    ${line}`));
      }
      return lines.join("\n");
    }
  }
}

function describeFailure(result: FailedJobResult): string {
  if (result.reason === "timeout") return "timed out";
  if (result.exitCode !== undefined) return `exit code ${result.exitCode}`;
  if (result.signal) return `killed by ${result.signal}`;
  return "failed";
}

function rendererLogPath(result: FailedJobResult): string {
  return path.join(result.job.outputDir, `${result.job.baseName}.log`);
}

// =============================================================================
// ERRORS
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(error, { mode });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderErrorLine(line, format)).join("\n");
}

function renderErrorLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text, 2), ["dim"])}`;
    default:
      return `${format(`${capitalize(line.kind)}:`, ["dim"])} ${format(line.text, ["dim"])}`;
  }
}

function capitalize(value: string): string {
  return value.length === 0 ? value : `${value[0].toUpperCase()}${value.slice(1)}`;
}

function indent(value: string, spaces: number): string {
  const prefix = " ".repeat(spaces);
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
