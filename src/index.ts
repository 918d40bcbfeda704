#!/usr/bin/env node

import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/output.js";
import { buildCli, type CliRunState } from "./cli/index.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./core/errors.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(program: Command): void {
  program.configureOutput({
    outputError: (_message: string, _write: (chunk: string) => void) => undefined,
  });

  program.exitOverride();
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function toCliError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) {
    return error;
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid arguments.",
    message: error.message.replace(/^error:\s*/, ""),
    hint: "Run `figbuild --help` for usage.",
    cause: error,
  });
}

function resolveDebugFlagFromArgv(argv: string[]): boolean {
  let debugFlag = false;

  for (const arg of argv) {
    if (arg === "--") {
      break;
    }
    if (arg === "--debug") {
      debugFlag = true;
    }
  }

  return debugFlag;
}

export async function main(argv: string[]): Promise<number> {
  const state: CliRunState = { exitCode: 0 };
  const program = buildCli(state);
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
    return state.exitCode;
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      return 0;
    }

    console.error(renderCliError(toCliError(error), { debug: resolveDebugFlagFromArgv(argv) }));
    return 1;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  // npm links bins through symlinks, so compare against the resolved file.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv).then((exitCode) => {
    process.exitCode = exitCode;
  });
}
