#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import type { GlobalCliOptions } from "./cli/context.js";
import { normalizeCliError, renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";
import { resolveDebugFlagFromArgv } from "./core/error-format.js";

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

function resolveDebugEnabled(argv: string[], program: Command): boolean {
  const argvDebug = resolveDebugFlagFromArgv(argv);
  if (argvDebug !== undefined) {
    return argvDebug;
  }

  return Boolean(program.opts<GlobalCliOptions>().debug);
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const exitCode = error.exitCode;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    const debug = resolveDebugEnabled(argv, program);
    console.error(renderCliError(normalizeCliError(error), { debug }));
    // Commander usage errors carry their own code; engine errors never reuse 0 or 2.
    const exitCode = error instanceof CommanderError ? resolveExitCode(error) : 1;
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  // npm links the bin, so compare against the resolved file.
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (isDirectExecution()) {
  void main(process.argv);
}
