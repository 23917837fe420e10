import { Command } from "commander";

import type { GlobalCliOptions } from "./context.js";
import {
  abortCommand,
  continueCommand,
  discardCommand,
  skipCommand,
  statusCommand,
} from "./run-control.js";
import {
  appendCommand,
  hackCommand,
  prependCommand,
  setParentCommand,
  shipCommand,
  syncCommand,
} from "./workflows.js";

export function buildCli(): Command {
  const program = new Command();
  const globals = (): GlobalCliOptions => program.opts<GlobalCliOptions>();

  program
    .name("forkline")
    .description("Stacked feature-branch workflows for git, with conflict-safe resume and undo")
    .version("0.1.0")
    .option("--config <path>", "Override config path (defaults to <repo>/.forkline/config.yaml)")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("hack")
    .description("Create a new feature branch off the main branch")
    .argument("<branch>", "Name of the new branch")
    .action(async (branch: string) => {
      await hackCommand(globals(), branch);
    });

  program
    .command("append")
    .description("Create a new feature branch as a child of the current branch")
    .argument("<branch>", "Name of the new branch")
    .action(async (branch: string) => {
      await appendCommand(globals(), branch);
    });

  program
    .command("prepend")
    .description("Create a new feature branch between the current branch and its parent")
    .argument("<branch>", "Name of the new branch")
    .action(async (branch: string) => {
      await prependCommand(globals(), branch);
    });

  program
    .command("sync")
    .description("Update the current branch (or all branches) from their remote and parents")
    .option("--all", "Sync every local branch", false)
    .action(async (opts: { all: boolean }) => {
      await syncCommand(globals(), opts);
    });

  program
    .command("ship")
    .description("Merge a feature branch's pull request and clean up the branch")
    .argument("[branch]", "Branch to ship (default: current branch)")
    .option("-m, --message <message>", "Commit message for the merge")
    .action(async (branch: string | undefined, opts: { message?: string }) => {
      await shipCommand(globals(), branch, opts);
    });

  program
    .command("set-parent")
    .description("Record the parent of a feature branch")
    .argument("<parent>", "The new parent branch")
    .argument("[branch]", "Branch to update (default: current branch)")
    .action(async (parent: string, branch: string | undefined) => {
      await setParentCommand(globals(), parent, branch);
    });

  program
    .command("continue")
    .description("Resume the paused run after resolving its conflicts")
    .action(async () => {
      await continueCommand(globals());
    });

  program
    .command("abort")
    .description("Undo everything the paused run did")
    .action(async () => {
      await abortCommand(globals());
    });

  program
    .command("skip")
    .description("Drop the conflicting change and resume the paused run")
    .action(async () => {
      await skipCommand(globals());
    });

  program
    .command("status")
    .description("Show the run in progress")
    .action(async () => {
      await statusCommand(globals());
    });

  program
    .command("discard")
    .description("Delete the saved run without executing anything")
    .action(async () => {
      await discardCommand(globals());
    });

  return program;
}
