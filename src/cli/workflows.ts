import { createRunner, stepContextFor, type AppContext } from "../app/context.js";
import { exitCodeForOutcome } from "../core/runner.js";
import type { StepList } from "../steps/step-list.js";
import type { StepContext } from "../steps/step.js";
import { buildAppendSteps } from "../workflows/append.js";
import { buildHackSteps } from "../workflows/hack.js";
import { buildPrependSteps } from "../workflows/prepend.js";
import { buildSetParentSteps } from "../workflows/set-parent.js";
import { buildShipSteps } from "../workflows/ship.js";
import { buildSyncSteps } from "../workflows/sync.js";

import { withCliContext, type GlobalCliOptions } from "./context.js";
import { printRunOutcome } from "./report.js";

type BuildSteps = (ctx: StepContext) => Promise<StepList>;

/** Builds the command's steps (only when no run is in progress) and executes them. */
export async function runWorkflowCommand(
  globals: GlobalCliOptions,
  command: string,
  build: BuildSteps,
): Promise<void> {
  await withCliContext(globals, async (ctx: AppContext) => {
    const runner = createRunner(ctx);
    await runner.ensureIdle();
    const steps = await build(stepContextFor(ctx));
    const outcome = await runner.run(command, steps);
    printRunOutcome(outcome);
    process.exitCode = exitCodeForOutcome(outcome);
  });
}

export function hackCommand(globals: GlobalCliOptions, branch: string): Promise<void> {
  return runWorkflowCommand(globals, "hack", (ctx) => buildHackSteps(ctx, { branch }));
}

export function appendCommand(globals: GlobalCliOptions, branch: string): Promise<void> {
  return runWorkflowCommand(globals, "append", (ctx) => buildAppendSteps(ctx, { branch }));
}

export function prependCommand(globals: GlobalCliOptions, branch: string): Promise<void> {
  return runWorkflowCommand(globals, "prepend", (ctx) => buildPrependSteps(ctx, { branch }));
}

export function syncCommand(globals: GlobalCliOptions, opts: { all: boolean }): Promise<void> {
  return runWorkflowCommand(globals, "sync", (ctx) => buildSyncSteps(ctx, { all: opts.all }));
}

export function shipCommand(
  globals: GlobalCliOptions,
  branch: string | undefined,
  opts: { message?: string },
): Promise<void> {
  return runWorkflowCommand(globals, "ship", (ctx) =>
    buildShipSteps(ctx, { branch, commitMessage: opts.message }),
  );
}

export function setParentCommand(
  globals: GlobalCliOptions,
  parent: string,
  branch: string | undefined,
): Promise<void> {
  return runWorkflowCommand(globals, "set-parent", (ctx) =>
    buildSetParentSteps(ctx, { parent, branch }),
  );
}
