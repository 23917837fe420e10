import { createRunner } from "../app/context.js";
import { exitCodeForOutcome, type RunOutcome, type Runner } from "../core/runner.js";

import { withCliContext, type GlobalCliOptions } from "./context.js";
import { formatRunStatus, printRunOutcome } from "./report.js";

async function resumeWith(
  globals: GlobalCliOptions,
  action: (runner: Runner) => Promise<RunOutcome>,
): Promise<void> {
  await withCliContext(globals, async (ctx) => {
    const outcome = await action(createRunner(ctx));
    printRunOutcome(outcome);
    process.exitCode = exitCodeForOutcome(outcome);
  });
}

export function continueCommand(globals: GlobalCliOptions): Promise<void> {
  return resumeWith(globals, (runner) => runner.continue());
}

export function abortCommand(globals: GlobalCliOptions): Promise<void> {
  return resumeWith(globals, (runner) => runner.abort());
}

export function skipCommand(globals: GlobalCliOptions): Promise<void> {
  return resumeWith(globals, (runner) => runner.skip());
}

export async function statusCommand(globals: GlobalCliOptions): Promise<void> {
  await withCliContext(globals, async (ctx) => {
    const summary = await createRunner(ctx).status();
    console.log(formatRunStatus(summary).join("\n"));
  });
}

export async function discardCommand(globals: GlobalCliOptions): Promise<void> {
  await withCliContext(globals, async (ctx) => {
    const discarded = await createRunner(ctx).discard();
    console.log(discarded ? "Discarded the saved run." : "No forkline run in progress.");
  });
}
