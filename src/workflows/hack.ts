import { CheckoutBranch, CreateBranch } from "../steps/branch-steps.js";
import { SetParentBranch } from "../steps/lineage-steps.js";
import { CreateTrackingBranch } from "../steps/remote-steps.js";
import { StepList } from "../steps/step-list.js";
import type { StepContext } from "../steps/step.js";
import { SyncBranch } from "../steps/sync-branch.js";

import { WORKFLOW_WRAP_OPTIONS, ensureBranchIsNew, fetchIfOnline } from "./common.js";

export type HackOptions = {
  branch: string;
};

/** Cuts a new feature branch off the freshly synced main branch. */
export async function buildHackSteps(ctx: StepContext, opts: HackOptions): Promise<StepList> {
  const online = await fetchIfOnline(ctx);
  await ensureBranchIsNew(ctx, opts.branch);

  const mainBranch = ctx.lineage.mainBranch;
  const steps = new StepList()
    .append(new SyncBranch(mainBranch, true))
    .append(new CreateBranch(opts.branch, mainBranch))
    .append(new SetParentBranch(opts.branch, mainBranch))
    .append(new CheckoutBranch(opts.branch));
  if (online && ctx.config.push_new_branches) {
    steps.append(new CreateTrackingBranch(opts.branch));
  }

  await steps.wrap(WORKFLOW_WRAP_OPTIONS, ctx.repo);
  return steps;
}
