import { CheckoutBranch, CreateBranch } from "../steps/branch-steps.js";
import { SetParentBranch } from "../steps/lineage-steps.js";
import { CreateTrackingBranch } from "../steps/remote-steps.js";
import { StepList } from "../steps/step-list.js";
import type { StepContext } from "../steps/step.js";

import {
  WORKFLOW_WRAP_OPTIONS,
  ensureBranchIsNew,
  fetchIfOnline,
  syncBranchSteps,
} from "./common.js";

export type AppendOptions = {
  branch: string;
};

/** Creates a child of the current branch after syncing the current branch's lineage. */
export async function buildAppendSteps(ctx: StepContext, opts: AppendOptions): Promise<StepList> {
  const initialBranch = await ctx.repo.currentBranch();
  const online = await fetchIfOnline(ctx);
  await ensureBranchIsNew(ctx, opts.branch);
  const ancestors = await ctx.lineage.ancestorsOf(initialBranch);

  const steps = new StepList()
    .appendList(syncBranchSteps([...ancestors, initialBranch], true))
    .append(new CreateBranch(opts.branch, initialBranch))
    .append(new SetParentBranch(opts.branch, initialBranch))
    .append(new CheckoutBranch(opts.branch));
  if (online && ctx.config.push_new_branches) {
    steps.append(new CreateTrackingBranch(opts.branch));
  }

  await steps.wrap(WORKFLOW_WRAP_OPTIONS, ctx.repo);
  return steps;
}
