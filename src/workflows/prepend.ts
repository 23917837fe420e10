import { CheckoutBranch, CreateBranch } from "../steps/branch-steps.js";
import { SetParentBranch } from "../steps/lineage-steps.js";
import { CreateTrackingBranch } from "../steps/remote-steps.js";
import { StepList } from "../steps/step-list.js";
import type { StepContext } from "../steps/step.js";

import {
  WORKFLOW_WRAP_OPTIONS,
  ensureBranchIsNew,
  ensureFeatureBranch,
  fetchIfOnline,
  requireParent,
  syncBranchSteps,
} from "./common.js";

export type PrependOptions = {
  branch: string;
};

/**
 * Inserts a new branch between the current branch and its parent: the new
 * branch is cut off the parent and becomes the current branch's parent.
 */
export async function buildPrependSteps(
  ctx: StepContext,
  opts: PrependOptions,
): Promise<StepList> {
  const initialBranch = await ctx.repo.currentBranch();
  const online = await fetchIfOnline(ctx);
  await ensureBranchIsNew(ctx, opts.branch);
  ensureFeatureBranch(ctx, initialBranch, "have parent branches");
  const parent = await requireParent(ctx, initialBranch);
  const ancestors = await ctx.lineage.ancestorsOf(initialBranch);

  const steps = new StepList()
    .appendList(syncBranchSteps(ancestors, true))
    .append(new CreateBranch(opts.branch, parent))
    .append(new SetParentBranch(opts.branch, parent))
    .append(new SetParentBranch(initialBranch, opts.branch))
    .append(new CheckoutBranch(opts.branch));
  if (online && ctx.config.push_new_branches) {
    steps.append(new CreateTrackingBranch(opts.branch));
  }

  await steps.wrap(WORKFLOW_WRAP_OPTIONS, ctx.repo);
  return steps;
}
