import { CheckoutBranch } from "../steps/branch-steps.js";
import { Fetch } from "../steps/remote-steps.js";
import { StepList } from "../steps/step-list.js";
import type { StepContext } from "../steps/step.js";
import { walkAncestors } from "../git/lineage.js";

import { WORKFLOW_WRAP_OPTIONS, isOnline, syncBranchSteps } from "./common.js";

export type SyncOptions = {
  all: boolean;
};

/**
 * Syncs the current branch and its ancestors (or every local branch with
 * `all`), then returns to the branch the user started on.
 */
export async function buildSyncSteps(ctx: StepContext, opts: SyncOptions): Promise<StepList> {
  const initialBranch = await ctx.repo.currentBranch();
  const branches = opts.all
    ? await branchesParentsFirst(ctx)
    : [...(await ctx.lineage.ancestorsOf(initialBranch)), initialBranch];

  const steps = new StepList();
  if (await isOnline(ctx)) {
    steps.append(new Fetch());
  }
  steps.appendList(syncBranchSteps(branches, true)).append(new CheckoutBranch(initialBranch));

  await steps.wrap(WORKFLOW_WRAP_OPTIONS, ctx.repo);
  return steps;
}

/** Local branches ordered so every parent is synced before its children. */
export async function branchesParentsFirst(ctx: StepContext): Promise<string[]> {
  const branches = await ctx.repo.localBranches();
  const parents = await ctx.lineage.entries();
  const isPerennial = (branch: string) => ctx.lineage.isPerennial(branch);

  const depth = new Map<string, number>();
  for (const branch of branches) {
    depth.set(branch, walkAncestors(branch, parents, isPerennial).length);
  }

  return [...branches].sort((a, b) => {
    const byDepth = (depth.get(a) ?? 0) - (depth.get(b) ?? 0);
    if (byDepth !== 0) return byDepth;
    const byKind = Number(ctx.lineage.isFeatureBranch(a)) - Number(ctx.lineage.isFeatureBranch(b));
    return byKind !== 0 ? byKind : a.localeCompare(b);
  });
}
