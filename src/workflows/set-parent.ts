import { ConfigError } from "../core/errors.js";
import { walkAncestors } from "../git/lineage.js";
import { SetParentBranch } from "../steps/lineage-steps.js";
import { StepList } from "../steps/step-list.js";
import type { StepContext } from "../steps/step.js";

import { ensureFeatureBranch, ensureLocalBranch } from "./common.js";

export type SetParentOptions = {
  parent: string;
  // Defaults to the current branch.
  branch?: string;
};

/** Records a new parent. Bookkeeping only, so the list is not wrapped. */
export async function buildSetParentSteps(
  ctx: StepContext,
  opts: SetParentOptions,
): Promise<StepList> {
  const branch = opts.branch ?? (await ctx.repo.currentBranch());
  ensureFeatureBranch(ctx, branch, "have parent branches");
  await ensureLocalBranch(ctx, opts.parent);
  if (opts.parent === branch) {
    throw new ConfigError(`"${branch}" cannot be its own parent.`);
  }

  const parents = new Map(await ctx.lineage.entries());
  parents.set(branch, opts.parent);
  // Throws ConfigError when the new edge closes a loop.
  walkAncestors(branch, parents, (name) => ctx.lineage.isPerennial(name));

  return new StepList([new SetParentBranch(branch, opts.parent)]);
}
