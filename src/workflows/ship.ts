import { ConfigError } from "../core/errors.js";
import { CheckoutBranch, DeleteLocalBranch } from "../steps/branch-steps.js";
import { DeleteParentBranch, SetParentBranch } from "../steps/lineage-steps.js";
import { MergePullRequest } from "../steps/merge-pull-request.js";
import { DeleteRemoteBranch, Fetch } from "../steps/remote-steps.js";
import { StepList } from "../steps/step-list.js";
import type { StepContext } from "../steps/step.js";
import { SyncBranch } from "../steps/sync-branch.js";

import {
  WORKFLOW_WRAP_OPTIONS,
  ensureFeatureBranch,
  ensureLocalBranch,
  isOnline,
  requireParent,
  syncBranchSteps,
} from "./common.js";

export type ShipOptions = {
  // Defaults to the current branch.
  branch?: string;
  commitMessage?: string;
};

/**
 * Merges a feature branch's pull request through the hosting service, then
 * cleans up: updates the parent locally, deletes the branch everywhere and
 * moves its children onto the parent.
 */
export async function buildShipSteps(ctx: StepContext, opts: ShipOptions): Promise<StepList> {
  const initialBranch = await ctx.repo.currentBranch();
  const branch = opts.branch ?? initialBranch;

  await ensureLocalBranch(ctx, branch);
  ensureFeatureBranch(ctx, branch, "be shipped");
  const parent = await requireParent(ctx, branch);
  if (!ctx.lineage.isPerennial(parent)) {
    throw new ConfigError(
      `Shipping "${branch}" would ship "${parent}" as well. Ship "${parent}" first.`,
    );
  }

  const hosting = ctx.hosting;
  if (!hosting) {
    throw new ConfigError(
      "Shipping needs a hosting service. Configure hosting.driver (or hosting.origin_hostname) for this remote.",
    );
  }
  if (!(await isOnline(ctx))) {
    throw new ConfigError("Shipping needs the remote; it is missing or offline mode is enabled.");
  }

  const pullRequest = await hosting.loadPullRequestInfo(branch, parent);
  if (!pullRequest.canMergeWithAPI) {
    throw new ConfigError(
      `Cannot ship "${branch}": ${hosting.serviceName} has no single open pull request for it into "${parent}", or no API token is configured.`,
    );
  }

  const ancestors = await ctx.lineage.ancestorsOf(branch);
  const children = await ctx.lineage.childrenOf(branch);

  const steps = new StepList()
    .append(new Fetch())
    .appendList(syncBranchSteps([...ancestors, branch], true))
    .append(
      new MergePullRequest({
        branch,
        parentBranch: parent,
        commitMessage: opts.commitMessage ?? pullRequest.defaultCommitMessage,
        pullRequestNumber: pullRequest.pullRequestNumber,
      }),
    )
    .append(new SyncBranch(parent, false))
    .append(new DeleteRemoteBranch(branch))
    .append(new DeleteLocalBranch(branch, true));
  for (const child of children) {
    steps.append(new SetParentBranch(child, parent));
  }
  steps
    .append(new DeleteParentBranch(branch))
    .append(new CheckoutBranch(initialBranch === branch ? parent : initialBranch));

  await steps.wrap(WORKFLOW_WRAP_OPTIONS, ctx.repo);
  return steps;
}
