import { ConfigError } from "../core/errors.js";
import { SyncBranch } from "../steps/sync-branch.js";
import type { StepContext } from "../steps/step.js";
import type { WrapOptions } from "../steps/step-list.js";

/** Every branch-changing workflow runs from the repository root with open changes stashed. */
export const WORKFLOW_WRAP_OPTIONS: WrapOptions = {
  runInRepoRoot: true,
  stashOpenChanges: true,
};

export async function isOnline(ctx: StepContext): Promise<boolean> {
  return !ctx.config.offline && (await ctx.repo.hasRemote());
}

/** Fetches while the step list is being built so remote-branch checks see current refs. */
export async function fetchIfOnline(ctx: StepContext): Promise<boolean> {
  const online = await isOnline(ctx);
  if (online) {
    await ctx.repo.fetch();
  }
  return online;
}

export async function ensureBranchIsNew(ctx: StepContext, branch: string): Promise<void> {
  if (await ctx.repo.hasLocalOrRemoteBranch(branch)) {
    throw new ConfigError(`A branch named "${branch}" already exists.`);
  }
}

export async function ensureLocalBranch(ctx: StepContext, branch: string): Promise<void> {
  if (!(await ctx.repo.hasLocalBranch(branch))) {
    throw new ConfigError(`There is no local branch named "${branch}".`);
  }
}

export function ensureFeatureBranch(ctx: StepContext, branch: string, action: string): void {
  if (!ctx.lineage.isFeatureBranch(branch)) {
    throw new ConfigError(
      `The branch "${branch}" is not a feature branch. Only feature branches can ${action}.`,
    );
  }
}

export async function requireParent(ctx: StepContext, branch: string): Promise<string> {
  const parent = await ctx.lineage.parentOf(branch);
  if (!parent) {
    throw new ConfigError(
      `The parent of "${branch}" is unknown. Record it with "forkline set-parent <parent> ${branch}".`,
    );
  }
  return parent;
}

export function syncBranchSteps(branches: string[], pushAfter: boolean): SyncBranch[] {
  return branches.map((branch) => new SyncBranch(branch, pushAfter));
}
