import { CheckoutBranch } from "./branch-steps.js";
import { MergeBranch, RebaseBranch } from "./merge-steps.js";
import { CreateTrackingBranch, PushBranch } from "./remote-steps.js";
import type { SerializedStep } from "./serialization.js";
import { BaseStep, type Step, type StepContext } from "./step.js";

/**
 * Brings one branch up to date with its tracking branch and parent. The
 * concrete steps depend on the repository at the time the sync runs (earlier
 * syncs and fetches change which refs exist), so they are produced as follow-up
 * steps instead of being fixed when the list is built.
 */
export class SyncBranch extends BaseStep {
  readonly type = "sync_branch";

  constructor(
    readonly branch: string,
    readonly pushAfter: boolean,
  ) {
    super();
  }

  describe(): string {
    return `sync ${this.branch}`;
  }

  protected async execute(ctx: StepContext): Promise<Step[]> {
    return syncBranchSteps(ctx, this.branch, this.pushAfter);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch, push_after: this.pushAfter };
  }
}

export async function syncBranchSteps(
  ctx: StepContext,
  branch: string,
  pushAfter: boolean,
): Promise<Step[]> {
  const { config, lineage, repo } = ctx;
  const online = !config.offline && (await repo.hasRemote());
  const hasTracking = await repo.hasTrackingBranch(branch);
  const tracking = repo.trackingBranch(branch);
  const steps: Step[] = [new CheckoutBranch(branch)];

  if (lineage.isPerennial(branch)) {
    if (hasTracking) {
      steps.push(
        config.pull_branch_strategy === "rebase"
          ? new RebaseBranch(tracking)
          : new MergeBranch(tracking),
      );
    }
    if (pushAfter && online && hasTracking) {
      steps.push(new PushBranch(branch, false));
    }
    return steps;
  }

  const rebase = config.sync_strategy === "rebase";
  const integrate = (ref: string): Step => (rebase ? new RebaseBranch(ref) : new MergeBranch(ref));

  if (hasTracking) {
    steps.push(integrate(tracking));
  }

  const parent = (await lineage.parentOf(branch)) ?? lineage.mainBranch;
  steps.push(integrate(parent));

  if (pushAfter && online) {
    steps.push(hasTracking ? new PushBranch(branch, rebase) : new CreateTrackingBranch(branch));
  }

  return steps;
}
