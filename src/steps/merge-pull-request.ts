import { HostingServiceError } from "../core/errors.js";

import type { SerializedStep } from "./serialization.js";
import { BaseStep, type StepContext } from "./step.js";

export type MergePullRequestStepOptions = {
  branch: string;
  parentBranch: string;
  commitMessage: string;
  pullRequestNumber: number;
};

/**
 * Merges the branch's pull request through the hosting service, then fetches the
 * parent so the local remote-tracking ref includes the merge commit. Has no undo:
 * a merge on the hosting service cannot be taken back from here.
 */
export class MergePullRequest extends BaseStep {
  readonly type = "merge_pull_request";

  constructor(readonly options: MergePullRequestStepOptions) {
    super();
  }

  describe(): string {
    const number = this.options.pullRequestNumber > 0 ? ` #${this.options.pullRequestNumber}` : "";
    return `merge pull request${number} for ${this.options.branch} into ${this.options.parentBranch}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    if (!ctx.hosting) {
      throw new HostingServiceError(
        "No hosting service is configured for this repository's remote.",
      );
    }

    await ctx.hosting.mergePullRequest({
      branch: this.options.branch,
      parentBranch: this.options.parentBranch,
      commitMessage: this.options.commitMessage,
      pullRequestNumber: this.options.pullRequestNumber,
    });
    await ctx.repo.run(["fetch", ctx.repo.remote, this.options.parentBranch]);
  }

  toJSON(): SerializedStep {
    return {
      type: this.type,
      branch: this.options.branch,
      parent_branch: this.options.parentBranch,
      commit_message: this.options.commitMessage,
      pull_request_number: this.options.pullRequestNumber,
    };
  }
}
