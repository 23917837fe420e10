/**
 * Pull request operations of a code hosting service, as consumed by the
 * MergePullRequest step and the ship workflow.
 */

export type PullRequestInfo = {
  canMergeWithAPI: boolean;
  defaultCommitMessage: string;
  pullRequestNumber: number;
};

export type MergePullRequestOptions = {
  branch: string;
  parentBranch: string;
  commitMessage: string;
  // 0 when unknown; the driver then looks the pull request up.
  pullRequestNumber: number;
};

export interface HostingDriver {
  readonly serviceName: string;
  readonly repositoryUrl: string;
  loadPullRequestInfo(branch: string, parentBranch: string): Promise<PullRequestInfo>;
  /** Merges the single open pull request for branch -> parent; returns the new commit SHA. */
  mergePullRequest(options: MergePullRequestOptions): Promise<string>;
}

export const NO_PULL_REQUEST_INFO: PullRequestInfo = {
  canMergeWithAPI: false,
  defaultCommitMessage: "",
  pullRequestNumber: 0,
};
