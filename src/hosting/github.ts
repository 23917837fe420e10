import { Octokit } from "@octokit/rest";

import { HostingServiceError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";

import {
  NO_PULL_REQUEST_INFO,
  type HostingDriver,
  type MergePullRequestOptions,
  type PullRequestInfo,
} from "./driver.js";
import type { RemoteLocation } from "./remote-url.js";

// =============================================================================
// TYPES
// =============================================================================

export type PullRequestSummary = {
  number: number;
  title: string;
};

export type PullRequestQuery = {
  base?: string;
  head?: string;
};

/** The slice of the GitHub pulls API the driver needs. */
export interface PullRequestsApi {
  listOpen(query: PullRequestQuery): Promise<PullRequestSummary[]>;
  merge(args: { number: number; title: string; message: string }): Promise<string>;
  updateBase(number: number, base: string): Promise<void>;
}

export type GitHubDriverOptions = {
  location: RemoteLocation;
  // Null when no API token is configured; merging via API is then unavailable.
  api: PullRequestsApi | null;
};

// =============================================================================
// OCTOKIT ADAPTER
// =============================================================================

export function createOctokitPullRequestsApi(opts: {
  location: RemoteLocation;
  token: string;
  baseUrl: string;
  timeoutMs: number;
}): PullRequestsApi {
  const octokit = new Octokit({ auth: opts.token, baseUrl: opts.baseUrl });
  const { owner, repo } = opts.location;
  const request = () => ({ signal: AbortSignal.timeout(opts.timeoutMs) });

  return {
    async listOpen(query) {
      const res = await octokit.rest.pulls.list({
        owner,
        repo,
        state: "open",
        base: query.base,
        head: query.head,
        request: request(),
      });
      return res.data.map((pr) => ({ number: pr.number, title: pr.title }));
    },
    async merge(args) {
      const res = await octokit.rest.pulls.merge({
        owner,
        repo,
        pull_number: args.number,
        commit_title: args.title,
        commit_message: args.message,
        merge_method: "squash",
        request: request(),
      });
      return res.data.sha;
    },
    async updateBase(number, base) {
      await octokit.rest.pulls.update({
        owner,
        repo,
        pull_number: number,
        base,
        request: request(),
      });
    },
  };
}

export function resolveGitHubApiUrl(host: string, configuredUrl?: string): string {
  if (configuredUrl) return configuredUrl.replace(/\/+$/, "");
  if (host === "github.com") return "https://api.github.com";
  return `https://${host}/api/v3`;
}

// =============================================================================
// DRIVER
// =============================================================================

export class GitHubDriver implements HostingDriver {
  readonly serviceName = "GitHub";

  constructor(private readonly options: GitHubDriverOptions) {}

  get repositoryUrl(): string {
    const { host, owner, repo } = this.options.location;
    return `https://${host}/${owner}/${repo}`;
  }

  async loadPullRequestInfo(branch: string, parentBranch: string): Promise<PullRequestInfo> {
    const api = this.options.api;
    if (!api) {
      return NO_PULL_REQUEST_INFO;
    }

    const pullRequests = await this.callApi(`list pull requests for ${branch}`, () =>
      api.listOpen({ base: parentBranch, head: this.headRef(branch) }),
    );
    if (pullRequests.length !== 1) {
      return NO_PULL_REQUEST_INFO;
    }

    const [pullRequest] = pullRequests;
    return {
      canMergeWithAPI: true,
      defaultCommitMessage: `${pullRequest.title} (#${pullRequest.number})`,
      pullRequestNumber: pullRequest.number,
    };
  }

  async mergePullRequest(options: MergePullRequestOptions): Promise<string> {
    const api = this.options.api;
    if (!api) {
      throw new HostingServiceError(
        `Cannot merge via ${this.serviceName}: no API token is configured.`,
      );
    }

    const pullRequestNumber = await this.resolvePullRequestToMerge(api, options);
    const children = await this.callApi(`list pull requests based on ${options.branch}`, () =>
      api.listOpen({ base: options.branch }),
    );

    const { title, message } = splitCommitMessage(options.commitMessage);
    const sha = await this.callApi(`merge pull request #${pullRequestNumber}`, () =>
      api.merge({ number: pullRequestNumber, title, message }),
    );

    for (const child of children) {
      await this.callApi(`retarget pull request #${child.number}`, () =>
        api.updateBase(child.number, options.parentBranch),
      );
    }

    return sha;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async resolvePullRequestToMerge(
    api: PullRequestsApi,
    options: MergePullRequestOptions,
  ): Promise<number> {
    const candidates = await this.callApi(`list pull requests for ${options.branch}`, () =>
      api.listOpen({ base: options.parentBranch, head: this.headRef(options.branch) }),
    );

    if (candidates.length === 0) {
      throw new HostingServiceError(
        `Cannot merge via ${this.serviceName}: there is no open pull request for ${options.branch} into ${options.parentBranch}.`,
      );
    }
    if (candidates.length > 1) {
      const numbers = candidates.map((pr) => `#${pr.number}`).join(", ");
      throw new HostingServiceError(
        `Cannot merge via ${this.serviceName}: multiple open pull requests for ${options.branch} into ${options.parentBranch} (${numbers}).`,
      );
    }

    const [candidate] = candidates;
    if (options.pullRequestNumber > 0 && candidate.number !== options.pullRequestNumber) {
      throw new HostingServiceError(
        `Cannot merge via ${this.serviceName}: expected pull request #${options.pullRequestNumber} but found #${candidate.number}.`,
      );
    }
    return candidate.number;
  }

  private headRef(branch: string): string {
    return `${this.options.location.owner}:${branch}`;
  }

  private async callApi<T>(action: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof HostingServiceError) throw err;
      throw new HostingServiceError(
        `${this.serviceName} API call failed (${action}): ${formatErrorMessage(err)}`,
        err,
      );
    }
  }
}

export function splitCommitMessage(commitMessage: string): { title: string; message: string } {
  const [title, ...rest] = commitMessage.split("\n");
  return { title, message: rest.join("\n") };
}
