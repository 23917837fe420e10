import type { HostingConfig } from "../core/config.js";

import type { HostingDriver } from "./driver.js";
import {
  GitHubDriver,
  createOctokitPullRequestsApi,
  resolveGitHubApiUrl,
  type PullRequestsApi,
} from "./github.js";
import { parseRemoteUrl, type RemoteLocation } from "./remote-url.js";

export type LoadHostingDriverInput = {
  remoteUrl: string | null;
  hosting: HostingConfig;
  env?: NodeJS.ProcessEnv;
  // Tests inject a fake API instead of building an Octokit client.
  createApi?: (location: RemoteLocation, token: string) => PullRequestsApi;
};

/**
 * Picks the driver for the repository's remote. Returns null when the remote is
 * not hosted on a supported service.
 */
export function loadHostingDriver(input: LoadHostingDriverInput): HostingDriver | null {
  if (!input.remoteUrl) return null;

  const parsed = parseRemoteUrl(input.remoteUrl);
  if (!parsed) return null;

  // origin_hostname maps SSH host aliases (e.g. "github-work") to the real host.
  const host = input.hosting.origin_hostname ?? parsed.host;
  const location: RemoteLocation = { ...parsed, host };
  const isGitHub = input.hosting.driver === "github" || host === "github.com";
  if (!isGitHub) return null;

  const env = input.env ?? process.env;
  const token = input.hosting.api_token ?? env.GITHUB_TOKEN;
  const createApi =
    input.createApi ??
    ((loc: RemoteLocation, apiToken: string) =>
      createOctokitPullRequestsApi({
        location: loc,
        token: apiToken,
        baseUrl: resolveGitHubApiUrl(loc.host, input.hosting.api_url),
        timeoutMs: input.hosting.timeout_ms,
      }));

  return new GitHubDriver({
    location,
    api: token ? createApi(location, token) : null,
  });
}
