export type RemoteLocation = {
  host: string;
  owner: string;
  repo: string;
};

const SCP_LIKE = /^(?:[^@/]+@)?([^:/]+):(?!\/)(.+)$/;

/**
 * Parses the remote URL forms git accepts for hosted repositories:
 * `git@host:owner/repo.git`, `https://host/owner/repo(.git)`, `ssh://git@host[:port]/owner/repo.git`.
 */
export function parseRemoteUrl(url: string): RemoteLocation | null {
  const trimmed = url.trim();
  if (trimmed.length === 0) return null;

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    let parsed: URL;
    try {
      parsed = new URL(trimmed);
    } catch {
      return null;
    }
    return splitRepoPath(parsed.hostname, parsed.pathname);
  }

  const match = SCP_LIKE.exec(trimmed);
  if (!match) return null;
  return splitRepoPath(match[1], match[2]);
}

function splitRepoPath(host: string, repoPath: string): RemoteLocation | null {
  const segments = repoPath
    .replace(/\.git\/?$/, "")
    .split("/")
    .filter((segment) => segment.length > 0);
  if (host.length === 0 || segments.length < 2) return null;

  const repo = segments[segments.length - 1];
  const owner = segments.slice(0, -1).join("/");
  return { host: host.toLowerCase(), owner, repo };
}
