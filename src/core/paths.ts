import { createHash } from "node:crypto";
import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  forklineHome: string;
};

export type ResolveForklineHomeOptions = {
  forklineHome?: string;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveForklineHome(opts: ResolveForklineHomeOptions = {}): string {
  if (opts.forklineHome) {
    return path.resolve(opts.forklineHome);
  }

  if (process.env.FORKLINE_HOME) {
    return path.resolve(process.env.FORKLINE_HOME);
  }

  return path.join(os.homedir(), ".forkline");
}

export function createPathsContext(opts: ResolveForklineHomeOptions = {}): PathsContext {
  return { forklineHome: resolveForklineHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

/**
 * Stable file-name key for a repository: a readable slug of its absolute root path
 * plus a digest of that path, so roots that slug alike still get their own files.
 */
export function repoStateKey(repoRoot: string): string {
  const resolved = path.resolve(repoRoot);
  const slug = resolved.replace(/[^A-Za-z0-9]+/g, "-").replace(/^-+|-+$/g, "");
  const digest = createHash("sha256").update(resolved).digest("hex").slice(0, 12);
  return `${slug.length > 0 ? slug : "root"}-${digest}`;
}

export function stateDir(paths: PathsContext): string {
  return path.join(paths.forklineHome, "state");
}

export function runStatePath(repoRoot: string, paths: PathsContext): string {
  return path.join(stateDir(paths), `${repoStateKey(repoRoot)}.json`);
}

export function logsDir(paths: PathsContext): string {
  return path.join(paths.forklineHome, "logs");
}

export function runLogPath(repoRoot: string, paths: PathsContext): string {
  return path.join(logsDir(paths), `${repoStateKey(repoRoot)}.jsonl`);
}

export function repoConfigPath(repoRoot: string): string {
  return path.join(repoRoot, ".forkline", "config.yaml");
}
