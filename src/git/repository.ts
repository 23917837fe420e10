/*
Purpose: per-run view of one working copy; memoizes the queries steps and builders repeat.
Assumptions: nothing else mutates the working copy while a run is active.
Usage: const repo = new Repository(new GitExecutor(cwd), { remote: "origin" });
*/

import path from "node:path";

import fse from "fs-extra";

import { splitLines } from "../core/utils.js";

import { ValueCache } from "./cache.js";
import type { CommandResult, ExecuteOptions, RepositoryExecutor } from "./git.js";

export type RepositoryOptions = {
  remote: string;
};

export class Repository {
  private readonly currentBranchCache = new ValueCache<string>();
  private readonly rootDirectoryCache = new ValueCache<string>();
  private readonly localBranchesCache = new ValueCache<string[]>();
  private readonly remotesCache = new ValueCache<string[]>();

  constructor(
    private readonly executor: RepositoryExecutor,
    private readonly options: RepositoryOptions,
  ) {}

  get remote(): string {
    return this.options.remote;
  }

  // ---------------------------------------------------------------------------
  // Command access
  // ---------------------------------------------------------------------------

  /** Runs a mutating git command, echoed to the command listener unless `silent`. */
  run(args: string[], opts: ExecuteOptions = {}): Promise<CommandResult> {
    return this.executor.execute(args, opts);
  }

  /** Runs a read-only git command (never echoed). */
  query(args: string[], opts: Omit<ExecuteOptions, "silent"> = {}): Promise<CommandResult> {
    return this.executor.execute(args, { ...opts, silent: true });
  }

  // ---------------------------------------------------------------------------
  // Working directory
  // ---------------------------------------------------------------------------

  workingDirectory(): string {
    return this.executor.cwd;
  }

  changeDirectory(dir: string): void {
    this.executor.setCwd(path.resolve(dir));
  }

  async rootDirectory(): Promise<string> {
    return this.rootDirectoryCache.getOrLoad(async () => {
      const res = await this.query(["rev-parse", "--show-toplevel"]);
      return path.resolve(res.stdout.trim());
    });
  }

  async hasOpenChanges(): Promise<boolean> {
    const res = await this.query(["status", "--porcelain", "--ignore-submodules"]);
    return res.stdout.trim().length > 0;
  }

  async hasConflicts(): Promise<boolean> {
    const res = await this.query(["diff", "--name-only", "--diff-filter=U"]);
    return res.stdout.trim().length > 0;
  }

  async isMergeInProgress(): Promise<boolean> {
    const res = await this.query(["rev-parse", "-q", "--verify", "MERGE_HEAD"], {
      allowExitCodes: [1],
    });
    return res.exitCode === 0;
  }

  async isRebaseInProgress(): Promise<boolean> {
    for (const marker of ["rebase-merge", "rebase-apply"]) {
      const res = await this.query(["rev-parse", "--git-path", marker]);
      const markerPath = path.resolve(this.workingDirectory(), res.stdout.trim());
      if (await fse.pathExists(markerPath)) return true;
    }
    return false;
  }

  // ---------------------------------------------------------------------------
  // Branches
  // ---------------------------------------------------------------------------

  async currentBranch(): Promise<string> {
    return this.currentBranchCache.getOrLoad(async () => {
      const res = await this.query(["rev-parse", "--abbrev-ref", "HEAD"]);
      return res.stdout.trim();
    });
  }

  /** Records a checkout performed by a step so the next read skips git. */
  noteCurrentBranch(branch: string): void {
    this.currentBranchCache.set(branch);
  }

  noteBranchesChanged(): void {
    this.localBranchesCache.invalidate();
  }

  async localBranches(): Promise<string[]> {
    return this.localBranchesCache.getOrLoad(async () => {
      const res = await this.query(["branch", "--format=%(refname:short)"]);
      return splitLines(res.stdout).sort();
    });
  }

  async hasLocalBranch(branch: string): Promise<boolean> {
    const branches = await this.localBranches();
    return branches.includes(branch);
  }

  async hasRemoteBranch(branch: string): Promise<boolean> {
    const res = await this.query(
      ["show-ref", "--verify", "--quiet", `refs/remotes/${this.remote}/${branch}`],
      { allowExitCodes: [1] },
    );
    return res.exitCode === 0;
  }

  async hasLocalOrRemoteBranch(branch: string): Promise<boolean> {
    if (await this.hasLocalBranch(branch)) return true;
    return this.hasRemoteBranch(branch);
  }

  trackingBranch(branch: string): string {
    return `${this.remote}/${branch}`;
  }

  async hasTrackingBranch(branch: string): Promise<boolean> {
    if (!(await this.hasRemote())) return false;
    return this.hasRemoteBranch(branch);
  }

  async shaForRef(ref: string): Promise<string> {
    const res = await this.query(["rev-parse", "--verify", `${ref}^{commit}`]);
    return res.stdout.trim();
  }

  // ---------------------------------------------------------------------------
  // Remotes
  // ---------------------------------------------------------------------------

  async remotes(): Promise<string[]> {
    return this.remotesCache.getOrLoad(async () => {
      const res = await this.query(["remote"]);
      return splitLines(res.stdout);
    });
  }

  async hasRemote(): Promise<boolean> {
    const remotes = await this.remotes();
    return remotes.includes(this.remote);
  }

  async remoteUrl(): Promise<string | null> {
    const res = await this.query(["config", "--get", `remote.${this.remote}.url`], {
      allowExitCodes: [1],
    });
    const url = res.stdout.trim();
    return res.exitCode === 0 && url.length > 0 ? url : null;
  }

  /** Lists the branch names on the remote itself, bypassing local tracking refs. */
  async remoteHasBranch(branch: string): Promise<boolean> {
    const res = await this.query(["ls-remote", "--heads", this.remote, branch]);
    return res.stdout.trim().length > 0;
  }

  async fetch(): Promise<void> {
    await this.run(["fetch", "--prune", "--tags", this.remote]);
  }
}
