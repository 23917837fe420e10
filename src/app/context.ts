/**
 * AppContext bundles everything one CLI invocation needs: the repository view,
 * lineage, config, hosting driver, state store and run log.
 * Purpose: build the per-run collaborators once, without process-wide state.
 * Usage: const ctx = await loadAppContext({ cwd: process.cwd() }).
 */

import path from "node:path";

import type { ForklineConfig } from "../core/config.js";
import { loadForklineConfig } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { JsonlLogger } from "../core/logger.js";
import {
  createPathsContext,
  repoConfigPath,
  runLogPath,
  runStatePath,
  type PathsContext,
} from "../core/paths.js";
import { Runner } from "../core/runner.js";
import { FileRunStateStore } from "../core/state-store.js";
import { GitExecutor, type CommandListener, type RepositoryExecutor } from "../git/git.js";
import { Lineage } from "../git/lineage.js";
import { Repository } from "../git/repository.js";
import type { HostingDriver } from "../hosting/driver.js";
import { loadHostingDriver, type LoadHostingDriverInput } from "../hosting/load-driver.js";
import type { StepContext } from "../steps/step.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  repoRoot: string;
  configPath: string;
  config: ForklineConfig;
  paths: PathsContext;
  repo: Repository;
  lineage: Lineage;
  hosting: HostingDriver | null;
  store: FileRunStateStore;
  logger: JsonlLogger;
};

export type LoadAppContextArgs = {
  cwd?: string;
  explicitConfigPath?: string;
  forklineHome?: string;
  env?: NodeJS.ProcessEnv;
  onCommand?: CommandListener;
  createHostingApi?: LoadHostingDriverInput["createApi"];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export async function loadAppContext(args: LoadAppContextArgs = {}): Promise<AppContext> {
  const cwd = path.resolve(args.cwd ?? process.cwd());
  const executor = new GitExecutor(cwd, args.onCommand);
  const repoRoot = await resolveRepoRoot(executor);

  const configPath = args.explicitConfigPath
    ? path.resolve(args.explicitConfigPath)
    : repoConfigPath(repoRoot);
  const config = loadForklineConfig(configPath, { required: Boolean(args.explicitConfigPath) });

  const repo = new Repository(executor, { remote: config.remote });
  const lineage = new Lineage(repo, {
    mainBranch: config.main_branch,
    perennialBranches: config.perennial_branches,
  });
  const hosting = loadHostingDriver({
    remoteUrl: await repo.remoteUrl(),
    hosting: config.hosting,
    env: args.env,
    createApi: args.createHostingApi,
  });

  const paths = createPathsContext({ forklineHome: args.forklineHome });
  return {
    repoRoot,
    configPath,
    config,
    paths,
    repo,
    lineage,
    hosting,
    store: new FileRunStateStore(runStatePath(repoRoot, paths)),
    logger: new JsonlLogger(runLogPath(repoRoot, paths)),
  };
}

export function stepContextFor(ctx: AppContext): StepContext {
  return { repo: ctx.repo, lineage: ctx.lineage, config: ctx.config, hosting: ctx.hosting };
}

export function createRunner(ctx: AppContext): Runner {
  return new Runner({
    context: stepContextFor(ctx),
    store: ctx.store,
    repoPath: ctx.repoRoot,
    logger: ctx.logger,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function resolveRepoRoot(executor: RepositoryExecutor): Promise<string> {
  try {
    const res = await executor.execute(["rev-parse", "--show-toplevel"], { silent: true });
    return path.resolve(res.stdout.trim());
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Not a git repository.",
      message: `${executor.cwd} is not inside a git working copy: ${formatErrorMessage(err)}`,
      hint: "Run forkline from inside the repository you want to work on.",
      cause: err,
    });
  }
}
