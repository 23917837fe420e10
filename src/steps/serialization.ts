import { z } from "zod";

import { CheckoutBranch, CreateBranch, DeleteLocalBranch, ResetToSha } from "./branch-steps.js";
import { DeleteParentBranch, SetParentBranch } from "./lineage-steps.js";
import { MergePullRequest } from "./merge-pull-request.js";
import {
  AbortMerge,
  AbortRebase,
  ContinueMerge,
  ContinueRebase,
  MergeBranch,
  RebaseBranch,
} from "./merge-steps.js";
import {
  CreateRemoteBranch,
  CreateTrackingBranch,
  DeleteRemoteBranch,
  Fetch,
  PushBranch,
} from "./remote-steps.js";
import type { Step } from "./step.js";
import { SyncBranch } from "./sync-branch.js";
import { ChangeDirectory, RestoreOpenChanges, StashOpenChanges } from "./worktree-steps.js";

// =============================================================================
// SCHEMAS
// =============================================================================

const BranchName = z.string().min(1);
const Sha = z.string().min(1);

export const SerializedStepSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("abort_merge") }).strict(),
  z.object({ type: z.literal("abort_rebase") }).strict(),
  z.object({ type: z.literal("change_directory"), directory: z.string().min(1) }).strict(),
  z.object({ type: z.literal("checkout_branch"), branch: BranchName }).strict(),
  z.object({ type: z.literal("continue_merge") }).strict(),
  z.object({ type: z.literal("continue_rebase") }).strict(),
  z
    .object({ type: z.literal("create_branch"), branch: BranchName, starting_point: z.string().min(1) })
    .strict(),
  z.object({ type: z.literal("create_remote_branch"), branch: BranchName, sha: Sha }).strict(),
  z.object({ type: z.literal("create_tracking_branch"), branch: BranchName }).strict(),
  z.object({ type: z.literal("delete_local_branch"), branch: BranchName, force: z.boolean() }).strict(),
  z.object({ type: z.literal("delete_parent_branch"), branch: BranchName }).strict(),
  z.object({ type: z.literal("delete_remote_branch"), branch: BranchName }).strict(),
  z.object({ type: z.literal("fetch") }).strict(),
  z.object({ type: z.literal("merge_branch"), branch: BranchName }).strict(),
  z
    .object({
      type: z.literal("merge_pull_request"),
      branch: BranchName,
      parent_branch: BranchName,
      commit_message: z.string(),
      pull_request_number: z.number().int().nonnegative(),
    })
    .strict(),
  z.object({ type: z.literal("push_branch"), branch: BranchName, force: z.boolean() }).strict(),
  z.object({ type: z.literal("rebase_branch"), branch: BranchName }).strict(),
  z.object({ type: z.literal("reset_to_sha"), sha: Sha, hard: z.boolean() }).strict(),
  z.object({ type: z.literal("restore_open_changes") }).strict(),
  z.object({ type: z.literal("set_parent_branch"), branch: BranchName, parent: BranchName }).strict(),
  z.object({ type: z.literal("stash_open_changes") }).strict(),
  z.object({ type: z.literal("sync_branch"), branch: BranchName, push_after: z.boolean() }).strict(),
]);

export type SerializedStep = z.infer<typeof SerializedStepSchema>;
export type StepType = SerializedStep["type"];

// =============================================================================
// PUBLIC API
// =============================================================================

export function deserializeStep(data: SerializedStep): Step {
  switch (data.type) {
    case "abort_merge":
      return new AbortMerge();
    case "abort_rebase":
      return new AbortRebase();
    case "change_directory":
      return new ChangeDirectory(data.directory);
    case "checkout_branch":
      return new CheckoutBranch(data.branch);
    case "continue_merge":
      return new ContinueMerge();
    case "continue_rebase":
      return new ContinueRebase();
    case "create_branch":
      return new CreateBranch(data.branch, data.starting_point);
    case "create_remote_branch":
      return new CreateRemoteBranch(data.branch, data.sha);
    case "create_tracking_branch":
      return new CreateTrackingBranch(data.branch);
    case "delete_local_branch":
      return new DeleteLocalBranch(data.branch, data.force);
    case "delete_parent_branch":
      return new DeleteParentBranch(data.branch);
    case "delete_remote_branch":
      return new DeleteRemoteBranch(data.branch);
    case "fetch":
      return new Fetch();
    case "merge_branch":
      return new MergeBranch(data.branch);
    case "merge_pull_request":
      return new MergePullRequest({
        branch: data.branch,
        parentBranch: data.parent_branch,
        commitMessage: data.commit_message,
        pullRequestNumber: data.pull_request_number,
      });
    case "push_branch":
      return new PushBranch(data.branch, data.force);
    case "rebase_branch":
      return new RebaseBranch(data.branch);
    case "reset_to_sha":
      return new ResetToSha(data.sha, data.hard);
    case "restore_open_changes":
      return new RestoreOpenChanges();
    case "set_parent_branch":
      return new SetParentBranch(data.branch, data.parent);
    case "stash_open_changes":
      return new StashOpenChanges();
    case "sync_branch":
      return new SyncBranch(data.branch, data.push_after);
  }
}
