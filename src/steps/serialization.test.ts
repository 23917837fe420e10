import { describe, expect, it } from "vitest";

import { PersistenceError } from "../core/errors.js";
import { deserializeRunState, RUN_STATE_VERSION } from "../core/state.js";

import { CreateBranch, DeleteLocalBranch } from "./branch-steps.js";
import { MergePullRequest } from "./merge-pull-request.js";
import { MergeBranch } from "./merge-steps.js";
import type { Step } from "./step.js";
import { SyncBranch } from "./sync-branch.js";

/** A persisted run whose remaining steps are `runSteps`, read back the way the store reads it. */
function loadRunSteps(runSteps: unknown[]): Step[] {
  const record = {
    version: RUN_STATE_VERSION,
    run_id: "run-1",
    command: "sync",
    repo_path: "/repo",
    status: "running",
    started_at: "2024-01-01T00:00:00.000Z",
    updated_at: "2024-01-01T00:00:00.000Z",
    run_steps: runSteps,
    undo_steps: [],
    abort_steps: [],
    paused_step: null,
    paused_undo_step: null,
    paused_reason: null,
  };
  return deserializeRunState(JSON.parse(JSON.stringify(record)), "state.json").runStepList;
}

describe("step serialization", () => {
  it("tags each step with a stable snake_case type", () => {
    expect(new CreateBranch("b", "main").toJSON()).toEqual({
      type: "create_branch",
      branch: "b",
      starting_point: "main",
    });
    expect(new SyncBranch("feature", true).toJSON()).toEqual({
      type: "sync_branch",
      branch: "feature",
      push_after: true,
    });
  });

  it("rebuilds steps from their JSON form", () => {
    const original = new MergePullRequest({
      branch: "feature",
      parentBranch: "main",
      commitMessage: "Add login (#7)\n\nDetails",
      pullRequestNumber: 7,
    });

    const [restored] = loadRunSteps([original.toJSON()]);

    expect(restored).toBeInstanceOf(MergePullRequest);
    expect(restored.toJSON()).toEqual(original.toJSON());
  });

  it("keeps abort and continue behavior after a round trip", () => {
    const [merge, deletion] = loadRunSteps([
      new MergeBranch("origin/feature").toJSON(),
      new DeleteLocalBranch("old", true).toJSON(),
    ]);

    expect(merge.abortStep()?.type).toBe("abort_merge");
    expect(merge.continueStep()?.type).toBe("continue_merge");
    expect(deletion.describe()).toBe("delete local branch old");
  });

  it("rejects unknown step types", () => {
    expect(() => loadRunSteps([{ type: "teleport_branch", branch: "x" }])).toThrow(
      PersistenceError,
    );
  });

  it("rejects records with missing or extra fields", () => {
    expect(() => loadRunSteps([{ type: "checkout_branch" }])).toThrow(
      "Invalid run state at state.json at run_steps.0.branch",
    );
    expect(() => loadRunSteps([{ type: "fetch", remote: "origin" }])).toThrow(PersistenceError);
  });
});
