import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { CheckoutBranch, CreateBranch, DeleteLocalBranch } from "../steps/branch-steps.js";
import { MergeBranch } from "../steps/merge-steps.js";

import { PersistenceError } from "./errors.js";
import { FileRunStateStore, loadRunState, saveRunState } from "./state-store.js";
import { createRunState, type RunState } from "./state.js";

afterEach(() => {
  vi.useRealTimers();
});

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "state-store-"));
}

function pausedSyncRun(): RunState {
  const state = createRunState({
    runId: "run-1",
    command: "sync",
    repoPath: "/repo",
    steps: [new CheckoutBranch("main")],
  });
  state.status = "paused";
  state.undoStepList = [new DeleteLocalBranch("feature", true)];
  state.pausedStep = new MergeBranch("main");
  state.pausedUndoStep = null;
  state.pausedReason = "CONFLICT (content): Merge conflict in file.txt";
  state.abortStepList = [...state.undoStepList];
  return state;
}

describe("state store", () => {
  it("persists state with atomic replace and updates timestamps", async () => {
    vi.useFakeTimers();
    const tmpDir = makeTempDir();
    const statePath = path.join(tmpDir, "state", "repo.json");

    try {
      const state = pausedSyncRun();

      vi.setSystemTime(new Date("2024-03-01T00:00:00Z"));
      await saveRunState(statePath, state);
      expect(state.updatedAt).toBe("2024-03-01T00:00:00.000Z");

      vi.setSystemTime(new Date("2024-03-01T00:10:00Z"));
      state.status = "running";
      await saveRunState(statePath, state);

      const loaded = await loadRunState(statePath);
      expect(loaded.status).toBe("running");
      expect(loaded.updatedAt).toBe("2024-03-01T00:10:00.000Z");

      const tmpFiles = fs
        .readdirSync(path.dirname(statePath))
        .filter((name) => name.includes(".tmp"));
      expect(tmpFiles).toHaveLength(0);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("round-trips every step list and the pause details", async () => {
    const tmpDir = makeTempDir();
    const statePath = path.join(tmpDir, "repo.json");

    try {
      await saveRunState(statePath, pausedSyncRun());
      const loaded = await loadRunState(statePath);

      expect(loaded.runId).toBe("run-1");
      expect(loaded.command).toBe("sync");
      expect(loaded.runStepList.map((step) => step.toJSON())).toEqual([
        { type: "checkout_branch", branch: "main" },
      ]);
      expect(loaded.undoStepList.map((step) => step.toJSON())).toEqual([
        { type: "delete_local_branch", branch: "feature", force: true },
      ]);
      expect(loaded.abortStepList.map((step) => step.describe())).toEqual([
        "delete local branch feature",
      ]);
      expect(loaded.pausedStep?.toJSON()).toEqual({ type: "merge_branch", branch: "main" });
      expect(loaded.pausedUndoStep).toBeNull();
      expect(loaded.pausedReason).toBe("CONFLICT (content): Merge conflict in file.txt");
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("writes the versioned snake_case layout", async () => {
    const tmpDir = makeTempDir();
    const statePath = path.join(tmpDir, "repo.json");

    try {
      const state = createRunState({
        runId: "run-2",
        command: "hack",
        repoPath: "/repo",
        steps: [new CreateBranch("feature", "main")],
      });
      await saveRunState(statePath, state);

      const raw: unknown = JSON.parse(fs.readFileSync(statePath, "utf8"));
      expect(raw).toMatchObject({
        version: 1,
        run_id: "run-2",
        command: "hack",
        repo_path: "/repo",
        status: "not_started",
        run_steps: [{ type: "create_branch", branch: "feature", starting_point: "main" }],
        undo_steps: [],
        abort_steps: [],
        paused_step: null,
      });
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("rejects files that are not valid JSON", async () => {
    const tmpDir = makeTempDir();
    const statePath = path.join(tmpDir, "repo.json");

    try {
      fs.writeFileSync(statePath, "{ not json");
      await expect(loadRunState(statePath)).rejects.toThrow(PersistenceError);
      await expect(loadRunState(statePath)).rejects.toThrow(
        `Run state at ${statePath} is not valid JSON`,
      );
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("rejects a different format version", async () => {
    const tmpDir = makeTempDir();
    const statePath = path.join(tmpDir, "repo.json");

    try {
      fs.writeFileSync(statePath, JSON.stringify({ version: 7, run_id: "x" }));
      await expect(loadRunState(statePath)).rejects.toThrow(
        `Run state at ${statePath} uses format version 7; this version of forkline reads version 1.`,
      );
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("rejects unknown step types", async () => {
    const tmpDir = makeTempDir();
    const statePath = path.join(tmpDir, "repo.json");

    try {
      await saveRunState(statePath, pausedSyncRun());
      const raw = JSON.parse(fs.readFileSync(statePath, "utf8"));
      raw.run_steps = [{ type: "teleport_branch", branch: "main" }];
      fs.writeFileSync(statePath, JSON.stringify(raw));

      const error = await loadRunState(statePath).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(PersistenceError);
      expect(String(error)).toContain(`Invalid run state at ${statePath} at run_steps.0.type`);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("treats a missing file as no run and clears idempotently", async () => {
    const tmpDir = makeTempDir();
    const store = new FileRunStateStore(path.join(tmpDir, "state", "repo.json"));

    try {
      expect(await store.load()).toBeNull();

      await store.save(pausedSyncRun());
      expect(await store.exists()).toBe(true);
      expect((await store.load())?.status).toBe("paused");

      await store.clear();
      await store.clear();
      expect(await store.exists()).toBe(false);
      expect(await store.load()).toBeNull();
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
