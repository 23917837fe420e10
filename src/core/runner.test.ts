import { beforeEach, describe, expect, it } from "vitest";

import { createStepContext } from "../__tests__/helpers/temp-git-repo.js";
import type { SerializedStep } from "../steps/serialization.js";
import { StepList } from "../steps/step-list.js";
import type { Step, StepOutcome } from "../steps/step.js";

import { ConfigError, GitError, PersistenceError } from "./errors.js";
import { Runner } from "./runner.js";
import type { RunStateStore } from "./state-store.js";
import type { RunState, RunStatus } from "./state.js";

// =============================================================================
// HELPERS
// =============================================================================

type Script = {
  outcomes?: StepOutcome[];
  undo?: Step | null;
  abort?: Step | null;
  continueWith?: Step | null;
  undoError?: Error;
};

/** Records its name when run and replays scripted outcomes (success once exhausted). */
class ScriptedStep implements Step {
  readonly type = "fetch";

  constructor(
    private readonly name: string,
    private readonly executed: string[],
    private readonly script: Script = {},
  ) {}

  describe(): string {
    return this.name;
  }

  async run(): Promise<StepOutcome> {
    this.executed.push(this.name);
    return this.script.outcomes?.shift() ?? { status: "success" };
  }

  async undoStep(): Promise<Step | null> {
    if (this.script.undoError) throw this.script.undoError;
    return this.script.undo ?? null;
  }

  abortStep(): Step | null {
    return this.script.abort ?? null;
  }

  continueStep(): Step | null {
    return this.script.continueWith ?? null;
  }

  toJSON(): SerializedStep {
    return { type: "fetch" };
  }
}

class MemoryStore implements RunStateStore {
  state: RunState | null = null;
  readonly saved: RunStatus[] = [];

  async load(): Promise<RunState | null> {
    return this.state;
  }

  async save(state: RunState): Promise<void> {
    this.state = state;
    this.saved.push(state.status);
  }

  async clear(): Promise<void> {
    this.state = null;
  }
}

const names = (steps: Step[]) => steps.map((step) => step.describe());

// =============================================================================
// TESTS
// =============================================================================

describe("Runner", () => {
  let executed: string[];
  let store: MemoryStore;
  let runner: Runner;

  const step = (name: string, script?: Script) => new ScriptedStep(name, executed, script);

  beforeEach(() => {
    executed = [];
    store = new MemoryStore();
    runner = new Runner({
      context: createStepContext("/tmp/forkline-runner-test"),
      store,
      repoPath: "/repo",
      createRunId: () => "run-1",
    });
  });

  it("runs every step in order and clears the state when finished", async () => {
    const outcome = await runner.run("hack", new StepList([step("a"), step("b"), step("c")]));

    expect(outcome).toEqual({ status: "finished", command: "hack" });
    expect(executed).toEqual(["a", "b", "c"]);
    expect(store.state).toBeNull();
    expect(store.saved).toEqual(["running", "running", "running", "running"]);
  });

  it("runs follow-up steps right after the step that produced them", async () => {
    const expanding = step("sync", { outcomes: [{ status: "success", followUp: [step("x"), step("y")] }] });

    await runner.run("sync", new StepList([expanding, step("last")]));

    expect(executed).toEqual(["sync", "x", "y", "last"]);
  });

  it("refuses to start while another run is persisted", async () => {
    await runner.run("sync", new StepList([step("a", { outcomes: [{ status: "conflict", reason: "merge" }] })]));
    executed.length = 0;

    await expect(runner.run("hack", new StepList([step("b")]))).rejects.toThrow(ConfigError);
    expect(executed).toEqual([]);
    expect(store.state?.command).toBe("sync");
  });

  it("pauses on a conflict with abort steps ahead of the accumulated undo steps", async () => {
    const conflicted = step("b", {
      outcomes: [{ status: "conflict", reason: "CONFLICT (content)" }],
      undo: step("undo b"),
      abort: step("abort b"),
    });

    const outcome = await runner.run(
      "sync",
      new StepList([step("a", { undo: step("undo a") }), conflicted, step("c")]),
    );

    expect(outcome).toEqual({
      status: "paused",
      command: "sync",
      step: "b",
      reason: "CONFLICT (content)",
      canSkip: true,
    });
    const state = store.state;
    expect(state?.status).toBe("paused");
    expect(state?.pausedStep?.describe()).toBe("b");
    expect(state?.pausedUndoStep?.describe()).toBe("undo b");
    expect(names(state?.undoStepList ?? [])).toEqual(["undo a"]);
    expect(names(state?.abortStepList ?? [])).toEqual(["abort b", "undo a"]);
    expect(names(state?.runStepList ?? [])).toEqual(["c"]);
  });

  it("rolls back with the failed step's abort step and the undo steps on a fatal error", async () => {
    const failure = new GitError("git push failed");
    const outcome = await runner.run(
      "hack",
      new StepList([
        step("a", { undo: step("undo a") }),
        step("b", { undo: step("undo b") }),
        step("c", { outcomes: [{ status: "fatal", error: failure }], abort: step("abort c") }),
        step("d"),
      ]),
    );

    expect(outcome).toEqual({
      status: "aborted",
      command: "hack",
      error: { step: "c", error: failure },
      abortFailures: [],
    });
    expect(executed).toEqual(["a", "b", "c", "abort c", "undo b", "undo a"]);
    expect(store.state).toBeNull();
  });

  it("reports rollback failures next to the original error", async () => {
    const undoFailure = new GitError("branch is checked out elsewhere");
    const outcome = await runner.run(
      "hack",
      new StepList([
        step("a", { undo: step("undo a") }),
        step("b", { undo: step("undo b", { outcomes: [{ status: "fatal", error: undoFailure }] }) }),
        step("c", { outcomes: [{ status: "fatal", error: new GitError("boom") }] }),
      ]),
    );

    expect(outcome.status).toBe("aborted");
    if (outcome.status === "aborted") {
      expect(outcome.abortFailures).toEqual([{ step: "undo b", error: undoFailure }]);
    }
    expect(executed).toEqual(["a", "b", "c", "undo b", "undo a"]);
    expect(store.state).toBeNull();
  });

  it("treats a failure to compute the undo step as fatal for that step", async () => {
    const outcome = await runner.run(
      "hack",
      new StepList([step("a", { undoError: new GitError("no such ref") }), step("b")]),
    );

    expect(outcome.status).toBe("aborted");
    expect(executed).toEqual([]);
  });

  describe("continue", () => {
    async function pauseOn(b: ScriptedStep): Promise<void> {
      await runner.run("sync", new StepList([step("a", { undo: step("undo a") }), b, step("c")]));
      executed.length = 0;
    }

    it("fails with ConfigError when nothing is paused", async () => {
      await expect(runner.continue()).rejects.toThrow(ConfigError);
      expect(executed).toEqual([]);
    });

    it("runs the continue step, keeps the paused step's undo, then resumes", async () => {
      await pauseOn(
        step("b", {
          outcomes: [{ status: "conflict", reason: "merge" }],
          undo: step("undo b"),
          continueWith: step("continue b"),
        }),
      );
      const seen: string[][] = [];
      const save = store.save.bind(store);
      store.save = async (state) => {
        seen.push(names(state.undoStepList));
        await save(state);
      };

      const outcome = await runner.continue();

      expect(outcome).toEqual({ status: "finished", command: "sync" });
      expect(executed).toEqual(["continue b", "c"]);
      expect(seen[0]).toEqual(["undo b", "undo a"]);
    });

    it("stays paused without touching the state when conflicts remain", async () => {
      await pauseOn(
        step("b", {
          outcomes: [{ status: "conflict", reason: "merge" }],
          continueWith: step("continue b", {
            outcomes: [{ status: "conflict", reason: "still conflicted" }],
          }),
        }),
      );
      const savesBefore = store.saved.length;

      const outcome = await runner.continue();

      expect(outcome).toEqual({
        status: "paused",
        command: "sync",
        step: "b",
        reason: "still conflicted",
        canSkip: false,
      });
      expect(store.saved.length).toBe(savesBefore);
      expect(store.state?.status).toBe("paused");
    });

    it("rolls back when the continue step fails", async () => {
      await pauseOn(
        step("b", {
          outcomes: [{ status: "conflict", reason: "merge" }],
          abort: step("abort b"),
          continueWith: step("continue b", {
            outcomes: [{ status: "fatal", error: new GitError("commit failed") }],
          }),
        }),
      );

      const outcome = await runner.continue();

      expect(outcome.status).toBe("aborted");
      expect(executed).toEqual(["continue b", "abort b", "undo a"]);
      expect(store.state).toBeNull();
    });
  });

  describe("abort", () => {
    it("runs the abort steps and clears the state", async () => {
      await runner.run(
        "sync",
        new StepList([
          step("a", { undo: step("undo a") }),
          step("b", { outcomes: [{ status: "conflict", reason: "merge" }], abort: step("abort b") }),
        ]),
      );
      executed.length = 0;

      const outcome = await runner.abort();

      expect(outcome).toEqual({ status: "aborted", command: "sync", error: null, abortFailures: [] });
      expect(executed).toEqual(["abort b", "undo a"]);
      expect(store.state).toBeNull();
    });

    it("fails with ConfigError when there is no run", async () => {
      await expect(runner.abort()).rejects.toThrow(ConfigError);
    });
  });

  describe("skip", () => {
    it("leaves the conflicted step through its abort step and resumes without its undo", async () => {
      await runner.run(
        "sync",
        new StepList([
          step("a", { undo: step("undo a") }),
          step("b", {
            outcomes: [{ status: "conflict", reason: "merge" }],
            undo: step("undo b"),
            abort: step("abort b"),
          }),
          step("c", { outcomes: [{ status: "conflict", reason: "again" }] }),
        ]),
      );
      executed.length = 0;

      const outcome = await runner.skip();

      expect(outcome.status).toBe("paused");
      expect(executed).toEqual(["abort b", "c"]);
      expect(names(store.state?.undoStepList ?? [])).toEqual(["undo a"]);
    });

    it("keeps the paused state when the step cannot be left", async () => {
      await runner.run(
        "sync",
        new StepList([
          step("b", {
            outcomes: [{ status: "conflict", reason: "merge" }],
            abort: step("abort b", { outcomes: [{ status: "fatal", error: new GitError("locked") }] }),
          }),
        ]),
      );

      await expect(runner.skip()).rejects.toThrow(GitError);
      expect(store.state?.status).toBe("paused");
      expect(store.state?.pausedStep?.describe()).toBe("b");
    });
  });

  it("summarizes and discards the persisted run", async () => {
    await runner.run(
      "sync",
      new StepList([step("a", { outcomes: [{ status: "conflict", reason: "merge" }] }), step("b")]),
    );

    const summary = await runner.status();
    expect(summary?.status).toBe("paused");
    expect(summary?.pausedStep).toBe("a");
    expect(summary?.remainingSteps).toEqual(["b"]);

    expect(await runner.discard()).toBe(true);
    expect(await runner.status()).toBeNull();
    expect(await runner.discard()).toBe(false);
  });

  it("refuses a persisted run that belongs to another repository root", async () => {
    await runner.run("hack", new StepList([step("a", { outcomes: [{ status: "conflict", reason: "merge" }] })]));
    executed.length = 0;

    const other = new Runner({
      context: createStepContext("/tmp/forkline-runner-test"),
      store,
      repoPath: "/other-repo",
    });

    await expect(other.status()).rejects.toThrow(PersistenceError);
    await expect(other.run("sync", new StepList([step("b")]))).rejects.toThrow(PersistenceError);
    await expect(other.continue()).rejects.toThrow(
      'The persisted "hack" run belongs to /repo, not /other-repo.',
    );
    await expect(other.abort()).rejects.toThrow(PersistenceError);
    expect(executed).toEqual([]);
    expect(store.state?.status).toBe("paused");
  });
});
