/*
Purpose: executes a workflow's steps, pausing on conflicts and rolling back on fatal errors.
Assumptions: the runner has exclusive access to the working copy while a run is active;
the persisted state file doubles as the "run in progress" marker.
Usage: const outcome = await new Runner({ context, store, repoPath }).run("sync", steps);
*/

import path from "node:path";

import type { StepList } from "../steps/step-list.js";
import type { Step, StepContext, StepOutcome } from "../steps/step.js";
import { fatal } from "../steps/step.js";

import { ConfigError, ConflictError, GitError, PersistenceError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import { logRunEvent, type JsonlLogger } from "./logger.js";
import type { RunStateStore } from "./state-store.js";
import {
  createRunState,
  summarizeRunState,
  type RunState,
  type RunStateSummary,
  type RunStatus,
} from "./state.js";
import { defaultRunId } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type StepFailure = {
  step: string;
  error: Error;
};

export type RunOutcome =
  | { status: "finished"; command: string }
  | { status: "paused"; command: string; step: string; reason: string; canSkip: boolean }
  | {
      status: "aborted";
      command: string;
      // Null when the user aborted; otherwise the step failure that forced the abort.
      error: StepFailure | null;
      abortFailures: StepFailure[];
    };

export type RunnerOptions = {
  context: StepContext;
  store: RunStateStore;
  repoPath: string;
  logger?: JsonlLogger;
  createRunId?: () => string;
};

export const EXIT_CODES = {
  finished: 0,
  aborted: 1,
  paused: 2,
} as const;

export function exitCodeForOutcome(outcome: RunOutcome): number {
  return EXIT_CODES[outcome.status];
}

// =============================================================================
// RUNNER
// =============================================================================

export class Runner {
  private readonly ctx: StepContext;
  private readonly store: RunStateStore;

  constructor(private readonly options: RunnerOptions) {
    this.ctx = options.context;
    this.store = options.store;
  }

  /** Throws ConfigError while another run is persisted for this repository. */
  async ensureIdle(): Promise<void> {
    const existing = await this.loadOwnState();
    if (existing) {
      throw new ConfigError(
        `A "${existing.command}" run is already in progress for this repository (${existing.status}). ` +
          `Finish it with "forkline continue", "forkline skip" or "forkline abort" first.`,
      );
    }
  }

  async run(command: string, steps: StepList): Promise<RunOutcome> {
    await this.ensureIdle();

    const state = createRunState({
      runId: (this.options.createRunId ?? defaultRunId)(),
      command,
      repoPath: this.options.repoPath,
      steps: steps.toArray(),
    });
    state.status = "running";
    await this.store.save(state);
    this.log(state, "run.start", { command, steps: state.runStepList.length });

    return this.execute(state);
  }

  async continue(): Promise<RunOutcome> {
    const state = await this.requireState(["paused"], "continue");
    const paused = requirePausedStep(state);
    this.log(state, "run.continue", { step: paused.describe() });

    const continueStep = paused.continueStep();
    if (continueStep) {
      const outcome = await continueStep.run(this.ctx);
      if (outcome.status === "conflict") {
        // Still conflicted; the persisted state stays exactly as it was.
        this.log(state, "step.conflict", { step: continueStep.describe(), reason: outcome.reason });
        return this.pausedOutcome(state, paused, outcome.reason);
      }
      if (outcome.status === "fatal") {
        return this.abortAfterFatal(state, continueStep, outcome.error, state.abortStepList);
      }
      if (outcome.followUp) {
        state.runStepList.unshift(...outcome.followUp);
      }
    }

    if (state.pausedUndoStep) {
      state.undoStepList.unshift(state.pausedUndoStep);
    }
    this.resume(state);
    await this.store.save(state);

    return this.execute(state);
  }

  async abort(): Promise<RunOutcome> {
    const state = await this.requireState(["paused", "running"], "abort");
    this.log(state, "run.abort", { steps: state.abortStepList.length });

    const abortFailures = await this.runAbortSteps(state, state.abortStepList);
    return this.finishAborted(state, null, abortFailures);
  }

  async skip(): Promise<RunOutcome> {
    const state = await this.requireState(["paused"], "skip");
    const paused = requirePausedStep(state);

    const abortStep = paused.abortStep();
    if (abortStep) {
      const outcome = await abortStep.run(this.ctx);
      if (outcome.status !== "success") {
        const error = outcomeError(outcome);
        throw new GitError(
          `Could not skip "${paused.describe()}": ${abortStep.describe()} failed: ${error.message}`,
          error,
        );
      }
    }

    this.log(state, "run.skip", { step: paused.describe() });
    this.resume(state);
    await this.store.save(state);

    return this.execute(state);
  }

  async status(): Promise<RunStateSummary | null> {
    const state = await this.loadOwnState();
    return state ? summarizeRunState(state) : null;
  }

  /** Forgets the persisted run without executing anything. */
  async discard(): Promise<boolean> {
    const state = await this.store.load().catch((err: unknown) => {
      // A state file that no longer parses is exactly what discard is for.
      if (err instanceof PersistenceError) return null;
      throw err;
    });
    await this.store.clear();
    if (state) this.log(state, "run.discarded");
    return state !== null;
  }

  // ---------------------------------------------------------------------------
  // Main loop
  // ---------------------------------------------------------------------------

  private async execute(state: RunState): Promise<RunOutcome> {
    for (;;) {
      const step = state.runStepList.shift();
      if (!step) break;

      this.log(state, "step.start", { step: step.describe(), step_type: step.type });
      const { outcome, undo } = await this.attempt(step);

      if (outcome.status === "conflict") {
        this.log(state, "step.conflict", { step: step.describe(), reason: outcome.reason });
        return this.pause(state, step, undo, outcome.reason);
      }

      if (outcome.status === "fatal") {
        this.log(state, "step.fatal", { step: step.describe(), error: outcome.error.message });
        const abortSteps = withAbortStep(step, state.undoStepList);
        return this.abortAfterFatal(state, step, outcome.error, abortSteps);
      }

      if (undo) {
        state.undoStepList.unshift(undo);
      }
      if (outcome.followUp) {
        state.runStepList.unshift(...outcome.followUp);
      }
      state.abortStepList = [...state.undoStepList];
      await this.store.save(state);
      this.log(state, "step.success", {
        step: step.describe(),
        follow_up: outcome.followUp ? outcome.followUp.length : 0,
      });
    }

    state.status = "finished";
    await this.store.clear();
    this.log(state, "run.finished");
    return { status: "finished", command: state.command };
  }

  /** The undo step must be computed before the step changes the repository. */
  private async attempt(step: Step): Promise<{ outcome: StepOutcome; undo: Step | null }> {
    let undo: Step | null;
    try {
      undo = await step.undoStep(this.ctx);
    } catch (err) {
      return { outcome: fatal(err), undo: null };
    }
    return { outcome: await step.run(this.ctx), undo };
  }

  private async pause(
    state: RunState,
    step: Step,
    undo: Step | null,
    reason: string,
  ): Promise<RunOutcome> {
    state.status = "paused";
    state.pausedStep = step;
    state.pausedUndoStep = undo;
    state.pausedReason = reason;
    state.abortStepList = withAbortStep(step, state.undoStepList);
    await this.store.save(state);
    this.log(state, "run.paused", { step: step.describe() });
    return this.pausedOutcome(state, step, reason);
  }

  private pausedOutcome(state: RunState, step: Step, reason: string): RunOutcome {
    return {
      status: "paused",
      command: state.command,
      step: step.describe(),
      reason,
      canSkip: step.abortStep() !== null,
    };
  }

  private resume(state: RunState): void {
    state.status = "running";
    state.pausedStep = null;
    state.pausedUndoStep = null;
    state.pausedReason = null;
    state.abortStepList = [...state.undoStepList];
  }

  // ---------------------------------------------------------------------------
  // Abort
  // ---------------------------------------------------------------------------

  private async abortAfterFatal(
    state: RunState,
    step: Step,
    error: Error,
    abortSteps: Step[],
  ): Promise<RunOutcome> {
    const abortFailures = await this.runAbortSteps(state, abortSteps);
    return this.finishAborted(state, { step: step.describe(), error }, abortFailures);
  }

  /** Best effort: every step is attempted; failures are collected, never thrown. */
  private async runAbortSteps(state: RunState, steps: Step[]): Promise<StepFailure[]> {
    const failures: StepFailure[] = [];
    const queue = [...steps];

    for (;;) {
      const step = queue.shift();
      if (!step) break;

      const outcome = await step.run(this.ctx);
      if (outcome.status === "success") {
        if (outcome.followUp) queue.unshift(...outcome.followUp);
        continue;
      }

      const error = outcomeError(outcome);
      failures.push({ step: step.describe(), error });
      this.log(state, "abort.step_failed", { step: step.describe(), error: error.message });
    }

    return failures;
  }

  private async finishAborted(
    state: RunState,
    error: StepFailure | null,
    abortFailures: StepFailure[],
  ): Promise<RunOutcome> {
    state.status = "aborted";
    state.abortStepList = [];
    await this.store.clear();
    this.log(state, "run.aborted", {
      error: error ? formatErrorMessage(error.error) : null,
      abort_failures: abortFailures.length,
    });
    return { status: "aborted", command: state.command, error, abortFailures };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /** Loads the persisted run, refusing one recorded for a different repository root. */
  private async loadOwnState(): Promise<RunState | null> {
    const state = await this.store.load();
    if (state && path.resolve(state.repoPath) !== path.resolve(this.options.repoPath)) {
      throw new PersistenceError(
        `The persisted "${state.command}" run belongs to ${state.repoPath}, not ${this.options.repoPath}. ` +
          `Run "forkline discard" to forget it.`,
      );
    }
    return state;
  }

  private async requireState(allowed: RunStatus[], action: string): Promise<RunState> {
    const state = await this.loadOwnState();
    if (!state) {
      throw new ConfigError(`Nothing to ${action}: there is no forkline run in progress.`);
    }
    if (!allowed.includes(state.status)) {
      throw new ConfigError(
        `Cannot ${action}: the "${state.command}" run is ${state.status} (expected ${allowed.join(" or ")}).`,
      );
    }
    return state;
  }

  private log(state: RunState, type: string, fields: Record<string, string | number | null> = {}): void {
    logRunEvent(this.options.logger, state.runId, type, fields);
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function withAbortStep(step: Step, undoSteps: Step[]): Step[] {
  const abortStep = step.abortStep();
  return abortStep ? [abortStep, ...undoSteps] : [...undoSteps];
}

function requirePausedStep(state: RunState): Step {
  if (!state.pausedStep) {
    throw new PersistenceError(
      `The "${state.command}" run is marked paused but has no paused step recorded.`,
    );
  }
  return state.pausedStep;
}

function outcomeError(outcome: Exclude<StepOutcome, { status: "success" }>): Error {
  return outcome.status === "fatal" ? outcome.error : new ConflictError(outcome.reason);
}
