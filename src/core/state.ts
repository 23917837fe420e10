import { z } from "zod";

import { deserializeStep, SerializedStepSchema } from "../steps/serialization.js";
import type { Step } from "../steps/step.js";

import { PersistenceError } from "./errors.js";
import { isoNow } from "./utils.js";

export const RUN_STATE_VERSION = 1;

export const RunStatusSchema = z.enum(["not_started", "running", "paused", "finished", "aborted"]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

/** On-disk shape of a run. Step lists hold serialized steps. */
export const RunStateFileSchema = z
  .object({
    version: z.literal(RUN_STATE_VERSION),
    run_id: z.string().min(1),
    command: z.string().min(1),
    repo_path: z.string().min(1),
    status: RunStatusSchema,
    started_at: z.string(),
    updated_at: z.string(),
    run_steps: z.array(SerializedStepSchema),
    undo_steps: z.array(SerializedStepSchema),
    abort_steps: z.array(SerializedStepSchema),
    paused_step: SerializedStepSchema.nullable(),
    paused_undo_step: SerializedStepSchema.nullable(),
    paused_reason: z.string().nullable(),
  })
  .strict();

export type RunStateFile = z.infer<typeof RunStateFileSchema>;

export type RunState = {
  runId: string;
  command: string;
  repoPath: string;
  status: RunStatus;
  startedAt: string;
  updatedAt: string;
  runStepList: Step[];
  // Newest first: executing it in order reverses the run.
  undoStepList: Step[];
  abortStepList: Step[];
  pausedStep: Step | null;
  // Undo of the paused step, captured before it ran; applied once it completes.
  pausedUndoStep: Step | null;
  pausedReason: string | null;
};

export type RunStateSummary = {
  runId: string;
  command: string;
  status: RunStatus;
  startedAt: string;
  updatedAt: string;
  pausedStep: string | null;
  pausedReason: string | null;
  remainingSteps: string[];
  undoSteps: string[];
};

export function createRunState(args: {
  runId: string;
  command: string;
  repoPath: string;
  steps: Step[];
}): RunState {
  const now = isoNow();
  return {
    runId: args.runId,
    command: args.command,
    repoPath: args.repoPath,
    status: "not_started",
    startedAt: now,
    updatedAt: now,
    runStepList: [...args.steps],
    undoStepList: [],
    abortStepList: [],
    pausedStep: null,
    pausedUndoStep: null,
    pausedReason: null,
  };
}

export function serializeRunState(state: RunState): RunStateFile {
  return {
    version: RUN_STATE_VERSION,
    run_id: state.runId,
    command: state.command,
    repo_path: state.repoPath,
    status: state.status,
    started_at: state.startedAt,
    updated_at: state.updatedAt,
    run_steps: state.runStepList.map((step) => step.toJSON()),
    undo_steps: state.undoStepList.map((step) => step.toJSON()),
    abort_steps: state.abortStepList.map((step) => step.toJSON()),
    paused_step: state.pausedStep ? state.pausedStep.toJSON() : null,
    paused_undo_step: state.pausedUndoStep ? state.pausedUndoStep.toJSON() : null,
    paused_reason: state.pausedReason,
  };
}

/** Rebuilds a run from its parsed JSON. `source` names the file in error messages. */
export function deserializeRunState(raw: unknown, source: string): RunState {
  if (typeof raw === "object" && raw !== null && "version" in raw) {
    if (raw.version !== RUN_STATE_VERSION) {
      throw new PersistenceError(
        `Run state at ${source} uses format version ${String(raw.version)}; this version of forkline reads version ${RUN_STATE_VERSION}.`,
      );
    }
  }

  const parsed = RunStateFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new PersistenceError(
      `Invalid run state at ${source}${where}: ${issue ? issue.message : "unknown issue"}`,
      parsed.error,
    );
  }

  const data = parsed.data;
  return {
    runId: data.run_id,
    command: data.command,
    repoPath: data.repo_path,
    status: data.status,
    startedAt: data.started_at,
    updatedAt: data.updated_at,
    runStepList: data.run_steps.map(deserializeStep),
    undoStepList: data.undo_steps.map(deserializeStep),
    abortStepList: data.abort_steps.map(deserializeStep),
    pausedStep: data.paused_step ? deserializeStep(data.paused_step) : null,
    pausedUndoStep: data.paused_undo_step ? deserializeStep(data.paused_undo_step) : null,
    pausedReason: data.paused_reason,
  };
}

export function summarizeRunState(state: RunState): RunStateSummary {
  return {
    runId: state.runId,
    command: state.command,
    status: state.status,
    startedAt: state.startedAt,
    updatedAt: state.updatedAt,
    pausedStep: state.pausedStep ? state.pausedStep.describe() : null,
    pausedReason: state.pausedReason,
    remainingSteps: state.runStepList.map((step) => step.describe()),
    undoSteps: state.undoStepList.map((step) => step.describe()),
  };
}
