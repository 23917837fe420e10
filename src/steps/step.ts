/*
Purpose: the contract every workflow step implements, plus the base class the built-in steps share.
Assumptions: steps are immutable; anything they need from the repository is read at run time.
Usage: class CheckoutBranch extends BaseStep { ... }; runner calls run/undoStep/abortStep/continueStep.
*/

import type { ForklineConfig } from "../core/config.js";
import { ConflictError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import type { Lineage } from "../git/lineage.js";
import type { Repository } from "../git/repository.js";
import type { HostingDriver } from "../hosting/driver.js";

import type { SerializedStep, StepType } from "./serialization.js";

// =============================================================================
// TYPES
// =============================================================================

/** Everything a step may touch. Built once per process invocation. */
export type StepContext = {
  repo: Repository;
  lineage: Lineage;
  config: ForklineConfig;
  hosting: HostingDriver | null;
};

export type StepOutcome =
  | { status: "success"; followUp?: Step[] }
  | { status: "conflict"; reason: string }
  | { status: "fatal"; error: Error };

export interface Step {
  readonly type: StepType;
  describe(): string;
  run(ctx: StepContext): Promise<StepOutcome>;
  /** Inverse of this step, computed right before it runs. */
  undoStep(ctx: StepContext): Promise<Step | null>;
  /** Cleanup when the run is abandoned while this step is the active one. */
  abortStep(): Step | null;
  /** Resumes this step after a human resolved its conflict. */
  continueStep(): Step | null;
  toJSON(): SerializedStep;
}

// =============================================================================
// OUTCOMES
// =============================================================================

export function success(followUp?: Step[]): StepOutcome {
  return followUp && followUp.length > 0 ? { status: "success", followUp } : { status: "success" };
}

export function conflict(reason: string): StepOutcome {
  return { status: "conflict", reason };
}

export function fatal(error: unknown): StepOutcome {
  return {
    status: "fatal",
    error: error instanceof Error ? error : new Error(formatErrorMessage(error)),
  };
}

export function outcomeFromError(error: unknown): StepOutcome {
  if (error instanceof ConflictError) {
    return conflict(error.message);
  }
  return fatal(error);
}

// =============================================================================
// BASE CLASS
// =============================================================================

export abstract class BaseStep implements Step {
  abstract readonly type: StepType;

  abstract describe(): string;

  abstract toJSON(): SerializedStep;

  /** Performs the work; may return steps to run next. Throws ConflictError / GitError. */
  protected abstract execute(ctx: StepContext): Promise<Step[] | void>;

  async run(ctx: StepContext): Promise<StepOutcome> {
    try {
      const followUp = await this.execute(ctx);
      return success(Array.isArray(followUp) ? followUp : undefined);
    } catch (err) {
      return outcomeFromError(err);
    }
  }

  async undoStep(_ctx: StepContext): Promise<Step | null> {
    return null;
  }

  abortStep(): Step | null {
    return null;
  }

  continueStep(): Step | null {
    return null;
  }
}
