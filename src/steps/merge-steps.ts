import { ConflictError } from "../core/errors.js";

import { ResetToSha } from "./branch-steps.js";
import type { SerializedStep } from "./serialization.js";
import { BaseStep, type Step, type StepContext } from "./step.js";

// =============================================================================
// MERGE
// =============================================================================

export class MergeBranch extends BaseStep {
  readonly type = "merge_branch";

  constructor(readonly branch: string) {
    super();
  }

  describe(): string {
    return `merge ${this.branch} into the current branch`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.run(["merge", "--no-edit", this.branch]);
  }

  async undoStep(ctx: StepContext): Promise<Step | null> {
    return new ResetToSha(await ctx.repo.shaForRef("HEAD"), true);
  }

  abortStep(): Step | null {
    return new AbortMerge();
  }

  continueStep(): Step | null {
    return new ContinueMerge();
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch };
  }
}

export class AbortMerge extends BaseStep {
  readonly type = "abort_merge";

  describe(): string {
    return "abort the merge in progress";
  }

  protected async execute(ctx: StepContext): Promise<void> {
    if (!(await ctx.repo.isMergeInProgress())) return;
    await ctx.repo.run(["merge", "--abort"]);
  }

  toJSON(): SerializedStep {
    return { type: this.type };
  }
}

export class ContinueMerge extends BaseStep {
  readonly type = "continue_merge";

  describe(): string {
    return "conclude the merge";
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ensureConflictsResolved(ctx);
    // Nothing left to do when the user already committed the resolution.
    if (await ctx.repo.isMergeInProgress()) {
      await ctx.repo.run(["commit", "--no-edit"]);
    }
  }

  toJSON(): SerializedStep {
    return { type: this.type };
  }
}

// =============================================================================
// REBASE
// =============================================================================

export class RebaseBranch extends BaseStep {
  readonly type = "rebase_branch";

  constructor(readonly branch: string) {
    super();
  }

  describe(): string {
    return `rebase the current branch onto ${this.branch}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.run(["rebase", this.branch]);
  }

  async undoStep(ctx: StepContext): Promise<Step | null> {
    return new ResetToSha(await ctx.repo.shaForRef("HEAD"), true);
  }

  abortStep(): Step | null {
    return new AbortRebase();
  }

  continueStep(): Step | null {
    return new ContinueRebase();
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch };
  }
}

export class AbortRebase extends BaseStep {
  readonly type = "abort_rebase";

  describe(): string {
    return "abort the rebase in progress";
  }

  protected async execute(ctx: StepContext): Promise<void> {
    if (!(await ctx.repo.isRebaseInProgress())) return;
    await ctx.repo.run(["rebase", "--abort"]);
  }

  toJSON(): SerializedStep {
    return { type: this.type };
  }
}

export class ContinueRebase extends BaseStep {
  readonly type = "continue_rebase";

  describe(): string {
    return "continue the rebase";
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ensureConflictsResolved(ctx);
    if (await ctx.repo.isRebaseInProgress()) {
      await ctx.repo.run(["-c", "core.editor=true", "rebase", "--continue"]);
    }
  }

  toJSON(): SerializedStep {
    return { type: this.type };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

async function ensureConflictsResolved(ctx: StepContext): Promise<void> {
  if (await ctx.repo.hasConflicts()) {
    throw new ConflictError(
      "There are still unresolved conflicts. Resolve them and stage the files before continuing.",
    );
  }
}
