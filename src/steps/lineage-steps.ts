import type { SerializedStep } from "./serialization.js";
import { BaseStep, type Step, type StepContext } from "./step.js";

/** Records `parent` as the parent of `branch`. Bookkeeping only; no git objects change. */
export class SetParentBranch extends BaseStep {
  readonly type = "set_parent_branch";

  constructor(
    readonly branch: string,
    readonly parent: string,
  ) {
    super();
  }

  describe(): string {
    return `set the parent of ${this.branch} to ${this.parent}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.lineage.setParent(this.branch, this.parent);
  }

  async undoStep(ctx: StepContext): Promise<Step | null> {
    const previous = await ctx.lineage.parentOf(this.branch);
    if (previous === null) {
      return new DeleteParentBranch(this.branch);
    }
    return previous === this.parent ? null : new SetParentBranch(this.branch, previous);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch, parent: this.parent };
  }
}

export class DeleteParentBranch extends BaseStep {
  readonly type = "delete_parent_branch";

  constructor(readonly branch: string) {
    super();
  }

  describe(): string {
    return `remove the recorded parent of ${this.branch}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.lineage.removeParent(this.branch);
  }

  async undoStep(ctx: StepContext): Promise<Step | null> {
    const previous = await ctx.lineage.parentOf(this.branch);
    return previous === null ? null : new SetParentBranch(this.branch, previous);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch };
  }
}
