import type { SerializedStep } from "./serialization.js";
import { BaseStep, type Step, type StepContext } from "./step.js";

export class ChangeDirectory extends BaseStep {
  readonly type = "change_directory";

  constructor(readonly directory: string) {
    super();
  }

  describe(): string {
    return `change directory to ${this.directory}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    ctx.repo.changeDirectory(this.directory);
  }

  async undoStep(ctx: StepContext): Promise<Step | null> {
    const previous = ctx.repo.workingDirectory();
    return previous === this.directory ? null : new ChangeDirectory(previous);
  }

  toJSON(): SerializedStep {
    return { type: this.type, directory: this.directory };
  }
}

export class StashOpenChanges extends BaseStep {
  readonly type = "stash_open_changes";

  describe(): string {
    return "stash uncommitted changes";
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.run(["add", "-A"]);
    await ctx.repo.run(["stash"]);
  }

  async undoStep(): Promise<Step | null> {
    return new RestoreOpenChanges();
  }

  toJSON(): SerializedStep {
    return { type: this.type };
  }
}

export class RestoreOpenChanges extends BaseStep {
  readonly type = "restore_open_changes";

  describe(): string {
    return "restore stashed changes";
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.run(["stash", "pop"]);
  }

  async undoStep(): Promise<Step | null> {
    return new StashOpenChanges();
  }

  toJSON(): SerializedStep {
    return { type: this.type };
  }
}
