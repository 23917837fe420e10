import type { SerializedStep } from "./serialization.js";
import { BaseStep, type Step, type StepContext } from "./step.js";

export class Fetch extends BaseStep {
  readonly type = "fetch";

  describe(): string {
    return "fetch updates from the remote";
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.fetch();
  }

  toJSON(): SerializedStep {
    return { type: this.type };
  }
}

/** Pushes a local branch and makes the remote branch its upstream. */
export class CreateTrackingBranch extends BaseStep {
  readonly type = "create_tracking_branch";

  constructor(readonly branch: string) {
    super();
  }

  describe(): string {
    return `push ${this.branch} and track it`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.run(["push", "-u", ctx.repo.remote, this.branch]);
  }

  async undoStep(): Promise<Step | null> {
    return new DeleteRemoteBranch(this.branch);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch };
  }
}

export class CreateRemoteBranch extends BaseStep {
  readonly type = "create_remote_branch";

  constructor(
    readonly branch: string,
    readonly sha: string,
  ) {
    super();
  }

  describe(): string {
    return `create remote branch ${this.branch} at ${this.sha.slice(0, 7)}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.run(["push", ctx.repo.remote, `${this.sha}:refs/heads/${this.branch}`]);
  }

  async undoStep(): Promise<Step | null> {
    return new DeleteRemoteBranch(this.branch);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch, sha: this.sha };
  }
}

export class DeleteRemoteBranch extends BaseStep {
  readonly type = "delete_remote_branch";

  constructor(readonly branch: string) {
    super();
  }

  describe(): string {
    return `delete remote branch ${this.branch}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    // The hosting service may already have removed it (e.g. after a merge).
    if (!(await ctx.repo.remoteHasBranch(this.branch))) {
      return;
    }
    await ctx.repo.run(["push", ctx.repo.remote, `:${this.branch}`]);
  }

  async undoStep(ctx: StepContext): Promise<Step | null> {
    if (!(await ctx.repo.hasRemoteBranch(this.branch))) {
      return null;
    }
    const sha = await ctx.repo.shaForRef(ctx.repo.trackingBranch(this.branch));
    return new CreateRemoteBranch(this.branch, sha);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch };
  }
}

/** Pushes published work. Not undone: other clones may already have fetched it. */
export class PushBranch extends BaseStep {
  readonly type = "push_branch";

  constructor(
    readonly branch: string,
    readonly force: boolean,
  ) {
    super();
  }

  describe(): string {
    return this.force ? `force-push ${this.branch}` : `push ${this.branch}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    const args = ["push"];
    if (this.force) args.push("--force-with-lease");
    args.push(ctx.repo.remote, this.branch);
    await ctx.repo.run(args);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch, force: this.force };
  }
}
