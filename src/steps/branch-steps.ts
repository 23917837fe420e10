import type { SerializedStep } from "./serialization.js";
import { BaseStep, type Step, type StepContext } from "./step.js";

// What `rev-parse --abbrev-ref HEAD` prints when no branch is checked out.
const DETACHED_HEAD = "HEAD";

export class CreateBranch extends BaseStep {
  readonly type = "create_branch";

  constructor(
    readonly branch: string,
    readonly startingPoint: string,
  ) {
    super();
  }

  describe(): string {
    return `create branch ${this.branch} from ${this.startingPoint}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.run(["branch", this.branch, this.startingPoint]);
    ctx.repo.noteBranchesChanged();
  }

  async undoStep(): Promise<Step | null> {
    return new DeleteLocalBranch(this.branch, true);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch, starting_point: this.startingPoint };
  }
}

export class DeleteLocalBranch extends BaseStep {
  readonly type = "delete_local_branch";

  constructor(
    readonly branch: string,
    readonly force: boolean,
  ) {
    super();
  }

  describe(): string {
    return `delete local branch ${this.branch}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    await ctx.repo.run(["branch", this.force ? "-D" : "-d", this.branch]);
    ctx.repo.noteBranchesChanged();
  }

  async undoStep(ctx: StepContext): Promise<Step | null> {
    const sha = await ctx.repo.shaForRef(`refs/heads/${this.branch}`);
    return new CreateBranch(this.branch, sha);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch, force: this.force };
  }
}

export class CheckoutBranch extends BaseStep {
  readonly type = "checkout_branch";

  constructor(readonly branch: string) {
    super();
  }

  describe(): string {
    return `check out ${this.branch}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    if ((await ctx.repo.currentBranch()) === this.branch) {
      return;
    }
    await ctx.repo.run(["checkout", this.branch]);
    // Checking out a commit rather than a branch leaves HEAD detached.
    const onBranch = await ctx.repo.hasLocalBranch(this.branch);
    ctx.repo.noteCurrentBranch(onBranch ? this.branch : DETACHED_HEAD);
  }

  async undoStep(ctx: StepContext): Promise<Step | null> {
    const previous = await ctx.repo.currentBranch();
    if (previous === DETACHED_HEAD) {
      return new CheckoutBranch(await ctx.repo.shaForRef("HEAD"));
    }
    return previous === this.branch ? null : new CheckoutBranch(previous);
  }

  toJSON(): SerializedStep {
    return { type: this.type, branch: this.branch };
  }
}

export class ResetToSha extends BaseStep {
  readonly type = "reset_to_sha";

  constructor(
    readonly sha: string,
    readonly hard: boolean,
  ) {
    super();
  }

  describe(): string {
    return `reset the current branch to ${this.sha.slice(0, 7)}`;
  }

  protected async execute(ctx: StepContext): Promise<void> {
    const head = await ctx.repo.shaForRef("HEAD");
    if (head === this.sha) {
      return;
    }
    const args = this.hard ? ["reset", "--hard", this.sha] : ["reset", this.sha];
    await ctx.repo.run(args);
  }

  toJSON(): SerializedStep {
    return { type: this.type, sha: this.sha, hard: this.hard };
  }
}
