import path from "node:path";

import type { Repository } from "../git/repository.js";

import type { Step } from "./step.js";
import { ChangeDirectory, RestoreOpenChanges, StashOpenChanges } from "./worktree-steps.js";

export type WrapOptions = {
  runInRepoRoot: boolean;
  stashOpenChanges: boolean;
};

/** Ordered steps of one workflow. Insertion order is execution order. */
export class StepList {
  private readonly items: Step[];

  constructor(steps: Iterable<Step> = []) {
    this.items = [...steps];
  }

  get length(): number {
    return this.items.length;
  }

  get steps(): readonly Step[] {
    return this.items;
  }

  append(step: Step): this {
    this.items.push(step);
    return this;
  }

  appendList(list: StepList | readonly Step[]): this {
    const steps = list instanceof StepList ? list.steps : list;
    this.items.push(...steps);
    return this;
  }

  prepend(step: Step): this {
    this.items.unshift(step);
    return this;
  }

  toArray(): Step[] {
    return [...this.items];
  }

  /**
   * Brackets the list with a change to the repository root and, when the working
   * tree has uncommitted changes right now, with a stash / restore pair. The stash
   * bracket is outermost so changes are shelved before anything else runs.
   */
  async wrap(options: WrapOptions, repo: Repository): Promise<void> {
    if (options.runInRepoRoot) {
      const cwd = path.resolve(repo.workingDirectory());
      const root = await repo.rootDirectory();
      if (cwd !== root) {
        this.items.unshift(new ChangeDirectory(root));
        this.items.push(new ChangeDirectory(cwd));
      }
    }

    if (options.stashOpenChanges && (await repo.hasOpenChanges())) {
      this.items.unshift(new StashOpenChanges());
      this.items.push(new RestoreOpenChanges());
    }
  }
}
