import { afterEach, describe, expect, it } from "vitest";

import {
  createStepContext,
  createTempGitRepo,
  type TempGitRepo,
} from "../__tests__/helpers/temp-git-repo.js";
import { createTestRunner } from "../__tests__/helpers/test-runner.js";
import { ConfigError } from "../core/errors.js";

import { buildHackSteps } from "./hack.js";

describe("buildHackSteps", () => {
  let temp: TempGitRepo | null = null;

  afterEach(async () => {
    await temp?.cleanup();
    temp = null;
  });

  it("syncs main, then creates and checks out the new branch", async () => {
    temp = await createTempGitRepo();
    const ctx = createStepContext(temp.repoDir);

    const steps = await buildHackSteps(ctx, { branch: "feature" });

    expect(steps.steps.map((step) => step.describe())).toEqual([
      "sync main",
      "create branch feature from main",
      "set the parent of feature to main",
      "check out feature",
    ]);

    const outcome = await createTestRunner(ctx, temp.repoDir).run("hack", steps);

    expect(outcome.status).toBe("finished");
    expect(await temp.currentBranch()).toBe("feature");
    expect(await ctx.lineage.parentOf("feature")).toBe("main");
  });

  it("refuses a branch name that is taken", async () => {
    temp = await createTempGitRepo();
    const ctx = createStepContext(temp.repoDir);

    await expect(buildHackSteps(ctx, { branch: "main" })).rejects.toThrow(ConfigError);
    await expect(buildHackSteps(ctx, { branch: "main" })).rejects.toThrow(
      'A branch named "main" already exists.',
    );
  });

  it("carries uncommitted changes over to the new branch", async () => {
    temp = await createTempGitRepo();
    await temp.writeFile("notes.txt", "draft\n");
    const ctx = createStepContext(temp.repoDir);

    const steps = await buildHackSteps(ctx, { branch: "feature" });
    const descriptions = steps.steps.map((step) => step.describe());
    expect(descriptions[0]).toBe("stash uncommitted changes");
    expect(descriptions[descriptions.length - 1]).toBe("restore stashed changes");

    await createTestRunner(ctx, temp.repoDir).run("hack", steps);

    expect(await temp.currentBranch()).toBe("feature");
    expect(await temp.readFile("notes.txt")).toBe("draft\n");
    expect(await temp.git(["stash", "list"])).toBe("");
  });

  it("pushes the new branch when push_new_branches is set", async () => {
    temp = await createTempGitRepo({ withOrigin: true });
    const ctx = createStepContext(temp.repoDir, { config: { push_new_branches: true } });

    const steps = await buildHackSteps(ctx, { branch: "feature" });
    expect(steps.steps.map((step) => step.describe())).toContain("push feature and track it");

    const outcome = await createTestRunner(ctx, temp.repoDir).run("hack", steps);

    expect(outcome.status).toBe("finished");
    expect(await temp.git(["ls-remote", "--heads", "origin", "feature"])).toContain(
      "refs/heads/feature",
    );
  });

  it("stays local while offline", async () => {
    temp = await createTempGitRepo({ withOrigin: true });
    const ctx = createStepContext(temp.repoDir, {
      config: { push_new_branches: true, offline: true },
    });

    const steps = await buildHackSteps(ctx, { branch: "feature" });

    expect(steps.steps.map((step) => step.describe())).not.toContain("push feature and track it");
  });
});
