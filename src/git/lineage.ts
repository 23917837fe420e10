import { ConfigError } from "../core/errors.js";
import { splitLines } from "../core/utils.js";

import type { Repository } from "./repository.js";

const LINEAGE_SECTION = "forkline-branch";

export type LineageOptions = {
  mainBranch: string;
  perennialBranches: string[];
};

/**
 * Branch hierarchy: an explicit branch -> parent mapping stored in the
 * repository's git config (`forkline-branch.<branch>.parent`).
 */
export class Lineage {
  constructor(
    private readonly repo: Repository,
    private readonly options: LineageOptions,
  ) {}

  get mainBranch(): string {
    return this.options.mainBranch;
  }

  isPerennial(branch: string): boolean {
    return branch === this.options.mainBranch || this.options.perennialBranches.includes(branch);
  }

  isFeatureBranch(branch: string): boolean {
    return !this.isPerennial(branch);
  }

  async parentOf(branch: string): Promise<string | null> {
    const res = await this.repo.query(["config", "--get", parentKey(branch)], {
      allowExitCodes: [1],
    });
    const parent = res.stdout.trim();
    return res.exitCode === 0 && parent.length > 0 ? parent : null;
  }

  async setParent(branch: string, parent: string): Promise<void> {
    await this.repo.run(["config", parentKey(branch), parent], { silent: true });
  }

  async removeParent(branch: string): Promise<void> {
    // Exit code 5: the key was not set.
    await this.repo.run(["config", "--unset", parentKey(branch)], {
      silent: true,
      allowExitCodes: [5],
    });
  }

  /** Every recorded branch -> parent pair. */
  async entries(): Promise<Map<string, string>> {
    const res = await this.repo.query(
      ["config", "--get-regexp", `^${LINEAGE_SECTION}\\..*\\.parent$`],
      { allowExitCodes: [1] },
    );
    const result = new Map<string, string>();
    for (const line of splitLines(res.stdout)) {
      const separator = line.indexOf(" ");
      if (separator === -1) continue;
      const key = line.slice(0, separator);
      const parent = line.slice(separator + 1).trim();
      const branch = key.slice(LINEAGE_SECTION.length + 1, key.length - ".parent".length);
      if (branch.length > 0 && parent.length > 0) {
        result.set(branch, parent);
      }
    }
    return result;
  }

  async childrenOf(branch: string): Promise<string[]> {
    const entries = await this.entries();
    return Array.from(entries)
      .filter(([, parent]) => parent === branch)
      .map(([child]) => child)
      .sort();
  }

  /**
   * Ancestors of `branch`, oldest first. Perennial branches end the walk; a
   * branch seen twice means the recorded hierarchy loops.
   */
  async ancestorsOf(branch: string): Promise<string[]> {
    const entries = await this.entries();
    return walkAncestors(branch, entries, (name) => this.isPerennial(name));
  }
}

export function walkAncestors(
  branch: string,
  parents: ReadonlyMap<string, string>,
  isPerennial: (branch: string) => boolean,
): string[] {
  const chain: string[] = [];
  const seen = new Set<string>([branch]);
  let current = branch;

  while (!isPerennial(current)) {
    const parent = parents.get(current);
    if (!parent) break;
    if (seen.has(parent)) {
      const loop = [branch, ...chain, parent].join(" -> ");
      throw new ConfigError(`The branch hierarchy contains a cycle: ${loop}`);
    }
    seen.add(parent);
    chain.push(parent);
    current = parent;
  }

  return chain.reverse();
}

function parentKey(branch: string): string {
  return `${LINEAGE_SECTION}.${branch}.parent`;
}
