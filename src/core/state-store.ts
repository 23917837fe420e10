import { randomUUID } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

import fse from "fs-extra";

import { PersistenceError } from "./errors.js";
import { formatErrorMessage } from "./error-format.js";
import { deserializeRunState, serializeRunState, type RunState } from "./state.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

/** Durable, per-repository storage for the active run. */
export interface RunStateStore {
  load(): Promise<RunState | null>;
  save(state: RunState): Promise<void>;
  clear(): Promise<void>;
}

// =============================================================================
// FILE STORE
// =============================================================================

export class FileRunStateStore implements RunStateStore {
  constructor(public readonly statePath: string) {}

  async exists(): Promise<boolean> {
    return fse.pathExists(this.statePath);
  }

  async load(): Promise<RunState | null> {
    if (!(await this.exists())) return null;
    return loadRunState(this.statePath);
  }

  async save(state: RunState): Promise<void> {
    await saveRunState(this.statePath, state);
  }

  async clear(): Promise<void> {
    try {
      await fse.remove(this.statePath);
    } catch (err) {
      throw new PersistenceError(
        `Failed to remove run state at ${this.statePath}: ${formatErrorMessage(err)}`,
        err,
      );
    }
  }
}

// =============================================================================
// LOAD/SAVE
// =============================================================================

export async function loadRunState(statePath: string): Promise<RunState> {
  let raw: string;
  try {
    raw = await fse.readFile(statePath, "utf8");
  } catch (err) {
    throw new PersistenceError(
      `Failed to read run state at ${statePath}: ${formatErrorMessage(err)}`,
      err,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new PersistenceError(
      `Run state at ${statePath} is not valid JSON: ${formatErrorMessage(err)}`,
      err,
    );
  }

  return deserializeRunState(json, statePath);
}

/** Stamps `updatedAt` and replaces the file atomically. */
export async function saveRunState(statePath: string, state: RunState): Promise<void> {
  state.updatedAt = isoNow();
  const content = JSON.stringify(serializeRunState(state), null, 2) + "\n";

  try {
    await writeStateFile(statePath, content);
  } catch (err) {
    throw new PersistenceError(
      `Failed to write run state at ${statePath}: ${formatErrorMessage(err)}`,
      err,
    );
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function writeStateFile(statePath: string, content: string): Promise<void> {
  await fse.ensureDir(path.dirname(statePath));

  const tmpPath = `${statePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(content, "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, statePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}
