import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterAll } from "vitest";

// =============================================================================
// FORKLINE_HOME ISOLATION
// =============================================================================

// Run state and logs written by tests never land in the real home directory.
const forklineHome = fs.mkdtempSync(path.join(os.tmpdir(), "forkline-home-"));
process.env.FORKLINE_HOME = forklineHome;

// Git must not pick up the developer's global identity, hooks or editor.
process.env.GIT_CONFIG_NOSYSTEM = "1";
process.env.GIT_CONFIG_GLOBAL = os.devNull;
process.env.GIT_AUTHOR_NAME = "forkline-test";
process.env.GIT_AUTHOR_EMAIL = "forkline-test@example.com";
process.env.GIT_COMMITTER_NAME = "forkline-test";
process.env.GIT_COMMITTER_EMAIL = "forkline-test@example.com";
process.env.GIT_EDITOR = "true";

afterAll(() => {
  fs.rmSync(forklineHome, { recursive: true, force: true });
});
