import { execa } from "execa";

import { ConflictError, GitError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export type ExecuteOptions = {
  // Query commands are not echoed through onCommand.
  silent?: boolean;
  // Non-zero exit codes that are answers rather than failures (e.g. `git config --get`).
  allowExitCodes?: number[];
};

export type CommandListener = (command: { args: string[]; cwd: string }) => void;

/**
 * Runs a single git command against the working copy. Throws ConflictError when
 * git stopped on conflicts and GitError for every other failure.
 */
export interface RepositoryExecutor {
  readonly cwd: string;
  setCwd(dir: string): void;
  execute(args: string[], opts?: ExecuteOptions): Promise<CommandResult>;
}

// =============================================================================
// CONFLICT DETECTION
// =============================================================================

export const CONFLICT_PATTERNS = [
  "conflict (",
  "automatic merge failed",
  "could not apply",
  "resolve all conflicts manually",
  "fix conflicts and then commit",
  "you have unmerged paths",
  "unmerged files",
  "needs merge",
  "you must edit all merge conflicts",
  "exiting because of an unresolved conflict",
] as const;

export function isConflictOutput(stdout: string, stderr: string): boolean {
  const output = `${stdout}\n${stderr}`.toLowerCase();
  return CONFLICT_PATTERNS.some((pattern) => output.includes(pattern));
}

// =============================================================================
// EXECUTOR
// =============================================================================

export class GitExecutor implements RepositoryExecutor {
  private cwdValue: string;

  constructor(
    cwd: string,
    private readonly onCommand?: CommandListener,
  ) {
    this.cwdValue = cwd;
  }

  get cwd(): string {
    return this.cwdValue;
  }

  setCwd(dir: string): void {
    this.cwdValue = dir;
  }

  async execute(args: string[], opts: ExecuteOptions = {}): Promise<CommandResult> {
    if (!opts.silent && this.onCommand) {
      this.onCommand({ args, cwd: this.cwdValue });
    }

    try {
      const res = await execa("git", args, {
        cwd: this.cwdValue,
        stdio: "pipe",
        // Conflict detection matches git's English output.
        env: { ...process.env, LC_ALL: "C", GIT_TERMINAL_PROMPT: "0" },
      });
      return { stdout: res.stdout, stderr: res.stderr, exitCode: res.exitCode };
    } catch (err) {
      const output = resolveExecaErrorOutput(err);
      const allowed = opts.allowExitCodes ?? [];
      if (output.exitCode !== null && allowed.includes(output.exitCode)) {
        return { stdout: output.stdout, stderr: output.stderr, exitCode: output.exitCode };
      }

      const detail = output.stderr.trim() || output.stdout.trim() || output.message;
      const message = `git ${args.join(" ")} failed (cwd=${this.cwdValue}): ${detail}`;
      const cause = { stdout: output.stdout, stderr: output.stderr, exitCode: output.exitCode };

      if (isConflictOutput(output.stdout, output.stderr)) {
        throw new ConflictError(message, cause);
      }
      throw new GitError(message, cause);
    }
  }
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

function resolveExecaErrorOutput(err: unknown): {
  stdout: string;
  stderr: string;
  message: string;
  exitCode: number | null;
} {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: "", message: String(err), exitCode: null };
  }

  const stdoutRaw = "stdout" in err ? err.stdout : undefined;
  const stderrRaw = "stderr" in err ? err.stderr : undefined;
  const exitCodeRaw = "exitCode" in err ? err.exitCode : undefined;
  const stdout = typeof stdoutRaw === "string" ? stdoutRaw : stdoutRaw ? String(stdoutRaw) : "";
  const stderr = typeof stderrRaw === "string" ? stderrRaw : stderrRaw ? String(stderrRaw) : "";
  const message = err instanceof Error ? err.message : String(err);
  const exitCode = typeof exitCodeRaw === "number" ? exitCodeRaw : null;

  return { stdout, stderr, message, exitCode };
}
