/*
Purpose: turn engine errors into user-facing ones and render them for the terminal.
Assumptions: stderr is the default stream; non-TTY output should disable color.
Usage: console.error(renderCliError(normalizeCliError(err), { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import {
  ConfigError,
  ConflictError,
  GitError,
  HostingServiceError,
  PersistenceError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
} from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// =============================================================================
// NORMALIZATION
// =============================================================================

export function normalizeCliError(error: unknown): unknown {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Cannot run this command.",
      message: error.message,
      hint: 'Run "forkline status" to see whether a run is in progress.',
      cause: error,
    });
  }

  if (error instanceof ConflictError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.conflict,
      title: "Unresolved conflicts.",
      message: error.message,
      next: 'Resolve the conflicts, stage the files, then run "forkline continue".',
      cause: error,
    });
  }

  if (error instanceof GitError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.git,
      title: "Git command failed.",
      message: error.message,
      cause: error,
    });
  }

  if (error instanceof HostingServiceError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.hosting,
      title: "Hosting service request failed.",
      message: error.message,
      hint: "Check hosting.api_token (or GITHUB_TOKEN) and your network connection.",
      cause: error,
    });
  }

  if (error instanceof PersistenceError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.persistence,
      title: "Run state unavailable.",
      message: error.message,
      hint: "The saved run cannot be resumed. Clean up the repository by hand if needed.",
      next: 'Run "forkline discard" to delete the saved run.',
      cause: error,
    });
  }

  return error;
}

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const lines = formatErrorLines(error, { mode });

  const stream = options.stream ?? process.stderr;
  const useColor = resolveColorEnabled({ stream, useColor: options.useColor });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
      return `${format("Code:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "name":
      return `${format("Name:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "cause":
      return `${format("Cause:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indentMultiline(line.text, 2), ["dim"])}`;
    default:
      return line.text;
  }
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
