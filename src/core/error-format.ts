/*
Purpose: turn arbitrary errors into ordered display lines for the CLI and log warnings.
Assumptions: UserFacingError carries title/hint/next; anything else is shown by message.
Usage: formatErrorLines(err, { mode: "debug" }).
*/

import { UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "green" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const DEFAULT_TITLE = "Command failed.";

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  green: [32, 39],
  dim: [2, 22],
  bold: [1, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Last `--debug` / `--no-debug` before `--`; undefined when neither appears. */
export function resolveDebugFlagFromArgv(argv: readonly string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: DEFAULT_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (error instanceof UserFacingError) {
    lines.push({ kind: "code", text: error.code });
  }
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!options.stream.isTTY) return false;
  if (options.useColor !== undefined) return options.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveCause(error: unknown): unknown {
  if (!error || typeof error !== "object" || !("cause" in error)) {
    return undefined;
  }

  const cause: unknown = error.cause;
  if (cause === undefined || cause === null) return undefined;
  if (cause instanceof Error) return cause;
  return undefined;
}
