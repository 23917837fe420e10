export class ForklineError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ForklineError";
  }
}

export class ConfigError extends ForklineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends ForklineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

/** Git stopped with conflicts that a human can resolve. Never fatal on its own. */
export class ConflictError extends ForklineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConflictError";
  }
}

export class HostingServiceError extends ForklineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "HostingServiceError";
  }
}

export class PersistenceError extends ForklineError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "PersistenceError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  conflict: "CONFLICT",
  hosting: "HOSTING_ERROR",
  persistence: "PERSISTENCE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
