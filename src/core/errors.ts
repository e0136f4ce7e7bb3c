export class JarscopeError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "JarscopeError";
  }
}

export class ConfigError extends JarscopeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class EngineError extends JarscopeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "EngineError";
  }
}

export class ExportError extends JarscopeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ExportError";
  }
}

export class TaskError extends JarscopeError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

export class TaskBusyError extends TaskError {
  constructor(public readonly activeTaskId: string) {
    super(`Task ${activeTaskId} is still running; wait for it to finish before starting another.`);
    this.name = "TaskBusyError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  engine: "ENGINE_ERROR",
  export: "EXPORT_ERROR",
  task: "TASK_ERROR",
  input: "INPUT_ERROR",
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

export class UserFacingError extends JarscopeError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
  }
}
