export class FigbuildError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "FigbuildError";
  }
}

export class ConfigurationError extends FigbuildError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigurationError";
  }
}

export class IoError extends FigbuildError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "IoError";
  }
}

export class PoolExecutorError extends FigbuildError {
  constructor(
    message: string,
    public readonly command: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "PoolExecutorError";
  }
}

export class BuildCancelledError extends FigbuildError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "BuildCancelledError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  io: "IO_ERROR",
  compiler: "COMPILER_ERROR",
  cancelled: "CANCELLED",
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

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ConfigurationError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Invalid build configuration.",
      message: error.message,
      hint: "Check the source directory and command-line options, then rerun.",
      cause: error,
    });
  }

  if (error instanceof IoError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.io,
      title: "Filesystem operation failed.",
      message: error.message,
      hint: `Check permissions and free space for ${error.path}. Rerunning resumes where this run stopped.`,
      cause: error,
    });
  }

  if (error instanceof PoolExecutorError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.compiler,
      title: "Renderer could not be started.",
      message: error.message,
      hint: `Install ${error.command} or point --compiler at an executable on PATH.`,
      cause: error,
    });
  }

  if (error instanceof BuildCancelledError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.cancelled,
      title: "Build cancelled.",
      message: error.message,
      next: "Rerun the same command to compile the remaining units.",
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error.",
    message,
    hint: "Rerun with --debug for details.",
    cause: error,
  });
}
