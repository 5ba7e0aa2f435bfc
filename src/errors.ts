export enum ErrorKind {
  /** Bad arguments or input files supplied by the user */
  USER_INPUT = "user_input",
  /** A single malformed record; the run continues without it */
  DATA = "data",
  /** Timezone database, filesystem or store failures */
  ENVIRONMENT = "environment",
}

export interface AppErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class AppError extends Error {
  public readonly kind: ErrorKind;
  public readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppError";
    this.kind = kind;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
