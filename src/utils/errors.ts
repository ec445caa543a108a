export type ErrorCode =
  | "VALIDATION"
  | "DOMAIN"
  | "STATE"
  | "CAPABILITY"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INTERNAL";

export class AppError extends Error {
  public readonly code: ErrorCode;
  public details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.details = details;
  }
}

/** Argument absent or of the wrong shape, or a structural constraint violated. */
export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALIDATION", message, details);
    this.name = "ValidationError";
  }
}

/** A string or number outside the set of values the host knows. */
export class DomainError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("DOMAIN", message, details);
    this.name = "DomainError";
  }
}

/** Host context the call needs is missing, e.g. no current page. */
export class StateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("STATE", message, details);
    this.name = "StateError";
  }
}

export class CapabilityError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("CAPABILITY", message, details);
    this.name = "CapabilityError";
  }
}

export function asAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError("INTERNAL", error.message);
  }

  // errors raised inside a script context come from another realm
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return new AppError("INTERNAL", error.message);
  }

  return new AppError("INTERNAL", "Unknown error");
}

export function conciseErrorText(error: unknown): string {
  const appError = asAppError(error);
  return `${appError.code}: ${appError.message}`;
}
