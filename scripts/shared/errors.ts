export type StudyErrorKind =
  | "transient_network"
  | "rate_limit"
  | "not_found"
  | "permanent"
  | "validation"
  | "resource_limit"
  | "scanner_failure"
  | "persistence"
  | "configuration";

export abstract class StudyError extends Error {
  abstract readonly kind: StudyErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientNetworkError extends StudyError {
  readonly kind = "transient_network";

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class RateLimitError extends StudyError {
  readonly kind = "rate_limit";

  constructor(
    message: string,
    readonly resetAt: Date | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NotFoundError extends StudyError {
  readonly kind = "not_found";
}

/** Any upstream failure that retrying will not fix (denied access, bad query, 4xx). */
export class PermanentRequestError extends StudyError {
  readonly kind = "permanent";

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ValidationError extends StudyError {
  readonly kind = "validation";

  constructor(
    message: string,
    readonly errors: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ResourceLimitExceeded extends StudyError {
  readonly kind = "resource_limit";

  constructor(
    message: string,
    readonly limit: number,
    readonly actual: number
  ) {
    super(message);
  }
}

export class ScannerFailure extends StudyError {
  readonly kind = "scanner_failure";
}

export class PersistenceError extends StudyError {
  readonly kind = "persistence";

  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ConfigurationError extends StudyError {
  readonly kind = "configuration";
}

export function isStudyError(error: unknown): error is StudyError {
  return error instanceof StudyError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}
