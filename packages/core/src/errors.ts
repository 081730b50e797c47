/**
 * Error taxonomy for provisioning operations.
 *
 * Components report expected failures as result objects; these classes are
 * thrown for conditions that cross a component boundary and are caught one
 * layer up.
 */

export enum ProvisioningErrorType {
  VALIDATION = "VALIDATION",
  NOT_FOUND = "NOT_FOUND",
  INTERNAL = "INTERNAL",
}

export class ProvisioningError extends Error {
  constructor(
    message: string,
    public readonly type: ProvisioningErrorType,
    public readonly suggestions: string[] = [],
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "ProvisioningError";
  }
}

/** Missing field, unsupported combination or inconsistent configuration. */
export class ValidationError extends ProvisioningError {
  constructor(message: string, suggestions: string[] = []) {
    super(message, ProvisioningErrorType.VALIDATION, suggestions);
    this.name = "ValidationError";
  }
}

/** Unknown template or provider key. */
export class NotFoundError extends ProvisioningError {
  constructor(message: string, suggestions: string[] = []) {
    super(message, ProvisioningErrorType.NOT_FOUND, suggestions);
    this.name = "NotFoundError";
  }
}

/**
 * Unexpected failure. The message is the generic one shown to callers; the
 * cause is kept for logging only.
 */
export class InternalError extends ProvisioningError {
  constructor(message: string, originalError?: Error) {
    super(message, ProvisioningErrorType.INTERNAL, [], originalError);
    this.name = "InternalError";
  }
}

export function isProvisioningError(error: unknown): error is ProvisioningError {
  return error instanceof ProvisioningError;
}

/**
 * Expected errors are those whose message is safe to hand back to the caller.
 */
export function isExpectedError(error: unknown): error is ValidationError | NotFoundError {
  return error instanceof ValidationError || error instanceof NotFoundError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
