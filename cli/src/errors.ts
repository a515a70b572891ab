/**
 * Error taxonomy for workflow operations
 */

export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(resource: string, id?: string | number) {
    super(
      id !== undefined
        ? `${resource} '${id}' not found`
        : `${resource} not found`
    );
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ValidationError";
    this.details = details;
  }
}

export class InvalidTransitionError extends Error {
  public statusCode = 422;
  public currentStatus?: string;
  public expectedStatus?: string;

  constructor(
    message: string,
    currentStatus?: string,
    expectedStatus?: string
  ) {
    super(message);
    this.name = "InvalidTransitionError";
    this.currentStatus = currentStatus;
    this.expectedStatus = expectedStatus;
  }
}

export class ConflictError extends Error {
  public statusCode = 409;

  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}

/**
 * A single file that could not be copied between stage folders
 */
export class RelocationError extends Error {
  public filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelocationError";
    this.filePath = filePath;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
