export class ArcDistanceError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, cause?: unknown) {
    super(message);
    this.name = "ArcDistanceError";
    this.code = code;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class ValidationError extends ArcDistanceError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class CaseTableError extends ArcDistanceError {
  constructor(code: string, message: string, cause?: unknown) {
    super(code, message, cause);
    this.name = "CaseTableError";
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }

  return String(error);
}
