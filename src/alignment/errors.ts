export class AlignmentError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

// Render callback threw or returned something that is not an image
export class RenderError extends AlignmentError {
  constructor(attemptNumber: number, cause: unknown) {
    super(
      `Render failed on attempt ${attemptNumber}: ${describeError(cause)}`,
      'RENDER_ERROR',
      { attemptNumber }
    );
  }
}

export class RenderTimeoutError extends AlignmentError {
  constructor(attemptNumber: number, limitMs: number) {
    super(
      `Render on attempt ${attemptNumber} exceeded its ${Math.round(limitMs)}ms budget`,
      'RENDER_TIMEOUT',
      { attemptNumber, limitMs }
    );
  }
}

export class RunCancelledError extends AlignmentError {
  constructor(attemptNumber: number) {
    super(`Verification cancelled during attempt ${attemptNumber}`, 'RUN_CANCELLED', { attemptNumber });
  }
}

// Malformed setup: no field specs, unreadable reference, bad limits
export class ConfigurationError extends AlignmentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

export class FieldValidationError extends AlignmentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FIELD_VALIDATION_ERROR', details);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
