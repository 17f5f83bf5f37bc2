export class AppError extends Error {
  readonly statusCode: number;

  readonly code?: string;

  readonly details?: unknown;

  constructor(message: string, statusCode = 500, options?: { code?: string; details?: unknown; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = options?.code;
    this.details = options?.details;
  }
}

export class MissingFieldError extends AppError {
  readonly field: string;

  constructor(field: string) {
    super(`Missing required field: ${field}`, 422, { code: 'MISSING_FIELD', details: { field } });
    this.name = 'MissingFieldError';
    this.field = field;
  }
}

export class InvalidObservationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 422, { code: 'INVALID_OBSERVATION', details });
    this.name = 'InvalidObservationError';
  }
}

export class CollaboratorUnavailableError extends AppError {
  readonly collaborator: string;

  constructor(collaborator: string, message: string, cause?: unknown) {
    super(`${collaborator} unavailable: ${message}`, 503, {
      code: 'COLLABORATOR_UNAVAILABLE',
      details: { collaborator },
      cause
    });
    this.name = 'CollaboratorUnavailableError';
    this.collaborator = collaborator;
  }
}
