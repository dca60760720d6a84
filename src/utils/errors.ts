export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class PersistenceError extends Error {
  constructor(
    public operation: string,
    public originalError: Error
  ) {
    super(`database.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}

export type ScreeningErrorCode =
  | 'INVALID_CONTACT'
  | 'GENERATION_FAILED'
  | 'LEAD_NOT_FOUND'
  | 'REGION_MISSING'
  | 'PERSISTENCE_ERROR'
  | 'UNEXPECTED_ERROR';

const SCREENING_STATUS_CODES: Record<ScreeningErrorCode, number> = {
  INVALID_CONTACT: 422,
  GENERATION_FAILED: 503,
  LEAD_NOT_FOUND: 404,
  REGION_MISSING: 422,
  PERSISTENCE_ERROR: 500,
  UNEXPECTED_ERROR: 500,
};

export class ScreeningError extends AppError {
  constructor(
    public code: ScreeningErrorCode,
    message: string
  ) {
    super(SCREENING_STATUS_CODES[code], message, true);
    Object.setPrototypeOf(this, ScreeningError.prototype);
  }
}

export function httpStatusFor(code: ScreeningErrorCode): number {
  return SCREENING_STATUS_CODES[code];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
