import { AppError } from './AppError';

/**
 * One offending field in a request payload
 */
export interface FieldError {
  field: string;
  message: string;
}

/**
 * Validation Error (400 Bad Request)
 * Thrown when request payload is invalid
 */
export class ValidationError extends AppError {
  public readonly errors?: FieldError[];

  constructor(message: string, errors?: FieldError[]) {
    super(message, 400);
    this.errors = errors;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}
