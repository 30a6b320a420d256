import { ValidationError } from './ValidationError';

/**
 * Data Validation Error (400 Bad Request)
 * The data itself cannot be used: a body that is not a JSON object, or an
 * update of an account that was never created
 */
export class DataValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, DataValidationError.prototype);
  }
}
