import { AppError } from './AppError';

/**
 * Unsupported Media Type Error (415)
 */
export class UnsupportedMediaTypeError extends AppError {
  constructor(message: string) {
    super(message, 415);
    Object.setPrototypeOf(this, UnsupportedMediaTypeError.prototype);
  }
}
