import { AppError } from './AppError';

/**
 * Not Found Error (404)
 * An unknown account id or an unmatched route
 */
export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }

  static account(accountId: number): NotFoundError {
    return new NotFoundError(`Account with id [${accountId}] could not be found.`);
  }

  static route(method: string, path: string): NotFoundError {
    return new NotFoundError(`Route ${method} ${path} not found`);
  }
}
