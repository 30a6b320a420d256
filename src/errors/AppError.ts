/**
 * Base class for errors that map to an HTTP status
 * Anything thrown that is not an AppError is treated as a server fault (500)
 */
export class AppError extends Error {
  public readonly statusCode: number;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}
