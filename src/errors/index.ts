/**
 * Central export point for all custom errors
 */
export * from './AppError';
export * from './ValidationError';
export * from './DataValidationError';
export * from './NotFoundError';
export * from './UnsupportedMediaTypeError';
