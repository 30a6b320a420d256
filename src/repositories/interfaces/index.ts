/**
 * Repository Interfaces
 */

export * from './IAccountRepository';
