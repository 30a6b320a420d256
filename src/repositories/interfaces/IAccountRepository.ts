import { Account, NewAccount } from '@/models';

/**
 * Account Repository Interface
 * Storage port for the accounts collection. The service depends on this
 * contract only, so tests can swap in an in-memory implementation.
 */
export interface IAccountRepository {
  /**
   * Persist a new account; storage assigns the id
   * @returns The stored account, id populated
   */
  create(account: NewAccount): Promise<Account>;

  /**
   * Overwrite the stored row with the same id
   * @throws DataValidationError when the id is empty (never-created account)
   * @throws NotFoundError when no row has that id
   */
  update(account: Account): Promise<Account>;

  /**
   * Remove the row with this id. Absent rows are not an error.
   * @returns Whether a row was removed
   */
  delete(accountId: number): Promise<boolean>;

  /**
   * All accounts in insertion order
   */
  all(): Promise<Account[]>;

  /**
   * @returns The account, or null if no row matches
   */
  find(accountId: number): Promise<Account | null>;
}
