import { Account, AccountInput } from '@/models';
import { IAccountRepository } from '@/repositories/interfaces';
import { NotFoundError } from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';

const logger = createLogger('AccountService');

/**
 * Account Service
 * Use cases for the Account resource
 */
export class AccountService {
  constructor(private accountRepo: IAccountRepository) {}

  /**
   * Create an account; address and phone number default to empty strings,
   * the join date to the storage default (today)
   */
  async createAccount(input: AccountInput): Promise<Account> {
    const account = await this.accountRepo.create({
      name: input.name,
      email: input.email,
      address: input.address ?? '',
      phoneNumber: input.phoneNumber ?? '',
      dateJoined: input.dateJoined,
    });

    logger.info({ accountId: account.id }, 'Account created');

    return account;
  }

  /**
   * @throws NotFoundError when no account has this id
   */
  async getAccount(accountId: number): Promise<Account> {
    const account = await this.accountRepo.find(accountId);

    if (!account) {
      throw NotFoundError.account(accountId);
    }

    return account;
  }

  async listAccounts(): Promise<Account[]> {
    const accounts = await this.accountRepo.all();

    logger.debug({ count: accounts.length }, 'Accounts listed');

    return accounts;
  }

  /**
   * Replace a stored account with a new value built from the input
   *
   * Fields absent from the input keep their stored value. The id always
   * comes from the stored account, never from the payload.
   */
  async updateAccount(existing: Account, input: AccountInput): Promise<Account> {
    const next: Account = {
      id: existing.id,
      name: input.name,
      email: input.email,
      address: input.address ?? existing.address,
      phoneNumber: input.phoneNumber ?? existing.phoneNumber,
      dateJoined: input.dateJoined ?? existing.dateJoined,
    };

    const account = await this.accountRepo.update(next);

    logger.info({ accountId: account.id }, 'Account updated');

    return account;
  }

  /**
   * Delete is idempotent: an unknown id is not an error
   */
  async deleteAccount(accountId: number): Promise<void> {
    const deleted = await this.accountRepo.delete(accountId);

    if (deleted) {
      logger.info({ accountId }, 'Account deleted');
    } else {
      logger.debug({ accountId }, 'Delete skipped: account does not exist');
    }
  }
}
