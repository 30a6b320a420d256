import { Account, NewAccount } from '@/models';
import { IAccountRepository } from '@/repositories/interfaces';
import { DataValidationError, NotFoundError } from '@/errors';

/**
 * In-process stand-in for the accounts table
 * Same contract as AccountRepository: serial ids, today as the default join
 * date, insertion order for all()
 */
export class InMemoryAccountRepository implements IAccountRepository {
  private rows = new Map<number, Account>();
  private nextId = 1;

  async create(account: NewAccount): Promise<Account> {
    const stored: Account = {
      id: this.nextId++,
      name: account.name,
      email: account.email,
      address: account.address,
      phoneNumber: account.phoneNumber,
      dateJoined: account.dateJoined ?? new Date().toISOString().slice(0, 10),
    };
    this.rows.set(stored.id, stored);
    return { ...stored };
  }

  async update(account: Account): Promise<Account> {
    if (!account.id) {
      throw new DataValidationError('Update called with empty ID field');
    }
    if (!this.rows.has(account.id)) {
      throw NotFoundError.account(account.id);
    }
    this.rows.set(account.id, { ...account });
    return { ...account };
  }

  async delete(accountId: number): Promise<boolean> {
    return this.rows.delete(accountId);
  }

  async all(): Promise<Account[]> {
    return [...this.rows.values()].map((row) => ({ ...row }));
  }

  async find(accountId: number): Promise<Account | null> {
    const row = this.rows.get(accountId);
    return row ? { ...row } : null;
  }
}
