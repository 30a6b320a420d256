import { query } from '@/config/database';
import { Account, NewAccount } from '@/models';
import { DataValidationError, NotFoundError } from '@/errors';
import { ACCOUNT_LIMITS } from '@/config/limits';
import { IAccountRepository } from './interfaces/IAccountRepository';

/**
 * Columns returned for every account query
 *
 * PostgreSQL folds unquoted aliases to lowercase, so camelCase names must be
 * quoted. date_joined is rendered as text to avoid timezone shifts from the
 * pg DATE → JS Date conversion.
 */
const ACCOUNT_COLUMNS = `
  id,
  name,
  email,
  address,
  phone_number AS "phoneNumber",
  to_char(date_joined, 'YYYY-MM-DD') AS "dateJoined"
`;

/**
 * Ids outside the SERIAL range can never name a row; PostgreSQL would reject
 * them as out of range instead of finding nothing.
 */
function isStorableId(accountId: number): boolean {
  return Number.isSafeInteger(accountId) && accountId >= 1 && accountId <= ACCOUNT_LIMITS.MAX_ID;
}

/**
 * Account Repository
 * Handles all database operations for accounts
 */
export class AccountRepository implements IAccountRepository {
  async create(account: NewAccount): Promise<Account> {
    const result = await query<Account>(
      `
      INSERT INTO accounts (name, email, address, phone_number, date_joined)
      VALUES ($1, $2, $3, $4, COALESCE($5::date, CURRENT_DATE))
      RETURNING ${ACCOUNT_COLUMNS}
      `,
      [
        account.name,
        account.email,
        account.address,
        account.phoneNumber,
        account.dateJoined ?? null,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error('INSERT INTO accounts returned no row');
    }
    return row;
  }

  async update(account: Account): Promise<Account> {
    if (!account.id) {
      throw new DataValidationError('Update called with empty ID field');
    }
    if (!isStorableId(account.id)) {
      throw NotFoundError.account(account.id);
    }

    const result = await query<Account>(
      `
      UPDATE accounts
      SET name = $2,
          email = $3,
          address = $4,
          phone_number = $5,
          date_joined = $6::date
      WHERE id = $1
      RETURNING ${ACCOUNT_COLUMNS}
      `,
      [
        account.id,
        account.name,
        account.email,
        account.address,
        account.phoneNumber,
        account.dateJoined,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw NotFoundError.account(account.id);
    }
    return row;
  }

  async delete(accountId: number): Promise<boolean> {
    if (!isStorableId(accountId)) {
      return false;
    }

    const result = await query('DELETE FROM accounts WHERE id = $1', [accountId]);
    return (result.rowCount ?? 0) > 0;
  }

  async all(): Promise<Account[]> {
    const result = await query<Account>(`SELECT ${ACCOUNT_COLUMNS} FROM accounts ORDER BY id ASC`);
    return result.rows;
  }

  async find(accountId: number): Promise<Account | null> {
    if (!isStorableId(accountId)) {
      return null;
    }

    const result = await query<Account>(
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE id = $1`,
      [accountId]
    );

    return result.rows[0] ?? null;
  }
}
