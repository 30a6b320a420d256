/**
 * Account model
 * Matches the 'accounts' table schema (snake_case columns are aliased to
 * camelCase by the repository)
 */
export interface Account {
  readonly id: number;
  readonly name: string;
  readonly email: string;
  readonly address: string;
  readonly phoneNumber: string;
  /** Calendar date, YYYY-MM-DD */
  readonly dateJoined: string;
}

/**
 * Validated client input for create and update
 * Never carries an id: the route layer decides which account is addressed
 */
export interface AccountInput {
  name: string;
  email: string;
  address?: string;
  phoneNumber?: string;
  dateJoined?: string;
}

/**
 * Row to insert
 * dateJoined is left to the storage default (today) when absent
 */
export interface NewAccount {
  name: string;
  email: string;
  address: string;
  phoneNumber: string;
  dateJoined?: string;
}

/**
 * Wire representation returned by the API
 */
export interface AccountResponse {
  id: number;
  name: string;
  email: string;
  address: string;
  phone_number: string;
  date_joined: string;
}

export function serializeAccount(account: Account): AccountResponse {
  return {
    id: account.id,
    name: account.name,
    email: account.email,
    address: account.address,
    phone_number: account.phoneNumber,
    date_joined: account.dateJoined,
  };
}
