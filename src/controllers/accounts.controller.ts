import { Request, Response, NextFunction } from 'express';
import { accountService } from '@/config/dependencies';
import { serializeAccount } from '@/models';
import { deserializeAccount } from '@/validators/account.validator';
import { ValidationError } from '@/errors';

/**
 * Accounts Controller
 * Handles HTTP requests for the /accounts resource
 */

const ACCOUNT_ID = /^\d+$/;

/**
 * Path ids are non-negative integers; 0 is well-formed but never assigned
 */
function parseAccountId(raw: string | undefined): number {
  if (raw === undefined || !ACCOUNT_ID.test(raw)) {
    throw new ValidationError('Invalid account ID');
  }
  return Number(raw);
}

/**
 * POST /accounts
 * Create a new account
 */
export async function createAccount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const input = deserializeAccount(req.body);

    const account = await accountService.createAccount(input);

    res
      .status(201)
      .location(`${req.baseUrl}/${account.id}`)
      .json(serializeAccount(account));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /accounts
 * List all accounts (an empty store is a 200 with [])
 */
export async function listAccounts(
  _req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const accounts = await accountService.listAccounts();

    res.json(accounts.map(serializeAccount));
  } catch (error) {
    next(error);
  }
}

/**
 * GET /accounts/:accountId
 * Read one account
 */
export async function getAccount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const accountId = parseAccountId(req.params.accountId);

    const account = await accountService.getAccount(accountId);

    res.json(serializeAccount(account));
  } catch (error) {
    next(error);
  }
}

/**
 * PUT /accounts/:accountId
 * Update an account
 *
 * The account is looked up before the body is validated, so an unknown id
 * is a 404 whatever the body holds.
 */
export async function updateAccount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const accountId = parseAccountId(req.params.accountId);

    const existing = await accountService.getAccount(accountId);
    const input = deserializeAccount(req.body);

    const account = await accountService.updateAccount(existing, input);

    res.json(serializeAccount(account));
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /accounts/:accountId
 * Delete an account; 204 whether or not it existed
 */
export async function deleteAccount(
  req: Request,
  res: Response,
  next: NextFunction
): Promise<void> {
  try {
    const accountId = parseAccountId(req.params.accountId);

    await accountService.deleteAccount(accountId);

    res.status(204).end();
  } catch (error) {
    next(error);
  }
}
