import { Router } from 'express';
import * as accountsController from '@/controllers/accounts.controller';
import { requireJsonContentType } from '@/middlewares/requireJson';
import { accountWriteRateLimiter } from '@/middlewares/rateLimiter';

const router = Router();

/**
 * POST /accounts
 * Create an account (JSON body, stricter rate limit)
 */
router.post(
  '/',
  accountWriteRateLimiter,
  requireJsonContentType,
  accountsController.createAccount
);

/**
 * GET /accounts
 * List all accounts
 */
router.get('/', accountsController.listAccounts);

/**
 * GET /accounts/:accountId
 * Read one account
 */
router.get('/:accountId', accountsController.getAccount);

/**
 * PUT /accounts/:accountId
 * Update an account (JSON body)
 */
router.put('/:accountId', requireJsonContentType, accountsController.updateAccount);

/**
 * DELETE /accounts/:accountId
 * Delete an account (idempotent)
 */
router.delete('/:accountId', accountsController.deleteAccount);

export default router;
