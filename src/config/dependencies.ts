/**
 * Dependency Container
 * Instantiates and wires the repository and service
 *
 * Tests replace this module to run the HTTP layer against an in-memory
 * repository.
 */

import { IAccountRepository } from '@/repositories/interfaces';
import { AccountRepository } from '@/repositories/account.repository';
import { AccountService } from '@/services/account.service';

// ============================================================================
// REPOSITORIES
// ============================================================================

export const accountRepository: IAccountRepository = new AccountRepository();

// ============================================================================
// SERVICES
// ============================================================================

export const accountService = new AccountService(accountRepository);
