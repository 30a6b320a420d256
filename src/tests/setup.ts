/**
 * Test environment
 * Runs before each test file loads its modules, so env.ts sees these values
 */
process.env.LOG_LEVEL = 'silent';
process.env.RATE_LIMIT_ENABLED = 'false';
