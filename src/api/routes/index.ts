import { Router } from 'express';
import accountsRoutes from './accounts.routes';

const router = Router();

/**
 * Service Routes
 * Mounted at the application root
 */

// Health check endpoint (infrastructure, not rate limited)
router.get('/health', (_req, res) => {
  res.json({ status: 'OK' });
});

router.use('/accounts', accountsRoutes);

export default router;
