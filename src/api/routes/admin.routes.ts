import { Router, type RequestHandler } from 'express';
import type { AdminHandler } from '../../handlers/admin.handler.js';

export function createAdminRoutes(adminHandler: AdminHandler, adminAuth: RequestHandler): Router {
  const router = Router();

  router.use('/admin', adminAuth);

  // Token validation cache
  router.get('/admin/cache/stats', (req, res) => adminHandler.getCacheStats(req, res));
  router.post('/admin/cache/cleanup', (req, res) => adminHandler.cleanupCache(req, res));

  // Run one batching cycle now
  router.post('/admin/batching/run', (req, res, next) => adminHandler.runBatching(req, res, next));

  return router;
}
