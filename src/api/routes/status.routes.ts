import { Router } from 'express';
import type { StatusHandler } from '../../handlers/status.handler.js';

export function createStatusRoutes(statusHandler: StatusHandler): Router {
  const router = Router();

  /**
   * GET /api/v1/status
   *
   * Node id, chain height, hash count, consensus mode and intake backlog
   */
  router.get('/status', (req, res, next) => statusHandler.getStatus(req, res, next));

  return router;
}
