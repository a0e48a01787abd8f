import { Router } from 'express';
import type { BlocksHandler } from '../../handlers/blocks.handler.js';

export function createBlocksRoutes(blocksHandler: BlocksHandler): Router {
  const router = Router();

  // Registered before /:height so "latest" and "hash" are not read as heights
  router.get('/blocks/latest', (req, res, next) => blocksHandler.getLatestBlock(req, res, next));

  router.get('/blocks/hash/:blockHash', (req, res, next) =>
    blocksHandler.getBlockByHash(req, res, next)
  );

  router.get('/blocks/:height', (req, res, next) =>
    blocksHandler.getBlockByHeight(req, res, next)
  );

  return router;
}
