import type { Request, Response, NextFunction } from 'express';
import type {
  CacheStatistics,
  ValidationCache,
} from '../services/authority/validationCache.service.js';
import type { BatchCycleResult } from '../workers/batchingWorker.js';
import { Errors } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Runs one batching cycle; null when a cycle is already in flight
 */
export interface BatchingTrigger {
  trigger(): Promise<BatchCycleResult | null>;
}

export class AdminHandler {
  constructor(
    private readonly cache: ValidationCache,
    private readonly batching: BatchingTrigger
  ) {}

  getCacheStats(_req: Request, res: Response<CacheStatistics>): void {
    res.json(this.cache.getStatistics());
  }

  cleanupCache(_req: Request, res: Response<{ removed: number; size: number }>): void {
    const removed = this.cache.cleanupExpired();
    logger.info({ removed }, 'Expired cache entries removed');
    res.json({ removed, size: this.cache.getStatistics().size });
  }

  async runBatching(
    _req: Request,
    res: Response<BatchCycleResult>,
    next: NextFunction
  ): Promise<void> {
    try {
      const result = await this.batching.trigger();
      if (!result) {
        throw Errors.conflict('A batching cycle is already running');
      }
      logger.info({ status: result.status, count: result.count }, 'Manual batching cycle finished');
      res.json(result);
    } catch (error) {
      next(error);
    }
  }
}
