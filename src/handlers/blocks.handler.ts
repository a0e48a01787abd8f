import type { Request, Response, NextFunction } from 'express';
import type { BlockDetails, LedgerService } from '../services/ledger/ledger.service.js';
import { parseHeightParam } from './requestFields.js';
import { Errors } from '../utils/errors.js';

export class BlocksHandler {
  constructor(private readonly ledger: LedgerService) {}

  async getLatestBlock(
    _req: Request,
    res: Response<BlockDetails>,
    next: NextFunction
  ): Promise<void> {
    try {
      const block = await this.ledger.getLatestBlock();
      if (!block) {
        throw Errors.notFound('Block');
      }
      res.json(block);
    } catch (error) {
      next(error);
    }
  }

  async getBlockByHeight(
    req: Request<{ height: string }>,
    res: Response<BlockDetails>,
    next: NextFunction
  ): Promise<void> {
    try {
      const height = parseHeightParam(req.params.height);
      const block = await this.ledger.getBlock(height);
      if (!block) {
        throw Errors.notFound(`Block ${height}`);
      }
      res.json(block);
    } catch (error) {
      next(error);
    }
  }

  async getBlockByHash(
    req: Request<{ blockHash: string }>,
    res: Response<BlockDetails>,
    next: NextFunction
  ): Promise<void> {
    try {
      const { blockHash } = req.params;
      if (!/^[a-fA-F0-9]{64}$/.test(blockHash)) {
        throw Errors.badRequest('Invalid block hash format', 'blockHash');
      }
      const block = await this.ledger.getBlockByHash(blockHash);
      if (!block) {
        throw Errors.notFound('Block');
      }
      res.json(block);
    } catch (error) {
      next(error);
    }
  }
}
