import type { Request, Response, NextFunction } from 'express';
import type { LedgerService, NodeStatus } from '../services/ledger/ledger.service.js';

export interface StatusResponse extends NodeStatus {
  uptimeSeconds: number;
}

export class StatusHandler {
  constructor(private readonly ledger: LedgerService) {}

  async getStatus(_req: Request, res: Response<StatusResponse>, next: NextFunction): Promise<void> {
    try {
      const status = await this.ledger.status();
      res.json({ ...status, uptimeSeconds: Math.floor(process.uptime()) });
    } catch (error) {
      next(error);
    }
  }
}
