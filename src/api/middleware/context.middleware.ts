import type { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { withContext } from '../../utils/logger.js';

/**
 * Runs the rest of the request inside a logging context carrying its correlation id
 */
export const contextMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header !== '' ? header : randomUUID();

  res.setHeader('x-correlation-id', correlationId);
  withContext({ correlationId }, () => next());
};
