import { Router } from 'express';
import type { VerificationHandler } from '../../handlers/verification.handler.js';

export function createVerificationRoutes(verificationHandler: VerificationHandler): Router {
  const router = Router();

  // { verified: false } for unknown hashes
  router.get('/verify/:imageHash', (req, res, next) =>
    verificationHandler.verify(req, res, next)
  );

  router.get('/verify/:imageHash/proof', (req, res, next) =>
    verificationHandler.getProof(req, res, next)
  );

  router.get('/verify/:imageHash/provenance', (req, res, next) =>
    verificationHandler.getProvenance(req, res, next)
  );

  return router;
}
