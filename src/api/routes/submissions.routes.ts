import { Router } from 'express';
import type { SubmissionsHandler } from '../../handlers/submissions.handler.js';

export function createSubmissionsRoutes(submissionsHandler: SubmissionsHandler): Router {
  const router = Router();

  /**
   * POST /api/v1/submissions
   *
   * Stage an image hash with its encrypted camera token.
   * Response: 202 { receiptId, status: 'pending_validation', message }
   * 400 invalid body, 409 hash already submitted or on the ledger
   */
  router.post('/submissions', (req, res, next) =>
    submissionsHandler.createSubmission(req, res, next)
  );

  /**
   * POST /api/v1/submissions/certificate
   *
   * Stage an image hash with the device certificate bundle that signs it.
   * Responses as for POST /submissions
   */
  router.post('/submissions/certificate', (req, res, next) =>
    submissionsHandler.createCertificateSubmission(req, res, next)
  );

  /**
   * GET /api/v1/submissions/:receiptId
   *
   * Validation and batching state of a staged submission
   */
  router.get('/submissions/:receiptId', (req, res, next) =>
    submissionsHandler.getSubmission(req, res, next)
  );

  /**
   * POST /api/v1/blockchain/submit
   *
   * Commit one hash directly as its own block.
   * Response: 201 { imageHash, txId, blockHeight }
   * 400 rule violation, 409 duplicate hash
   */
  router.post('/blockchain/submit', (req, res, next) =>
    submissionsHandler.submitDirect(req, res, next)
  );

  return router;
}
