import type { Request, Response, NextFunction } from 'express';
import type { PendingSubmissionsRepository } from '../db/repositories/pendingSubmissions.repository.js';
import type { BlockStorageRepository } from '../db/repositories/blockStorage.repository.js';
import type {
  CreateCertificateSubmissionInput,
  CreatePendingSubmissionInput,
  CreateTokenSubmissionInput,
} from '../db/types.js';
import type { PendingSubmission, SubmissionKind, ValidationStatus } from '../types/index.js';
import type { LedgerService } from '../services/ledger/ledger.service.js';
import {
  asFields,
  type Fields,
  optionalHash,
  optionalInteger,
  requireHash,
  requireInteger,
  requireString,
} from './requestFields.js';
import { Errors } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface SubmissionReceipt {
  receiptId: string;
  status: 'pending_validation';
  message: string;
}

export interface SubmissionStatusResponse {
  receiptId: string;
  kind: SubmissionKind;
  imageHash: string;
  validationStatus: ValidationStatus;
  validationMessage?: string;
  retryCount: number;
  batched: boolean;
  txId?: number;
}

export interface DirectSubmitResponse {
  imageHash: string;
  txId: number;
  blockHeight: number;
}

function parseEntryFields(fields: Fields) {
  return {
    imageHash: requireHash(fields, 'imageHash'),
    timestamp: requireInteger(fields, 'timestamp', { min: 1 }),
    submitterId: requireString(fields, 'submitterId'),
    modificationLevel: optionalInteger(fields, 'modificationLevel', 0, { min: 0, max: 2 }),
    parentImageHash: optionalHash(fields, 'parentImageHash'),
    gpsHash: optionalHash(fields, 'gpsHash'),
    ownerHash: optionalHash(fields, 'ownerHash'),
    authorityId: requireString(fields, 'authorityId'),
  };
}

export class SubmissionsHandler {
  constructor(
    private readonly submissionsRepo: PendingSubmissionsRepository,
    private readonly storage: BlockStorageRepository,
    private readonly ledger: LedgerService
  ) {}

  private toStatusResponse(submission: PendingSubmission): SubmissionStatusResponse {
    return {
      receiptId: submission.receiptId,
      kind: submission.kind,
      imageHash: submission.imageHash,
      validationStatus: submission.validationStatus,
      validationMessage: submission.validationMessage || undefined,
      retryCount: submission.retryCount,
      batched: submission.batched,
      txId: submission.txId ?? undefined,
    };
  }

  private parseTokenRequest(body: unknown): CreateTokenSubmissionInput {
    const fields = asFields(body);
    const token = asFields(fields.cameraToken, 'cameraToken');

    return {
      ...parseEntryFields(fields),
      kind: 'camera_token',
      ciphertext: requireString(token, 'ciphertext'),
      authTag: requireString(token, 'authTag'),
      nonce: requireString(token, 'nonce'),
      tableId: requireInteger(token, 'tableId', { min: 0 }),
      keyIndex: requireInteger(token, 'keyIndex', { min: 0 }),
    };
  }

  private parseCertificateRequest(body: unknown): CreateCertificateSubmissionInput {
    const fields = asFields(body);
    const bundle = asFields(fields.certificateBundle, 'certificateBundle');

    return {
      ...parseEntryFields(fields),
      kind: 'certificate',
      cameraCert: requireString(bundle, 'cameraCert'),
      bundleSignature: requireString(bundle, 'bundleSignature'),
    };
  }

  /**
   * Stage a token-authenticated hash; validation and batching happen in the background
   */
  async createSubmission(
    req: Request,
    res: Response<SubmissionReceipt>,
    next: NextFunction
  ): Promise<void> {
    try {
      res.status(202).json(await this.stage(this.parseTokenRequest(req.body)));
    } catch (error) {
      next(error);
    }
  }

  /**
   * Stage a hash authenticated by a device certificate bundle
   */
  async createCertificateSubmission(
    req: Request,
    res: Response<SubmissionReceipt>,
    next: NextFunction
  ): Promise<void> {
    try {
      res.status(202).json(await this.stage(this.parseCertificateRequest(req.body)));
    } catch (error) {
      next(error);
    }
  }

  private async stage(input: CreatePendingSubmissionInput): Promise<SubmissionReceipt> {
    const onChain = await this.storage.verifyImageHash(input.imageHash);
    if (onChain) {
      throw Errors.conflict('Image hash already on blockchain', 'imageHash');
    }
    if (await this.submissionsRepo.isStaged(input.imageHash)) {
      throw Errors.conflict('Image hash already submitted', 'imageHash');
    }

    const submission = await this.submissionsRepo.create(input);
    logger.info(
      {
        receiptId: submission.receiptId,
        kind: submission.kind,
        authorityId: submission.authorityId,
      },
      'Submission received'
    );

    return {
      receiptId: submission.receiptId,
      status: 'pending_validation',
      message: 'Submission received and queued for validation',
    };
  }

  async getSubmission(
    req: Request<{ receiptId: string }>,
    res: Response<SubmissionStatusResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      const submission = await this.submissionsRepo.findByReceiptId(req.params.receiptId);
      if (!submission) {
        throw Errors.notFound('Submission');
      }
      res.json(this.toStatusResponse(submission));
    } catch (error) {
      next(error);
    }
  }

  /**
   * Commit a hash straight to the ledger as its own block
   */
  async submitDirect(
    req: Request,
    res: Response<DirectSubmitResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      const fields = asFields(req.body);
      const imageHash = requireHash(fields, 'imageHash');

      const result = await this.ledger.submit({
        imageHash,
        timestamp: requireInteger(fields, 'timestamp', { min: 1 }),
        submitterId: requireString(fields, 'submitterId'),
        modificationLevel: optionalInteger(fields, 'modificationLevel', 0, { min: 0, max: 2 }),
        parentImageHash: optionalHash(fields, 'parentImageHash'),
        gpsHash: optionalHash(fields, 'gpsHash'),
        ownerHash: optionalHash(fields, 'ownerHash'),
      });

      res.status(201).json({ imageHash, ...result });
    } catch (error) {
      next(error);
    }
  }
}
