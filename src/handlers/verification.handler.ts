import type { Request, Response, NextFunction } from 'express';
import type {
  LedgerService,
  ProofLookup,
  ProvenanceLink,
  VerifyResult,
} from '../services/ledger/ledger.service.js';
import { normalizeHash } from '../services/crypto/hashing.js';
import { Errors } from '../utils/errors.js';

export interface ProvenanceResponse {
  imageHash: string;
  chain: ProvenanceLink[];
}

export class VerificationHandler {
  constructor(private readonly ledger: LedgerService) {}

  private parseHash(value: string | undefined): string {
    const hash = normalizeHash(value);
    if (!hash) {
      throw Errors.badRequest('Invalid SHA256 hash format', 'imageHash');
    }
    return hash;
  }

  /**
   * Whether a hash is on the ledger; an unknown hash is a normal answer, not a 404
   */
  async verify(
    req: Request<{ imageHash: string }>,
    res: Response<VerifyResult>,
    next: NextFunction
  ): Promise<void> {
    try {
      const imageHash = this.parseHash(req.params.imageHash);
      res.json(await this.ledger.verify(imageHash));
    } catch (error) {
      next(error);
    }
  }

  async getProof(
    req: Request<{ imageHash: string }>,
    res: Response<ProofLookup>,
    next: NextFunction
  ): Promise<void> {
    try {
      const imageHash = this.parseHash(req.params.imageHash);
      const proof = await this.ledger.getMerkleProof(imageHash);
      if (!proof) {
        throw Errors.notFound('Merkle proof for this image hash');
      }
      res.json(proof);
    } catch (error) {
      next(error);
    }
  }

  async getProvenance(
    req: Request<{ imageHash: string }>,
    res: Response<ProvenanceResponse>,
    next: NextFunction
  ): Promise<void> {
    try {
      const imageHash = this.parseHash(req.params.imageHash);
      const chain = await this.ledger.getProvenance(imageHash);
      if (chain.length === 0) {
        throw Errors.notFound('Image hash');
      }
      res.json({ imageHash, chain });
    } catch (error) {
      next(error);
    }
  }
}
