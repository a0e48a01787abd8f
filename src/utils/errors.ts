/**
 * REST API Error Class
 * Errors that reach the HTTP layer are converted to this type
 */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly field?: string,
    public readonly rule?: string
  ) {
    super(message);
    this.name = 'ApiError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export const Errors = {
  // 400 Bad Request
  badRequest: (message: string, field?: string) => new ApiError(400, message, field),

  // 404 Not Found
  notFound: (resource: string) => new ApiError(404, `${resource} not found`),

  // 409 Conflict
  conflict: (message: string, field?: string) => new ApiError(409, message, field),

  // 503 Service Unavailable
  unavailable: (message: string) => new ApiError(503, message),

  // 500 Internal Server Error
  internal: (message = 'Internal server error') => new ApiError(500, message),
};

/**
 * Base class for ledger domain errors
 */
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed input handed to a core primitive (hash, Merkle leaf, proof) */
export class InvalidInputError extends LedgerError {}

/** Key file that is missing, unreadable or not a P-256 private key */
export class KeyFormatError extends LedgerError {}

/** Startup configuration that cannot produce a working node */
export class ConfigurationError extends LedgerError {}

/** Block proposal that no longer extends the current chain tip */
export class ChainConflictError extends LedgerError {
  constructor(
    message: string,
    public readonly expectedHeight: number,
    public readonly proposedHeight: number
  ) {
    super(message);
  }
}

/** Consensus round that could not produce an approved block */
export class ConsensusError extends LedgerError {}

/** Submission refused by a transaction validation rule */
export class SubmissionRejectedError extends LedgerError {
  constructor(
    public readonly reason: string,
    public readonly rule: string
  ) {
    super(reason);
  }
}
