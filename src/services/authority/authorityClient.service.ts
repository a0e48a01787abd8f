import type {
  CertificateValidationRequest,
  TokenValidationRequest,
  TokenValidationResult,
} from '../../types/index.js';
import type { ValidationCache } from './validationCache.service.js';
import { logger } from '../../utils/logger.js';

export interface AuthorityClientOptions {
  endpoint: string;
  /** Endpoint for certificate bundles */
  certificateEndpoint: string;
  timeoutMs: number;
}

/**
 * Client for the manufacturer authority's validation endpoints.
 * A camera token request carries only the encrypted token, never the image hash.
 */
export class AuthorityClient {
  constructor(
    private readonly options: AuthorityClientOptions,
    private readonly cache: ValidationCache
  ) {}

  /**
   * Never throws: transport problems come back as a negative verdict,
   * flagged retryable when a later attempt may succeed
   */
  async validateToken(request: TokenValidationRequest): Promise<TokenValidationResult> {
    const cached = this.cache.get(request);
    if (cached) {
      logger.debug({ requestCount: cached.requestCount }, 'Authority verdict served from cache');
      return { valid: cached.valid, message: cached.message, retryable: false };
    }

    const result = await this.requestVerdict(
      this.options.endpoint,
      {
        camera_token: {
          ciphertext: request.ciphertext,
          auth_tag: request.authTag,
          nonce: request.nonce,
          table_id: request.tableId,
          key_index: request.keyIndex,
        },
        manufacturer_authority_id: request.authorityId,
      },
      request.authorityId,
      'Token'
    );
    // Transient failures must not pin a token to a negative answer
    if (!result.retryable) {
      this.cache.put(request, result.valid, result.message);
    }
    return result;
  }

  /**
   * Same contract as `validateToken`, for a device certificate bundle
   */
  async validateCertificate(
    request: CertificateValidationRequest
  ): Promise<TokenValidationResult> {
    const cached = this.cache.getCertificate(request);
    if (cached) {
      logger.debug({ requestCount: cached.requestCount }, 'Authority verdict served from cache');
      return { valid: cached.valid, message: cached.message, retryable: false };
    }

    const result = await this.requestVerdict(
      this.options.certificateEndpoint,
      {
        camera_cert: request.cameraCert,
        image_hash: request.imageHash,
        timestamp: request.timestamp,
        gps_hash: request.gpsHash,
        bundle_signature: request.bundleSignature,
      },
      request.authorityId,
      'Certificate'
    );
    if (!result.retryable) {
      this.cache.putCertificate(request, result.valid, result.message);
    }
    return result;
  }

  private async requestVerdict(
    url: string,
    body: Record<string, unknown>,
    authorityId: string,
    subject: 'Token' | 'Certificate'
  ): Promise<TokenValidationResult> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        logger.error(
          { timeoutMs: this.options.timeoutMs, authorityId },
          'Authority validation timed out'
        );
        return { valid: false, message: 'Authority validation timeout', retryable: true };
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ err: error, authorityId }, 'Authority unreachable');
      return { valid: false, message: `Authority connection error: ${message}`, retryable: true };
    }

    if (!response.ok) {
      logger.error({ status: response.status, authorityId }, 'Authority returned an error status');
      return {
        valid: false,
        message: `Authority HTTP error: ${response.status}`,
        retryable: response.status >= 500,
      };
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      logger.error({ err: error }, 'Authority response is not JSON');
      return { valid: false, message: 'Malformed authority response', retryable: false };
    }

    if (typeof data !== 'object' || data === null || !('valid' in data) || typeof data.valid !== 'boolean') {
      logger.error({ authorityId }, 'Authority response lacks a verdict');
      return { valid: false, message: 'Malformed authority response', retryable: false };
    }

    const message =
      'message' in data && typeof data.message === 'string'
        ? data.message
        : `${subject} ${data.valid ? 'validated' : 'rejected'}`;

    return { valid: data.valid, message, retryable: false };
  }
}

