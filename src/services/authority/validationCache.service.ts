import { LRUCache } from 'lru-cache';
import type {
  CertificateValidationRequest,
  TokenValidationRequest,
} from '../../types/index.js';
import { sha256Hex } from '../crypto/hashing.js';

export interface CachedVerdict {
  valid: boolean;
  message: string;
  cachedAt: number;
  /** How many times this exact token or bundle was asked about, first request included */
  requestCount: number;
}

export interface CacheStatistics {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  hitRate: string;
  ttlSeconds: number;
}

export interface ValidationCacheOptions {
  maxSize: number;
  ttlSeconds: number;
}

/**
 * Authority verdicts keyed by token parameters or certificate bundle, so a
 * retried request gets the answer the first one got. Entries expire lazily on read.
 */
export class ValidationCache {
  private cache: LRUCache<string, CachedVerdict>;
  private stats = { hits: 0, misses: 0 };

  constructor(private readonly options: ValidationCacheOptions) {
    this.cache = new LRUCache<string, CachedVerdict>({
      max: options.maxSize,
      ttl: options.ttlSeconds * 1000,
    });
  }

  /**
   * Key over every token parameter; the image hash never takes part
   */
  key(request: TokenValidationRequest): string {
    return sha256Hex(
      [
        request.ciphertext,
        request.authTag,
        request.nonce,
        request.tableId,
        request.keyIndex,
        request.authorityId,
      ].join(':')
    );
  }

  /**
   * Key over the whole certificate bundle, image fields included
   */
  certificateKey(request: CertificateValidationRequest): string {
    return sha256Hex(
      [
        'cert',
        request.cameraCert,
        request.imageHash,
        request.timestamp,
        request.gpsHash ?? '',
        request.bundleSignature,
        request.authorityId,
      ].join(':')
    );
  }

  get(request: TokenValidationRequest): CachedVerdict | null {
    return this.lookup(this.key(request));
  }

  put(request: TokenValidationRequest, valid: boolean, message: string): void {
    this.store(this.key(request), valid, message);
  }

  getCertificate(request: CertificateValidationRequest): CachedVerdict | null {
    return this.lookup(this.certificateKey(request));
  }

  putCertificate(request: CertificateValidationRequest, valid: boolean, message: string): void {
    this.store(this.certificateKey(request), valid, message);
  }

  private lookup(key: string): CachedVerdict | null {
    const entry = this.cache.get(key);
    if (!entry) {
      this.stats.misses++;
      return null;
    }

    this.stats.hits++;
    entry.requestCount++;
    return entry;
  }

  private store(key: string, valid: boolean, message: string): void {
    this.cache.set(key, {
      valid,
      message,
      cachedAt: Date.now(),
      requestCount: 1,
    });
  }

  getStatistics(): CacheStatistics {
    const total = this.stats.hits + this.stats.misses;
    const hitRate = total > 0 ? (this.stats.hits / total) * 100 : 0;

    return {
      size: this.cache.size,
      maxSize: this.options.maxSize,
      hits: this.stats.hits,
      misses: this.stats.misses,
      hitRate: `${hitRate.toFixed(1)}%`,
      ttlSeconds: this.options.ttlSeconds,
    };
  }

  clear(): void {
    this.cache.clear();
    this.stats = { hits: 0, misses: 0 };
  }

  /**
   * Drop expired entries now instead of on their next read; returns how many went
   */
  cleanupExpired(): number {
    const before = this.cache.size;
    this.cache.purgeStale();
    return before - this.cache.size;
  }
}
