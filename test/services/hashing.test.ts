import { describe, it, expect } from 'vitest';
import {
  ZERO_HASH,
  blockSigningPayload,
  canonicalJson,
  computeBlockHash,
  computeTransactionHash,
  normalizeHash,
  roundToMinute,
  sha256Hex,
  verifyHashFormat,
} from '../../src/services/crypto/hashing.js';

describe('hashing', () => {
  describe('sha256Hex', () => {
    it('should hash strings and buffers identically', () => {
      const expected = 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad';
      expect(sha256Hex('abc')).toBe(expected);
      expect(sha256Hex(Buffer.from('abc'))).toBe(expected);
    });
  });

  describe('canonicalJson', () => {
    it('should sort keys, drop whitespace and escape non-ASCII', () => {
      expect(canonicalJson({ b: 1, a: [2, 'é'] })).toBe('{"a":[2,"\\u00e9"],"b":1}');
    });

    it('should sort nested object keys', () => {
      expect(canonicalJson({ z: { y: true, x: null } })).toBe('{"z":{"x":null,"y":true}}');
    });
  });

  describe('computeBlockHash', () => {
    it('should hash the canonical block document', () => {
      expect(computeBlockHash(0, ZERO_HASH, 1700000000, [], 'validator_001')).toBe(
        '77fa63188901144199de3d7361bc2ae3f66ba9c3295f9b0679f2f77f43adf42f'
      );
    });

    it('should not depend on transaction hash order', () => {
      const a = 'a'.repeat(64);
      const b = 'b'.repeat(64);
      expect(computeBlockHash(3, ZERO_HASH, 1, [a, b], 'v')).toBe(
        computeBlockHash(3, ZERO_HASH, 1, [b, a], 'v')
      );
    });

    it('should change with any field', () => {
      const base = computeBlockHash(1, ZERO_HASH, 100, [], 'v1');
      expect(computeBlockHash(2, ZERO_HASH, 100, [], 'v1')).not.toBe(base);
      expect(computeBlockHash(1, ZERO_HASH, 101, [], 'v1')).not.toBe(base);
      expect(computeBlockHash(1, ZERO_HASH, 100, [], 'v2')).not.toBe(base);
    });
  });

  describe('computeTransactionHash', () => {
    it('should sort image hashes but keep timestamp order', () => {
      const a = 'a'.repeat(64);
      const b = 'b'.repeat(64);

      expect(computeTransactionHash([b, a], [2, 1], 'agg1')).toBe(
        'f4cfbf18d67218987e5fa55d2bbb29b2b03a4029f7cbcd476a45961b559e6c24'
      );
      expect(computeTransactionHash([a, b], [2, 1], 'agg1')).toBe(
        computeTransactionHash([b, a], [2, 1], 'agg1')
      );
      expect(computeTransactionHash([a, b], [1, 2], 'agg1')).not.toBe(
        computeTransactionHash([a, b], [2, 1], 'agg1')
      );
    });
  });

  describe('verifyHashFormat', () => {
    it('should accept 64 hex characters in either case', () => {
      expect(verifyHashFormat('a'.repeat(64))).toBe(true);
      expect(verifyHashFormat('ABCDEF0123456789'.repeat(4))).toBe(true);
    });

    it('should reject wrong lengths, non-hex and non-strings', () => {
      expect(verifyHashFormat('a'.repeat(63))).toBe(false);
      expect(verifyHashFormat('a'.repeat(65))).toBe(false);
      expect(verifyHashFormat('g'.repeat(64))).toBe(false);
      expect(verifyHashFormat(` ${'a'.repeat(63)}`)).toBe(false);
      expect(verifyHashFormat(42)).toBe(false);
      expect(verifyHashFormat(null)).toBe(false);
    });
  });

  describe('normalizeHash', () => {
    it('should lowercase valid hashes and refuse invalid ones', () => {
      expect(normalizeHash('AB'.repeat(32))).toBe('ab'.repeat(32));
      expect(normalizeHash('xyz')).toBeNull();
    });
  });

  it('should round timestamps down to the minute', () => {
    expect(roundToMinute(1700000059)).toBe(1700000040);
    expect(roundToMinute(1699999980)).toBe(1699999980);
  });

  it('should build the block signing payload', () => {
    expect(blockSigningPayload(1, 'prev', 10, ['t1', 't2'], 'v')).toBe('1prev10t1,t2v');
  });
});
