import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { generateKeyPairSync } from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ValidatorKeys, verifySignature } from '../../src/services/crypto/validatorKeys.js';
import { KeyFormatError } from '../../src/utils/errors.js';

describe('ValidatorKeys', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-keys-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should sign and verify a message', () => {
    const keys = ValidatorKeys.generate();
    const signature = keys.sign('block payload');

    expect(keys.verify('block payload', signature)).toBe(true);
    expect(keys.verify('block payload!', signature)).toBe(false);
  });

  it('should not verify with another key', () => {
    const signer = ValidatorKeys.generate();
    const other = ValidatorKeys.generate();

    expect(verifySignature('data', signer.sign('data'), other.publicKey)).toBe(false);
    expect(verifySignature('data', signer.sign('data'), signer.publicKeyPem())).toBe(true);
  });

  it('should return false for malformed signatures and keys', () => {
    const keys = ValidatorKeys.generate();

    expect(keys.verify('data', 'not-a-signature')).toBe(false);
    expect(verifySignature('data', keys.sign('data'), 'not a pem')).toBe(false);
  });

  it('should save with owner-only permissions and load the same identity', () => {
    const keyPath = path.join(tmpDir, 'nested', 'validator.pem');
    const keys = ValidatorKeys.generate();
    keys.save(keyPath);

    expect(fs.statSync(keyPath).mode & 0o777).toBe(0o600);

    const loaded = ValidatorKeys.load(keyPath);
    expect(loaded.publicKeyPem()).toBe(keys.publicKeyPem());
    expect(keys.verify('x', loaded.sign('x'))).toBe(true);
  });

  it('should create a key on first start and reuse it afterwards', () => {
    const keyPath = path.join(tmpDir, 'validator.pem');

    const first = ValidatorKeys.loadOrCreate(keyPath);
    expect(fs.existsSync(keyPath)).toBe(true);

    const second = ValidatorKeys.loadOrCreate(keyPath);
    expect(second.publicKeyPem()).toBe(first.publicKeyPem());
  });

  it('should reject a missing key file', () => {
    expect(() => ValidatorKeys.load(path.join(tmpDir, 'missing.pem'))).toThrow(KeyFormatError);
  });

  it('should reject text that is not a key', () => {
    expect(() => ValidatorKeys.fromPem('hello')).toThrow(KeyFormatError);
  });

  it('should reject keys on other curves or algorithms', () => {
    const { privateKey: secp384 } = generateKeyPairSync('ec', { namedCurve: 'secp384r1' });
    const { privateKey: ed25519 } = generateKeyPairSync('ed25519');

    expect(() =>
      ValidatorKeys.fromPem(secp384.export({ type: 'pkcs8', format: 'pem' }).toString())
    ).toThrow('Key must use P-256, got secp384r1');
    expect(() =>
      ValidatorKeys.fromPem(ed25519.export({ type: 'pkcs8', format: 'pem' }).toString())
    ).toThrow('Key must be ECDSA, got ed25519');
  });
});
