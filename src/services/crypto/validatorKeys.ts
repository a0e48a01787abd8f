import {
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  sign,
  verify,
  type KeyObject,
} from 'crypto';
import fs from 'fs';
import path from 'path';
import { KeyFormatError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const CURVE = 'prime256v1';

/**
 * ECDSA P-256 signing identity of this validator node.
 * Signatures are DER encoded and transported as base64.
 */
export class ValidatorKeys {
  readonly publicKey: KeyObject;

  private constructor(private readonly privateKey: KeyObject) {
    this.publicKey = createPublicKey(privateKey);
  }

  static generate(): ValidatorKeys {
    const { privateKey } = generateKeyPairSync('ec', { namedCurve: CURVE });
    return new ValidatorKeys(privateKey);
  }

  static fromPem(pem: string): ValidatorKeys {
    let privateKey: KeyObject;
    try {
      privateKey = createPrivateKey(pem);
    } catch (error) {
      throw new KeyFormatError(
        `Not a PEM private key: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (privateKey.asymmetricKeyType !== 'ec') {
      throw new KeyFormatError(`Key must be ECDSA, got ${privateKey.asymmetricKeyType}`);
    }
    if (privateKey.asymmetricKeyDetails?.namedCurve !== CURVE) {
      throw new KeyFormatError(
        `Key must use P-256, got ${privateKey.asymmetricKeyDetails?.namedCurve ?? 'unknown curve'}`
      );
    }
    return new ValidatorKeys(privateKey);
  }

  static load(keyPath: string): ValidatorKeys {
    let pem: string;
    try {
      pem = fs.readFileSync(keyPath, 'utf8');
    } catch (error) {
      throw new KeyFormatError(
        `Cannot read validator key at ${keyPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    return ValidatorKeys.fromPem(pem);
  }

  /**
   * Load the key at `keyPath`, generating and saving one on first start
   */
  static loadOrCreate(keyPath: string): ValidatorKeys {
    if (fs.existsSync(keyPath)) {
      logger.info({ keyPath }, 'Loading validator key');
      return ValidatorKeys.load(keyPath);
    }

    logger.warn({ keyPath }, 'No validator key found, generating a new one');
    const keys = ValidatorKeys.generate();
    keys.save(keyPath);
    return keys;
  }

  /**
   * Write the private key as PKCS#8 PEM readable by the owner only
   */
  save(keyPath: string): void {
    fs.mkdirSync(path.dirname(keyPath), { recursive: true, mode: 0o700 });
    const pem = this.privateKey.export({ type: 'pkcs8', format: 'pem' });
    fs.writeFileSync(keyPath, pem, { mode: 0o600 });
    // mode only applies when the file is created
    fs.chmodSync(keyPath, 0o600);
  }

  sign(data: Buffer | string): string {
    return sign('sha256', toBuffer(data), this.privateKey).toString('base64');
  }

  verify(data: Buffer | string, signature: string): boolean {
    return verifySignature(data, signature, this.publicKey);
  }

  publicKeyPem(): string {
    return this.publicKey.export({ type: 'spki', format: 'pem' }).toString();
  }
}

/**
 * Check a base64 DER signature against a public key (PEM or KeyObject).
 * Malformed keys or signatures yield false.
 */
export function verifySignature(
  data: Buffer | string,
  signature: string,
  publicKey: KeyObject | string
): boolean {
  try {
    const key = typeof publicKey === 'string' ? createPublicKey(publicKey) : publicKey;
    if (key.asymmetricKeyType !== 'ec') {
      return false;
    }
    return verify('sha256', toBuffer(data), key, Buffer.from(signature, 'base64'));
  } catch (error) {
    logger.debug({ err: error }, 'Signature verification failed on malformed input');
    return false;
  }
}

function toBuffer(data: Buffer | string): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
}
