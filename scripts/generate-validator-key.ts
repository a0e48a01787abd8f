#!/usr/bin/env tsx
import fs from 'fs';
import { ValidatorKeys } from '../src/services/crypto/validatorKeys.js';

/**
 * Generates the P-256 key a validator signs blocks with
 *
 *   npm run generate-validator-key -- ./data/keys/validator.key [--force]
 */
function main() {
  const keyPath = process.argv[2] ?? './data/keys/validator.key';
  const force = process.argv.includes('--force');

  if (fs.existsSync(keyPath) && !force) {
    console.error(`Refusing to overwrite ${keyPath}; pass --force to replace it`);
    process.exit(1);
  }

  const keys = ValidatorKeys.generate();
  keys.save(keyPath);

  console.log('\n=== Generated Validator Key ===\n');
  console.log(`Private key written to ${keyPath} (mode 0600)`);
  console.log('Public key:\n');
  console.log(keys.publicKeyPem());
  console.log(`Set VALIDATOR_KEY_PATH=${keyPath} in your environment file\n`);
}

main();
