import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type ConsensusMode = 'single' | 'poa';

/**
 * Application configuration parsed and validated at startup
 */
export interface Config {
  // Server
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigin: string;

  // Database
  databaseUrl: string;

  // Logging
  logLevel: string;
  serviceName: string;

  // Admin Authentication
  adminPassword: string;

  // Node identity
  nodeId: string;
  validatorKeyPath: string;
  genesisTimestamp?: number;

  // Consensus
  consensusMode: ConsensusMode;
  validatorNodes: string[];
  poaRoundTimeoutMs: number;

  // Transaction rules
  authorizedSubmitters: string[] | null;
  batchSizeMin: number;
  batchSizeMax: number;
  batchIntervalSeconds: number;

  // Manufacturer authority validation
  authorityValidationUrl: string;
  authorityCertificateUrl: string;
  authorityRequestTimeoutMs: number;
  validationIntervalSeconds: number;
  validationMaxAttempts: number;
  validationCacheMaxSize: number;
  validationCacheTtlSeconds: number;

  // Run the validation and batching workers inside the API process
  embeddedWorkers: boolean;
}

const splitList = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

/**
 * Certificate bundles go to the sibling `/validate-cert` endpoint
 */
export const deriveCertificateUrl = (tokenUrl: string): string =>
  tokenUrl.endsWith('/validate')
    ? `${tokenUrl}-cert`
    : `${tokenUrl.replace(/\/+$/, '')}/validate-cert`;

/**
 * Parse and validate environment variables
 * Throws an error listing every problem if anything is missing or invalid
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const errors: string[] = [];

  // Helper to get required env var
  const getRequired = (key: string): string => {
    const value = env[key];
    if (!value || value.trim() === '') {
      errors.push(`Missing required environment variable: ${key}`);
      return '';
    }
    return value;
  };

  // Helper to parse an optional integer with a default
  const getNumber = (key: string, fallback: number, min = 0): number => {
    const value = env[key];
    if (!value || value.trim() === '') {
      return fallback;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      errors.push(`Invalid number for ${key}: ${value}`);
      return fallback;
    }
    if (parsed < min) {
      errors.push(`${key} must be at least ${min}, got ${parsed}`);
    }
    return parsed;
  };

  const getBoolean = (key: string, fallback: boolean): boolean => {
    const value = env[key]?.trim().toLowerCase();
    if (!value) {
      return fallback;
    }
    if (value === 'true' || value === '1') return true;
    if (value === 'false' || value === '0') return false;
    errors.push(`Invalid boolean for ${key}: ${env[key]}`);
    return fallback;
  };

  const nodeEnv = env.NODE_ENV || 'development';
  if (nodeEnv !== 'development' && nodeEnv !== 'production' && nodeEnv !== 'test') {
    errors.push(`Invalid NODE_ENV: ${nodeEnv}. Must be development, production, or test`);
  }

  const consensusMode = env.CONSENSUS_MODE || 'single';
  if (consensusMode !== 'single' && consensusMode !== 'poa') {
    errors.push(`Invalid CONSENSUS_MODE: ${consensusMode}. Must be single or poa`);
  }

  const validatorNodes = [...new Set(splitList(env.VALIDATOR_NODES))];
  if (consensusMode === 'poa' && validatorNodes.length === 0) {
    errors.push('VALIDATOR_NODES is required when CONSENSUS_MODE=poa');
  }

  const nodeId = env.NODE_ID || 'validator_001';

  // Empty allow-list means every submitter is accepted. The node itself
  // submits the batches it assembles, so it is always on a non-empty list.
  const authorizedSubmitters = splitList(env.AUTHORIZED_SUBMITTERS);
  if (authorizedSubmitters.length > 0 && !authorizedSubmitters.includes(nodeId)) {
    authorizedSubmitters.push(nodeId);
  }

  const genesisTimestamp = env.GENESIS_TIMESTAMP
    ? getNumber('GENESIS_TIMESTAMP', 0, 1)
    : undefined;

  const config: Config = {
    port: getNumber('PORT', 8545),
    nodeEnv: nodeEnv === 'production' || nodeEnv === 'test' ? nodeEnv : 'development',
    corsOrigin: env.CORS_ORIGIN || '*',
    databaseUrl: getRequired('DATABASE_URL'),
    logLevel: env.LOG_LEVEL || 'debug',
    serviceName:
      env.SERVICE_NAME || (process.argv[1]?.includes('worker') ? 'worker' : 'api'),
    adminPassword: getRequired('ADMIN_PASSWORD'),
    nodeId,
    validatorKeyPath: env.VALIDATOR_KEY_PATH || './data/keys/validator.key',
    genesisTimestamp,
    consensusMode: consensusMode === 'poa' ? 'poa' : 'single',
    validatorNodes,
    poaRoundTimeoutMs: getNumber('POA_ROUND_TIMEOUT_MS', 10000, 1),
    authorizedSubmitters: authorizedSubmitters.length > 0 ? authorizedSubmitters : null,
    batchSizeMin: getNumber('BATCH_SIZE_MIN', 1, 1),
    batchSizeMax: getNumber('BATCH_SIZE_MAX', 1000, 1),
    batchIntervalSeconds: getNumber('BATCH_INTERVAL_SECONDS', 60, 1),
    authorityValidationUrl: getRequired('AUTHORITY_VALIDATION_URL'),
    authorityCertificateUrl:
      env.AUTHORITY_CERT_VALIDATION_URL ||
      deriveCertificateUrl(env.AUTHORITY_VALIDATION_URL ?? ''),
    authorityRequestTimeoutMs: getNumber('AUTHORITY_REQUEST_TIMEOUT_MS', 5000, 1),
    validationIntervalSeconds: getNumber('VALIDATION_INTERVAL_SECONDS', 30, 1),
    validationMaxAttempts: getNumber('VALIDATION_MAX_ATTEMPTS', 5, 1),
    validationCacheMaxSize: getNumber('VALIDATION_CACHE_MAX_SIZE', 10000, 1),
    validationCacheTtlSeconds: getNumber('VALIDATION_CACHE_TTL_SECONDS', 3600, 1),
    embeddedWorkers: getBoolean('EMBEDDED_WORKERS', true),
  };

  if (config.batchSizeMin > config.batchSizeMax) {
    errors.push(
      `BATCH_SIZE_MIN (${config.batchSizeMin}) must not exceed BATCH_SIZE_MAX (${config.batchSizeMax})`
    );
  }

  // Throw if any errors
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }

  return config;
}

/**
 * Singleton config instance
 * Parsed and validated at module load time
 */
export const config: Config = parseConfig();
