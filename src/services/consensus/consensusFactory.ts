import type { ConsensusMode } from '../../config/index.js';
import type { ValidatorKeys } from '../crypto/validatorKeys.js';
import type { ChainTip, ConsensusEngine } from './consensusEngine.js';
import { ProofOfAuthorityConsensus, type VoteTransport } from './proofOfAuthority.service.js';
import { SingleNodeConsensus } from './singleNode.service.js';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface ConsensusSettings {
  mode: ConsensusMode;
  validatorId: string;
  validatorNodes: readonly string[];
  roundTimeoutMs: number;
}

export interface ConsensusDependencies {
  chain: ChainTip;
  keys: ValidatorKeys;
  transport?: VoteTransport;
}

/**
 * Select the consensus strategy at startup. Misconfiguration fails here,
 * before any worker or route is running.
 */
export function createConsensusEngine(
  settings: ConsensusSettings,
  deps: ConsensusDependencies
): ConsensusEngine {
  switch (settings.mode) {
    case 'single':
      logger.info({ validatorId: settings.validatorId }, 'Using single-node consensus');
      return new SingleNodeConsensus(deps.chain, deps.keys, settings.validatorId);

    case 'poa': {
      if (settings.validatorNodes.length === 0) {
        throw new ConfigurationError('Proof-of-authority consensus requires VALIDATOR_NODES');
      }
      if (!deps.transport) {
        throw new ConfigurationError('Proof-of-authority consensus requires a vote transport');
      }
      logger.info(
        { validatorId: settings.validatorId, validators: settings.validatorNodes },
        'Using proof-of-authority consensus'
      );
      return new ProofOfAuthorityConsensus(deps.chain, deps.keys, deps.transport, {
        validatorId: settings.validatorId,
        validators: settings.validatorNodes,
        roundTimeoutMs: settings.roundTimeoutMs,
      });
    }
  }
}
