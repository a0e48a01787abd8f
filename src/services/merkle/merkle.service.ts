import { createHash } from 'crypto';
import type { MerkleProofStep } from '../../types/index.js';
import { verifyHashFormat } from '../crypto/hashing.js';
import { InvalidInputError } from '../../utils/errors.js';

const ZERO_DIGEST = Buffer.alloc(32);

export interface LeafProof {
  imageHash: string;
  leafIndex: number;
  path: MerkleProofStep[];
}

export interface MerkleTree {
  root: string;
  depth: number;
  proofs: LeafProof[];
}

function hashPair(left: Buffer, right: Buffer): Buffer {
  return createHash('sha256').update(left).update(right).digest();
}

/**
 * Binary SHA-256 Merkle tree over 32-byte leaf digests
 */
export class MerkleService {
  /**
   * ceil(log2(n)); a single leaf is its own root at depth 0
   */
  calculateTreeDepth(leafCount: number): number {
    if (!Number.isInteger(leafCount) || leafCount < 1) {
      throw new InvalidInputError(`Leaf count must be a positive integer, got ${leafCount}`);
    }
    return leafCount === 1 ? 0 : 32 - Math.clz32(leafCount - 1);
  }

  /**
   * Build the tree, padding with zero digests up to the next power of two,
   * and record an inclusion proof for every original leaf
   */
  buildTree(leafHashes: readonly string[]): MerkleTree {
    if (leafHashes.length === 0) {
      throw new InvalidInputError('Cannot build a Merkle tree without leaves');
    }

    const leaves = leafHashes.map((hash, index) => {
      if (!verifyHashFormat(hash)) {
        throw new InvalidInputError(`Leaf ${index} is not a SHA-256 hex digest`);
      }
      return Buffer.from(hash, 'hex');
    });

    const depth = this.calculateTreeDepth(leaves.length);
    const width = 2 ** depth;

    const levels: Buffer[][] = [
      [...leaves, ...Array.from({ length: width - leaves.length }, () => ZERO_DIGEST)],
    ];
    for (let level = 0; level < depth; level++) {
      const current = levels[level];
      const parents: Buffer[] = [];
      for (let i = 0; i < current.length; i += 2) {
        parents.push(hashPair(current[i], current[i + 1]));
      }
      levels.push(parents);
    }

    const proofs = leafHashes.map((hash, leafIndex) => {
      const path: MerkleProofStep[] = [];
      let index = leafIndex;
      for (let level = 0; level < depth; level++) {
        // Even index: the sibling sits to the right
        const isLeftNode = index % 2 === 0;
        const sibling = levels[level][isLeftNode ? index + 1 : index - 1];
        path.push({
          siblingHash: sibling.toString('hex'),
          position: isLeftNode ? 'right' : 'left',
        });
        index = Math.floor(index / 2);
      }
      return { imageHash: hash.toLowerCase(), leafIndex, path };
    });

    return {
      root: levels[depth][0].toString('hex'),
      depth,
      proofs,
    };
  }

  /**
   * Replay a proof from `leafHash` up to `root`. Malformed hashes verify false.
   */
  verifyProof(leafHash: string, path: readonly MerkleProofStep[], root: string): boolean {
    if (!verifyHashFormat(leafHash) || !verifyHashFormat(root)) {
      return false;
    }

    let current: Buffer = Buffer.from(leafHash, 'hex');
    for (const step of path) {
      if (!verifyHashFormat(step.siblingHash)) {
        return false;
      }
      const sibling = Buffer.from(step.siblingHash, 'hex');
      if (step.position === 'right') {
        current = hashPair(current, sibling);
      } else if (step.position === 'left') {
        current = hashPair(sibling, current);
      } else {
        return false;
      }
    }

    return current.toString('hex') === root.toLowerCase();
  }
}
