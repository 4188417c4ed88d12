import { canonicalJsonStringify } from '../utils/canonicalize';
import { generateNonce } from '../utils/crypto';
import { Digest, generalHash } from './hasher';

export interface CommitRevealPair {
  nonce: string;
  revealHash: Digest;
  commitHash: Digest;
}

export function computeRevealHash(payload: unknown): Digest {
  return generalHash(canonicalJsonStringify(payload));
}

export function computeCommitHash(revealHash: string, nonce: string): Digest {
  return generalHash(`${revealHash}${nonce}`);
}

export function commit(payload: unknown, nonceSource: () => string = generateNonce): CommitRevealPair {
  const revealHash = computeRevealHash(payload);
  const nonce = nonceSource();

  return {
    nonce,
    revealHash,
    commitHash: computeCommitHash(revealHash, nonce),
  };
}

export function verify(pair: CommitRevealPair, payload: unknown): boolean {
  const revealHash = computeRevealHash(payload);
  if (revealHash !== pair.revealHash) {
    return false;
  }

  return computeCommitHash(revealHash, pair.nonce) === pair.commitHash;
}
