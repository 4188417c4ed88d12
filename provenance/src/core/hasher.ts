import { createHash } from 'crypto';
import { keccak256, toUtf8Bytes } from 'ethers';

/** `0x`-prefixed, lower-case, 32-byte hex digest. */
export type Digest = `0x${string}`;

export type DigestAlgorithm = 'solidity-compatible' | 'general-purpose';

export type HashInput = string | Uint8Array;

function toBytes(input: HashInput): Uint8Array {
  return typeof input === 'string' ? toUtf8Bytes(input) : input;
}

export function isDigest(value: string): value is Digest {
  return /^0x[0-9a-f]{64}$/.test(value);
}

function asDigest(value: string): Digest {
  if (!isDigest(value)) {
    throw new Error(`Hash primitive returned a malformed digest: ${value}`);
  }
  return value;
}

/** keccak-256, matching Solidity's `keccak256(bytes)`. */
export function solidityHash(input: HashInput): Digest {
  return asDigest(keccak256(toBytes(input)));
}

/** SHA-256, used where on-chain verification is not needed (merkle nodes, commit-reveal). */
export function generalHash(input: HashInput): Digest {
  return asDigest(`0x${createHash('sha256').update(toBytes(input)).digest('hex')}`);
}

export function hashWith(algorithm: DigestAlgorithm, input: HashInput): Digest {
  return algorithm === 'solidity-compatible' ? solidityHash(input) : generalHash(input);
}
