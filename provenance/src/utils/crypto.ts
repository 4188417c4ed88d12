import crypto from 'crypto';

export const NONCE_BYTES = 16;

/**
 * 128-bit hex nonce from the platform CSPRNG. `randomBytes` throws when the
 * entropy source is unavailable; that error is left to propagate.
 */
export function generateNonce(): string {
  return crypto.randomBytes(NONCE_BYTES).toString('hex');
}

export function generateRequestId(): string {
  return crypto.randomBytes(16).toString('hex');
}

export function generateDid(method: string): string {
  return `did:${method}:${crypto.randomUUID()}`;
}
