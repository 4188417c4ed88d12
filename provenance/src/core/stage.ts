import type { StageType } from '../types';
import type { HashEncoding } from './encoding';

export type Identifiers = Readonly<Record<string, string>>;

/** Values derived from the payload and recorded alongside it. */
export type DerivedHashes = Readonly<Record<string, string | readonly string[]>>;

export type NoHashes = Record<never, never>;

export interface StageContext {
  readonly createdAt: Date;
  readonly encoding: HashEncoding;
  readonly generateDid: (method: string) => string;
  readonly generateNonce: () => string;
}

export interface StageOutcome<TRequest, TIds extends Identifiers, THashes extends DerivedHashes> {
  request: TRequest;
  identifiers: TIds;
  hashes: THashes;
  contentAddress: string;
  createdAt: string;
}

/**
 * One record type of the custody chain. `preHash` sees only the payload;
 * `postHash` runs after the record is stored and receives its content
 * address. Field order inside each hash input is fixed per stage.
 */
export interface StageDefinition<
  TRequest,
  TIds extends Identifiers,
  TPre extends DerivedHashes,
  TPost extends DerivedHashes,
  TReceipt,
> {
  readonly stage: StageType;
  validate(input: unknown): TRequest;
  identify(request: TRequest, context: StageContext): TIds;
  preHash(request: TRequest, identifiers: TIds, context: StageContext): TPre;
  postHash(request: TRequest, contentAddress: string, context: StageContext): TPost;
  toReceipt(outcome: StageOutcome<TRequest, TIds, TPre & TPost>): TReceipt;
}

export function noHashes(): NoHashes {
  return {};
}
