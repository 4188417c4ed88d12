import { isStageType, type StageType } from '../types';
import { canonicalJsonStringify } from '../utils/canonicalize';
import { SerializationError } from '../utils/errors';
import { isHashEncoding, type HashEncoding } from './encoding';
import type { DerivedHashes, Identifiers } from './stage';

export const ENVELOPE_VERSION = 'PROVENANCE_ENVELOPE_V1';

export interface RecordEnvelope<TPayload, THashes extends DerivedHashes> {
  readonly stage: StageType;
  readonly createdAt: string;
  readonly encoding: HashEncoding;
  readonly identifiers: Identifiers;
  readonly derivedHashes: THashes;
  readonly payload: TPayload;
  readonly contentAddress?: undefined;
}

export interface PersistedEnvelope<TPayload, THashes extends DerivedHashes>
  extends Omit<RecordEnvelope<TPayload, THashes>, 'contentAddress'> {
  readonly contentAddress: string;
}

export interface SerializedEnvelope {
  json: string;
  bytes: Uint8Array;
}

/** Shape written to storage. Snake-case keys match the stored records. */
export interface StoredEnvelopeDocument {
  envelope_version: string;
  record_type: StageType;
  created_at: string;
  hash_encoding: HashEncoding;
  identifiers: Record<string, string>;
  derived_hashes: Record<string, string | string[]>;
  payload: unknown;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

export function buildEnvelope<TPayload, THashes extends DerivedHashes>(parts: {
  stage: StageType;
  createdAt: Date;
  encoding: HashEncoding;
  identifiers: Identifiers;
  derivedHashes: THashes;
  payload: TPayload;
}): RecordEnvelope<TPayload, THashes> {
  return deepFreeze({
    stage: parts.stage,
    createdAt: parts.createdAt.toISOString(),
    encoding: parts.encoding,
    identifiers: { ...parts.identifiers },
    derivedHashes: parts.derivedHashes,
    payload: parts.payload,
  });
}

export function serializeEnvelope<TPayload, THashes extends DerivedHashes>(
  envelope: RecordEnvelope<TPayload, THashes>
): SerializedEnvelope {
  const document = {
    envelope_version: ENVELOPE_VERSION,
    record_type: envelope.stage,
    created_at: envelope.createdAt,
    hash_encoding: envelope.encoding,
    identifiers: envelope.identifiers,
    derived_hashes: envelope.derivedHashes,
    payload: envelope.payload,
  };

  let json: string;
  try {
    json = canonicalJsonStringify(document);
  } catch (error: unknown) {
    if (error instanceof SerializationError) {
      throw error;
    }
    throw new SerializationError(`Envelope for ${envelope.stage} could not be canonicalized`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  return { json, bytes: Buffer.from(json, 'utf8') };
}

/** The only way a content address enters an envelope. */
export function markPersisted<TPayload, THashes extends DerivedHashes>(
  envelope: RecordEnvelope<TPayload, THashes>,
  contentAddress: string
): PersistedEnvelope<TPayload, THashes> {
  return Object.freeze({ ...envelope, contentAddress });
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((entry) => typeof entry === 'string')
  );
}

function isDerivedRecord(value: unknown): value is Record<string, string | string[]> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(
      (entry) => typeof entry === 'string' || (Array.isArray(entry) && entry.every((item) => typeof item === 'string'))
    )
  );
}

/** Reads back an envelope previously written by `serializeEnvelope`; `null` when the bytes are not one. */
export function parseStoredEnvelope(bytes: Uint8Array): StoredEnvelopeDocument | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  const candidate: Record<string, unknown> = { ...parsed };
  const version = candidate.envelope_version;
  const recordType = candidate.record_type;
  const createdAt = candidate.created_at;
  const encoding = candidate.hash_encoding;
  const identifiers = candidate.identifiers;
  const derivedHashes = candidate.derived_hashes;

  if (
    typeof version !== 'string' ||
    version !== ENVELOPE_VERSION ||
    typeof recordType !== 'string' ||
    !isStageType(recordType) ||
    typeof createdAt !== 'string' ||
    typeof encoding !== 'string' ||
    !isHashEncoding(encoding) ||
    !isStringRecord(identifiers) ||
    !isDerivedRecord(derivedHashes)
  ) {
    return null;
  }

  return {
    envelope_version: version,
    record_type: recordType,
    created_at: createdAt,
    hash_encoding: encoding,
    identifiers,
    derived_hashes: derivedHashes,
    payload: candidate.payload,
  };
}
