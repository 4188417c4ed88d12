import type { AiScoreReceipt, AiScoreRequest } from '../../types';
import { commit } from '../commit-reveal';
import { encodeFields, type HashEncoding } from '../encoding';
import { solidityHash, type Digest } from '../hasher';
import { noHashes, type NoHashes, type StageDefinition } from '../stage';
import { asRecord, optionalString, requireJson, requireNumber, requireString } from '../validation';

const SCORE_RANGE = { min: 0, max: 100 };

export function computeScoreBatchHash(request: AiScoreRequest, encoding: HashEncoding): Digest {
  return solidityHash(encodeFields([request.batch_id, request.model_name], encoding));
}

export const aiScoreStage: StageDefinition<
  AiScoreRequest,
  { batchId: string },
  { batchHash: Digest; revealHash: Digest; commitHash: Digest; nonce: string },
  NoHashes,
  AiScoreReceipt
> = {
  stage: 'ai_score',

  validate(input) {
    const body = asRecord(input, 'body');
    return {
      batch_id: requireString(body, 'batch_id'),
      quality_score: requireNumber(body, 'quality_score', SCORE_RANGE),
      sustainability_score: requireNumber(body, 'sustainability_score', SCORE_RANGE),
      traceability_score: requireNumber(body, 'traceability_score', SCORE_RANGE),
      model_name: requireString(body, 'model_name'),
      model_version: requireString(body, 'model_version'),
      features: requireJson(body, 'features'),
      predictions: requireJson(body, 'predictions'),
      confidence: requireNumber(body, 'confidence', { min: 0, max: 1 }),
      model_artifacts_url: optionalString(body, 'model_artifacts_url'),
      training_data_hash: optionalString(body, 'training_data_hash'),
    };
  },

  identify(request) {
    return { batchId: request.batch_id };
  },

  preHash(request, _identifiers, { encoding, generateNonce }) {
    const pair = commit(request, generateNonce);
    return {
      batchHash: computeScoreBatchHash(request, encoding),
      revealHash: pair.revealHash,
      commitHash: pair.commitHash,
      nonce: pair.nonce,
    };
  },

  postHash: noHashes,

  toReceipt({ hashes, contentAddress, createdAt }) {
    return {
      batchHash: hashes.batchHash,
      commitHash: hashes.commitHash,
      revealHash: hashes.revealHash,
      nonce: hashes.nonce,
      ipfsCid: contentAddress,
      scoredAt: createdAt,
    };
  },
};
