export { createApp, API_PREFIX } from './app';
export { loadConfig, type ProvenanceConfig, type StorageBackend } from './config';
export { ProvenanceService, assertContentAddress } from './core/provenance-service';
export { StagePipeline, type RunOptions, type StagePipelineOptions } from './core/pipeline';
export { solidityHash, generalHash, hashWith, type Digest, type DigestAlgorithm } from './core/hasher';
export { computeMerkleRoot, EMPTY_MERKLE_SENTINEL } from './core/merkle';
export { commit, verify, computeRevealHash, computeCommitHash, type CommitRevealPair } from './core/commit-reveal';
export { encodeFields, type HashEncoding, HASH_ENCODINGS } from './core/encoding';
export { ENVELOPE_VERSION, parseStoredEnvelope, type StoredEnvelopeDocument } from './core/envelope';
export type { StageDefinition, StageContext, StageOutcome } from './core/stage';
export * from './core/stages';
export type { StorageGateway, StorageCallOptions, UploadResult } from './storage/gateway';
export { InMemoryStorageGateway } from './storage/memory-gateway';
export { IpfsHttpGateway, type IpfsGatewayOptions } from './storage/ipfs-gateway';
export * from './utils/errors';
export * from './types';
