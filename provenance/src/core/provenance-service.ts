import type { StorageGateway, UploadResult } from '../storage/gateway';
import type {
  AiScoreReceipt,
  CommitmentVerification,
  CreateSkuReceipt,
  FarmerRegistrationReceipt,
  FpoPurchaseReceipt,
  IpfsGetResponse,
  IpfsPinResponse,
  IpfsUploadResponse,
  LogisticsMilestoneReceipt,
  ProcessBatchReceipt,
  WarehouseUpdateReceipt,
} from '../types';
import { canonicalJsonStringify } from '../utils/canonicalize';
import { PinFailedError, ValidationError, asStorageError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import { verify } from './commit-reveal';
import { parseStoredEnvelope } from './envelope';
import { isDigest } from './hasher';
import { StagePipeline, type RunOptions, type StagePipelineOptions } from './pipeline';
import {
  aiScoreStage,
  createSkuStage,
  farmerRegistrationStage,
  fpoPurchaseStage,
  logisticsMilestoneStage,
  processBatchStage,
  warehouseUpdateStage,
} from './stages';
import { asRecord, isJsonValue, optionalBoolean } from './validation';

const CONTENT_ADDRESS_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export function assertContentAddress(contentAddress: string): void {
  if (!CONTENT_ADDRESS_PATTERN.test(contentAddress)) {
    throw new ValidationError('Invalid content address format', { contentAddress });
  }
}

export class ProvenanceService {
  private readonly pipeline: StagePipeline;

  constructor(
    private readonly gateway: StorageGateway,
    options: StagePipelineOptions
  ) {
    this.pipeline = new StagePipeline(gateway, options);
  }

  registerFarmer(input: unknown, options?: RunOptions): Promise<FarmerRegistrationReceipt> {
    return this.pipeline.run(farmerRegistrationStage, input, options);
  }

  recordPurchase(input: unknown, options?: RunOptions): Promise<FpoPurchaseReceipt> {
    return this.pipeline.run(fpoPurchaseStage, input, options);
  }

  updateWarehouse(input: unknown, options?: RunOptions): Promise<WarehouseUpdateReceipt> {
    return this.pipeline.run(warehouseUpdateStage, input, options);
  }

  recordLogisticsMilestone(input: unknown, options?: RunOptions): Promise<LogisticsMilestoneReceipt> {
    return this.pipeline.run(logisticsMilestoneStage, input, options);
  }

  processBatch(input: unknown, options?: RunOptions): Promise<ProcessBatchReceipt> {
    return this.pipeline.run(processBatchStage, input, options);
  }

  createSku(input: unknown, options?: RunOptions): Promise<CreateSkuReceipt> {
    return this.pipeline.run(createSkuStage, input, options);
  }

  recordAiScore(input: unknown, options?: RunOptions): Promise<AiScoreReceipt> {
    return this.pipeline.run(aiScoreStage, input, options);
  }

  /** Re-checks the commit-reveal pair stored in an AI score record against the payload stored with it. */
  async verifyScoreCommitment(contentAddress: string, options: RunOptions = {}): Promise<CommitmentVerification> {
    assertContentAddress(contentAddress);

    const bytes = await this.fetch(contentAddress, options);
    const envelope = parseStoredEnvelope(bytes);
    if (!envelope) {
      throw new ValidationError('Content is not a provenance record', { contentAddress });
    }

    if (envelope.record_type !== aiScoreStage.stage) {
      throw new ValidationError(`Record is a ${envelope.record_type} record, not an AI score`, { contentAddress });
    }

    const { revealHash, commitHash, nonce } = envelope.derived_hashes;
    if (
      typeof revealHash !== 'string' ||
      typeof commitHash !== 'string' ||
      typeof nonce !== 'string' ||
      !isDigest(revealHash) ||
      !isDigest(commitHash)
    ) {
      throw new ValidationError('AI score record carries no commitment', { contentAddress });
    }

    const valid = verify({ revealHash, commitHash, nonce }, envelope.payload);
    Logger.info('Score commitment verified', { stage: aiScoreStage.stage, contentAddress, valid });

    return { contentAddress, valid, revealHash, commitHash };
  }

  async uploadContent(input: unknown, options: RunOptions = {}): Promise<IpfsUploadResponse> {
    const body = asRecord(input, 'body');
    const data = body.data;
    if (data === undefined || !isJsonValue(data)) {
      throw new ValidationError('data is required and must be JSON', { field: 'data' });
    }
    const shouldPin = optionalBoolean(body, 'pin', false);

    const bytes = Buffer.from(canonicalJsonStringify(data), 'utf8');

    let uploaded: UploadResult;
    try {
      uploaded = await this.gateway.upload(bytes, { signal: options.signal });
    } catch (error: unknown) {
      throw asStorageError(error, 'upload', { requestId: options.requestId });
    }

    Logger.info('Content uploaded', { requestId: options.requestId, contentAddress: uploaded.contentAddress });

    if (shouldPin) {
      try {
        await this.gateway.pin(uploaded.contentAddress, { signal: options.signal });
      } catch (error: unknown) {
        throw new PinFailedError(
          `Content stored at ${uploaded.contentAddress} but pinning failed: ${errorMessage(error)}`,
          uploaded.contentAddress
        );
      }
    }

    return { cid: uploaded.contentAddress, size: uploaded.size, pinned: shouldPin };
  }

  async getContent(contentAddress: string, options: RunOptions = {}): Promise<IpfsGetResponse> {
    assertContentAddress(contentAddress);
    const bytes = await this.fetch(contentAddress, options);

    let data: unknown;
    try {
      data = JSON.parse(Buffer.from(bytes).toString('utf8'));
    } catch {
      throw new ValidationError('Content is not JSON', { contentAddress });
    }

    if (!isJsonValue(data)) {
      throw new ValidationError('Content is not JSON', { contentAddress });
    }

    return { cid: contentAddress, data };
  }

  async pinContent(contentAddress: string, options: RunOptions = {}): Promise<IpfsPinResponse> {
    assertContentAddress(contentAddress);
    try {
      await this.gateway.pin(contentAddress, { signal: options.signal });
    } catch (error: unknown) {
      throw asStorageError(error, 'pin', { contentAddress });
    }

    Logger.info('Content pinned', { requestId: options.requestId, contentAddress });
    return { cid: contentAddress, pinned: true };
  }

  async unpinContent(contentAddress: string, options: RunOptions = {}): Promise<IpfsPinResponse> {
    assertContentAddress(contentAddress);
    try {
      await this.gateway.unpin(contentAddress, { signal: options.signal });
    } catch (error: unknown) {
      throw asStorageError(error, 'unpin', { contentAddress });
    }

    Logger.info('Content unpinned', { requestId: options.requestId, contentAddress });
    return { cid: contentAddress, pinned: false };
  }

  async getPinStatus(contentAddress: string, options: RunOptions = {}): Promise<IpfsPinResponse> {
    assertContentAddress(contentAddress);
    try {
      const pinned = await this.gateway.isPinned(contentAddress, { signal: options.signal });
      return { cid: contentAddress, pinned };
    } catch (error: unknown) {
      throw asStorageError(error, 'pin status', { contentAddress });
    }
  }

  async checkReadiness(): Promise<void> {
    await this.gateway.ping();
  }

  private async fetch(contentAddress: string, options: RunOptions): Promise<Uint8Array> {
    try {
      return await this.gateway.fetchByAddress(contentAddress, { signal: options.signal });
    } catch (error: unknown) {
      throw asStorageError(error, 'fetch', { contentAddress });
    }
  }
}
