import type { StorageGateway } from '../storage/gateway';
import { generateDid, generateNonce } from '../utils/crypto';
import { CancelledError, PinFailedError, asStorageError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/logger';
import type { HashEncoding } from './encoding';
import { buildEnvelope, deepFreeze, markPersisted, serializeEnvelope } from './envelope';
import type { DerivedHashes, Identifiers, StageContext, StageDefinition } from './stage';

export interface StagePipelineOptions {
  encoding: HashEncoding;
  clock?: () => Date;
  didSource?: (method: string) => string;
  nonceSource?: () => string;
}

export interface RunOptions {
  signal?: AbortSignal;
  requestId?: string;
}

function ensureActive(signal: AbortSignal | undefined, step: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`Request cancelled before ${step}`);
  }
}

/**
 * Runs one stage record through validate -> pre-hash -> persist -> post-hash
 * -> pin -> receipt. Holds no per-request state; the gateway is shared.
 */
export class StagePipeline {
  private readonly clock: () => Date;
  private readonly didSource: (method: string) => string;
  private readonly nonceSource: () => string;

  constructor(
    private readonly gateway: StorageGateway,
    private readonly options: StagePipelineOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.didSource = options.didSource ?? generateDid;
    this.nonceSource = options.nonceSource ?? generateNonce;
  }

  async run<TRequest, TIds extends Identifiers, TPre extends DerivedHashes, TPost extends DerivedHashes, TReceipt>(
    definition: StageDefinition<TRequest, TIds, TPre, TPost, TReceipt>,
    input: unknown,
    runOptions: RunOptions = {}
  ): Promise<TReceipt> {
    const { signal, requestId } = runOptions;
    const logMeta = { stage: definition.stage, requestId };

    const request = deepFreeze(definition.validate(input));
    ensureActive(signal, 'persisting');

    const context: StageContext = {
      createdAt: this.clock(),
      encoding: this.options.encoding,
      generateDid: this.didSource,
      generateNonce: this.nonceSource,
    };

    const identifiers = definition.identify(request, context);
    const preHashes = definition.preHash(request, identifiers, context);
    const draft = buildEnvelope({
      stage: definition.stage,
      createdAt: context.createdAt,
      encoding: context.encoding,
      identifiers,
      derivedHashes: preHashes,
      payload: request,
    });
    const serialized = serializeEnvelope(draft);

    let contentAddress: string;
    try {
      const uploaded = await this.gateway.upload(serialized.bytes, { signal });
      contentAddress = uploaded.contentAddress;
      Logger.info('Stage record uploaded', { ...logMeta, contentAddress, size: uploaded.size });
    } catch (error: unknown) {
      Logger.error('Stage record upload failed', { ...logMeta, error: errorMessage(error) });
      throw asStorageError(error, `${definition.stage} upload`, logMeta);
    }

    const persisted = markPersisted(draft, contentAddress);
    const postHashes = definition.postHash(request, persisted.contentAddress, context);

    ensureActive(signal, 'pinning');
    try {
      await this.gateway.pin(persisted.contentAddress, { signal });
    } catch (error: unknown) {
      if (error instanceof CancelledError) {
        throw error;
      }
      Logger.error('Stage record pin failed', { ...logMeta, contentAddress, error: errorMessage(error) });
      throw new PinFailedError(
        `Record stored at ${persisted.contentAddress} but pinning failed: ${errorMessage(error)}`,
        persisted.contentAddress,
        { stage: definition.stage }
      );
    }

    Logger.info('Stage record pinned', { ...logMeta, contentAddress });

    return deepFreeze(
      definition.toReceipt({
        request,
        identifiers,
        hashes: { ...preHashes, ...postHashes },
        contentAddress: persisted.contentAddress,
        createdAt: persisted.createdAt,
      })
    );
  }
}
