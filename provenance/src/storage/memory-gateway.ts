import { createHash } from 'crypto';
import { NotFoundError } from '../utils/errors';
import type { StorageCallOptions, StorageGateway, UploadResult } from './gateway';

/** In-process store for local development and tests. Nothing survives a restart. */
export class InMemoryStorageGateway implements StorageGateway {
  readonly name = 'memory';
  private readonly objects = new Map<string, Uint8Array>();
  private readonly pinned = new Set<string>();

  async upload(content: Uint8Array, _options?: StorageCallOptions): Promise<UploadResult> {
    const contentAddress = `mem-${createHash('sha256').update(content).digest('hex')}`;
    this.objects.set(contentAddress, Uint8Array.from(content));
    return { contentAddress, size: content.byteLength };
  }

  async fetchByAddress(contentAddress: string, _options?: StorageCallOptions): Promise<Uint8Array> {
    const stored = this.objects.get(contentAddress);
    if (!stored) {
      throw new NotFoundError(`Content ${contentAddress} not found`, { contentAddress });
    }
    return Uint8Array.from(stored);
  }

  async pin(contentAddress: string, _options?: StorageCallOptions): Promise<void> {
    if (!this.objects.has(contentAddress)) {
      throw new NotFoundError(`Content ${contentAddress} not found`, { contentAddress });
    }
    this.pinned.add(contentAddress);
  }

  async unpin(contentAddress: string, _options?: StorageCallOptions): Promise<void> {
    if (!this.pinned.delete(contentAddress)) {
      throw new NotFoundError(`Content ${contentAddress} is not pinned`, { contentAddress });
    }
  }

  async isPinned(contentAddress: string, _options?: StorageCallOptions): Promise<boolean> {
    return this.pinned.has(contentAddress);
  }

  async ping(): Promise<void> {
    return;
  }
}
