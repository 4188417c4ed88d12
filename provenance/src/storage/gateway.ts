export interface StorageCallOptions {
  signal?: AbortSignal;
}

export interface UploadResult {
  contentAddress: string;
  size: number;
}

/**
 * Content-addressed storage as seen by the pipeline. One instance is shared
 * by all requests and must tolerate concurrent calls. Implementations raise
 * `NotFoundError` for unknown addresses and `StorageUnavailableError` for
 * transport failures, including timeouts.
 */
export interface StorageGateway {
  readonly name: string;
  upload(content: Uint8Array, options?: StorageCallOptions): Promise<UploadResult>;
  fetchByAddress(contentAddress: string, options?: StorageCallOptions): Promise<Uint8Array>;
  pin(contentAddress: string, options?: StorageCallOptions): Promise<void>;
  unpin(contentAddress: string, options?: StorageCallOptions): Promise<void>;
  isPinned(contentAddress: string, options?: StorageCallOptions): Promise<boolean>;
  ping(): Promise<void>;
}
