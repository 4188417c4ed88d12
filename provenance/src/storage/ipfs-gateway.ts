import { retryWithBackoff } from '../retry';
import {
  CancelledError,
  NotFoundError,
  ProvenanceError,
  StorageUnavailableError,
  ValidationError,
  errorMessage,
} from '../utils/errors';
import { FetchTimeoutError, RequestAbortedError, fetchWithTimeout } from '../utils/fetchWithTimeout';
import { Logger } from '../utils/logger';
import type { StorageCallOptions, StorageGateway, UploadResult } from './gateway';

export interface IpfsGatewayOptions {
  apiUrl: string;
  projectId?: string;
  projectSecret?: string;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

interface IpfsCall {
  params?: Record<string, string>;
  body?: FormData;
  signal?: AbortSignal;
}

function readField(source: unknown, field: string): unknown {
  if (typeof source !== 'object' || source === null) {
    return undefined;
  }
  return Reflect.get(source, field);
}

function parseErrorMessage(bodyText: string): string {
  try {
    const message = readField(JSON.parse(bodyText), 'Message');
    if (typeof message === 'string' && message.length > 0) {
      return message;
    }
  } catch {
    // plain-text error body
  }
  return bodyText.trim();
}

function isRetryable(error: unknown): boolean {
  return error instanceof ProvenanceError && error.retryable;
}

/**
 * Client for the IPFS HTTP RPC API (`/api/v0`). Every command is a POST; the
 * node answers non-2xx with `{ Message, Code, Type }`.
 */
export class IpfsHttpGateway implements StorageGateway {
  readonly name = 'ipfs';
  private readonly baseUrl: string;
  private readonly authHeader?: string;

  constructor(private readonly options: IpfsGatewayOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, '');

    if (options.projectId && options.projectSecret) {
      const credentials = Buffer.from(`${options.projectId}:${options.projectSecret}`).toString('base64');
      this.authHeader = `Basic ${credentials}`;
    }

    Logger.info('IpfsHttpGateway initialized', {
      apiUrl: this.baseUrl,
      authenticated: Boolean(this.authHeader),
      timeoutMs: options.timeoutMs,
      retryAttempts: options.retryAttempts,
    });
  }

  async upload(content: Uint8Array, options: StorageCallOptions = {}): Promise<UploadResult> {
    const response = await this.request('add', {
      params: { pin: 'false', 'cid-version': '1' },
      body: this.fileForm(content),
      signal: options.signal,
    });

    const body: unknown = await response.json();
    const hash = readField(body, 'Hash');
    const size = readField(body, 'Size');

    if (typeof hash !== 'string' || hash.length === 0) {
      throw new StorageUnavailableError('IPFS add returned no content address');
    }

    const parsedSize = typeof size === 'string' ? Number.parseInt(size, 10) : size;
    return {
      contentAddress: hash,
      size: typeof parsedSize === 'number' && Number.isFinite(parsedSize) ? parsedSize : content.byteLength,
    };
  }

  async fetchByAddress(contentAddress: string, options: StorageCallOptions = {}): Promise<Uint8Array> {
    const response = await this.request('cat', { params: { arg: contentAddress }, signal: options.signal });
    return new Uint8Array(await response.arrayBuffer());
  }

  async pin(contentAddress: string, options: StorageCallOptions = {}): Promise<void> {
    await this.request('pin/add', { params: { arg: contentAddress }, signal: options.signal });
  }

  async unpin(contentAddress: string, options: StorageCallOptions = {}): Promise<void> {
    await this.request('pin/rm', { params: { arg: contentAddress }, signal: options.signal });
  }

  async isPinned(contentAddress: string, options: StorageCallOptions = {}): Promise<boolean> {
    try {
      const response = await this.request('pin/ls', {
        params: { arg: contentAddress, type: 'recursive' },
        signal: options.signal,
      });
      const keys = readField(await response.json(), 'Keys');
      return readField(keys, contentAddress) !== undefined;
    } catch (error: unknown) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  async ping(): Promise<void> {
    await this.request('version', {});
  }

  private fileForm(content: Uint8Array): FormData {
    const form = new FormData();
    form.append('file', new Blob([Buffer.from(content)], { type: 'application/json' }), 'record.json');
    return form;
  }

  private async request(command: string, call: IpfsCall): Promise<Response> {
    const query = new URLSearchParams(call.params ?? {}).toString();
    const url = `${this.baseUrl}/api/v0/${command}${query ? `?${query}` : ''}`;
    const headers: Record<string, string> = {};
    if (this.authHeader) {
      headers.Authorization = this.authHeader;
    }

    return retryWithBackoff(
      async () => {
        let response: Response;
        try {
          response = await fetchWithTimeout(
            url,
            { method: 'POST', headers, body: call.body },
            this.options.timeoutMs,
            call.signal
          );
        } catch (error: unknown) {
          throw this.classifyTransportError(command, error);
        }

        if (!response.ok) {
          throw this.classifyResponseError(command, response.status, await response.text());
        }

        return response;
      },
      `ipfs ${command}`,
      this.options.retryAttempts,
      this.options.retryDelayMs,
      isRetryable
    );
  }

  private classifyTransportError(command: string, error: unknown): ProvenanceError {
    if (error instanceof RequestAbortedError) {
      return new CancelledError(`IPFS ${command} cancelled`);
    }

    const reason = error instanceof FetchTimeoutError ? 'timed out' : 'unreachable';
    return new StorageUnavailableError(`IPFS ${command} ${reason}: ${errorMessage(error)}`, { command });
  }

  private classifyResponseError(command: string, status: number, bodyText: string): ProvenanceError {
    const message = parseErrorMessage(bodyText) || `HTTP ${status}`;
    const context = { command, status };

    if (status === 404 || /not (found|pinned)/i.test(message)) {
      return new NotFoundError(`IPFS ${command}: ${message}`, context);
    }

    if (/invalid (cid|path)|selected encoding not supported/i.test(message)) {
      return new ValidationError(`IPFS ${command}: ${message}`, context);
    }

    if (status === 401 || status === 403) {
      Logger.error('IPFS node rejected credentials', context);
    }

    return new StorageUnavailableError(`IPFS ${command} failed: ${message}`, context);
  }
}
