export class FetchTimeoutError extends Error {
  constructor(url: string, timeoutMs: number) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

export class StorageNetworkError extends Error {
  constructor(url: string, message: string) {
    super(`Network request to ${url} failed: ${message}`);
    this.name = 'StorageNetworkError';
  }
}

export class RequestAbortedError extends Error {
  constructor(url: string) {
    super(`Request to ${url} was cancelled`);
    this.name = 'RequestAbortedError';
  }
}

export async function fetchWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<Response> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);
  const forwardAbort = (): void => controller.abort();

  if (signal?.aborted) {
    clearTimeout(timeoutHandle);
    throw new RequestAbortedError(url);
  }
  signal?.addEventListener('abort', forwardAbort, { once: true });

  try {
    return await fetch(url, {
      ...init,
      signal: controller.signal,
    });
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      if (signal?.aborted) {
        throw new RequestAbortedError(url);
      }
      throw new FetchTimeoutError(url, timeoutMs);
    }

    if (error instanceof Error) {
      throw new StorageNetworkError(url, error.message);
    }

    throw new StorageNetworkError(url, String(error));
  } finally {
    clearTimeout(timeoutHandle);
    signal?.removeEventListener('abort', forwardAbort);
  }
}
