export enum ErrorType {
  VALIDATION = 'VALIDATION',
  STORAGE_UNAVAILABLE = 'STORAGE_UNAVAILABLE',
  PIN_FAILED = 'PIN_FAILED',
  NOT_FOUND = 'NOT_FOUND',
  SERIALIZATION = 'SERIALIZATION',
  CANCELLED = 'CANCELLED',
}

export class ProvenanceError extends Error {
  constructor(
    message: string,
    public readonly errorType: ErrorType,
    public readonly retryable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ProvenanceError';
  }
}

export class ValidationError extends ProvenanceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorType.VALIDATION, false, context);
    this.name = 'ValidationError';
  }
}

export class StorageUnavailableError extends ProvenanceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorType.STORAGE_UNAVAILABLE, true, context);
    this.name = 'StorageUnavailableError';
  }
}

/**
 * Raised after the record was uploaded but the durability pin failed. The
 * content address is kept so the caller can retry the pin alone.
 */
export class PinFailedError extends ProvenanceError {
  constructor(
    message: string,
    public readonly contentAddress: string,
    context?: Record<string, unknown>
  ) {
    super(message, ErrorType.PIN_FAILED, true, { ...context, contentAddress });
    this.name = 'PinFailedError';
  }
}

export class NotFoundError extends ProvenanceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorType.NOT_FOUND, false, context);
    this.name = 'NotFoundError';
  }
}

export class SerializationError extends ProvenanceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorType.SERIALIZATION, false, context);
    this.name = 'SerializationError';
  }
}

export class CancelledError extends ProvenanceError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorType.CANCELLED, false, context);
    this.name = 'CancelledError';
  }
}

const HTTP_STATUS_BY_TYPE: Record<ErrorType, number> = {
  [ErrorType.VALIDATION]: 400,
  [ErrorType.NOT_FOUND]: 404,
  [ErrorType.STORAGE_UNAVAILABLE]: 503,
  [ErrorType.PIN_FAILED]: 502,
  [ErrorType.SERIALIZATION]: 500,
  // client closed the request
  [ErrorType.CANCELLED]: 499,
};

export function httpStatusFor(error: ProvenanceError): number {
  return HTTP_STATUS_BY_TYPE[error.errorType];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Anything that escapes a storage call without being classified is treated as
 * a transport failure: the caller may retry, and no receipt is produced.
 */
export function asStorageError(error: unknown, operation: string, context?: Record<string, unknown>): ProvenanceError {
  if (error instanceof ProvenanceError) {
    return error;
  }

  return new StorageUnavailableError(`${operation} failed: ${errorMessage(error)}`, context);
}
