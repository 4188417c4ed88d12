interface LogMeta {
  stage?: string | null;
  requestId?: string | null;
  contentAddress?: string | null;
  traceId?: string | null;
  [key: string]: unknown;
}

const SERVICE_NAME = 'provenance';

function baseContext(meta?: LogMeta): Record<string, unknown> {
  return {
    service: SERVICE_NAME,
    env: process.env.NODE_ENV || 'development',
    stage: meta?.stage ?? null,
    requestId: meta?.requestId ?? null,
    contentAddress: meta?.contentAddress ?? null,
    traceId: meta?.traceId ?? null,
    ...meta,
  };
}

function normalizeErrorMeta(metaOrError?: unknown): LogMeta | undefined {
  if (!metaOrError) {
    return undefined;
  }

  if (metaOrError instanceof Error) {
    return {
      error: metaOrError.message,
      errorName: metaOrError.name,
      stack: metaOrError.stack,
    };
  }

  if (typeof metaOrError === 'object') {
    return { ...metaOrError };
  }

  return {
    error: String(metaOrError),
  };
}

export class Logger {
  private static write(level: 'info' | 'warn' | 'error', message: string, meta?: LogMeta): void {
    const payload = {
      level,
      timestamp: new Date().toISOString(),
      message,
      ...baseContext(meta),
    };

    if (level === 'error') {
      console.error(JSON.stringify(payload));
      return;
    }

    if (level === 'warn') {
      console.warn(JSON.stringify(payload));
      return;
    }

    console.log(JSON.stringify(payload));
  }

  static info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  static warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  static error(message: string, metaOrError?: unknown): void {
    this.write('error', message, normalizeErrorMeta(metaOrError));
  }
}
