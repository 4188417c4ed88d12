import type { Server } from 'http';
import { createApp } from './app';
import { loadConfig, type ProvenanceConfig } from './config';
import { ProvenanceService } from './core/provenance-service';
import type { StorageGateway } from './storage/gateway';
import { IpfsHttpGateway } from './storage/ipfs-gateway';
import { InMemoryStorageGateway } from './storage/memory-gateway';
import { errorMessage } from './utils/errors';
import { Logger } from './utils/logger';

let server: Server | undefined;

function createGateway(config: ProvenanceConfig): StorageGateway {
  if (config.storageBackend === 'memory') {
    Logger.warn('Using in-memory storage; records are lost on restart');
    return new InMemoryStorageGateway();
  }

  return new IpfsHttpGateway({
    apiUrl: config.ipfsApiUrl,
    projectId: config.ipfsProjectId,
    projectSecret: config.ipfsProjectSecret,
    timeoutMs: config.ipfsTimeoutMs,
    retryAttempts: config.ipfsRetryAttempts,
    retryDelayMs: config.ipfsRetryDelayMs,
  });
}

function gracefulShutdown(signal: string): void {
  Logger.info(`${signal} received, shutting down gracefully...`);

  if (!server) {
    process.exit(0);
  }

  server.close((error?: Error) => {
    if (error) {
      Logger.error('Error during graceful shutdown', error);
      process.exit(1);
    }
    Logger.info('Graceful shutdown completed');
    process.exit(0);
  });
}

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const gateway = createGateway(config);
  const service = new ProvenanceService(gateway, { encoding: config.hashEncoding });

  try {
    await service.checkReadiness();
  } catch (error: unknown) {
    Logger.warn('Storage backend not reachable at startup', { error: errorMessage(error) });
  }

  const app = createApp(service, config);

  server = app.listen(config.port, () => {
    Logger.info('Provenance service started', {
      port: config.port,
      environment: config.nodeEnv,
      storageBackend: gateway.name,
      hashEncoding: config.hashEncoding,
    });
  });

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

bootstrap().catch((error: unknown) => {
  Logger.error('Failed to start server', error);
  process.exit(1);
});
