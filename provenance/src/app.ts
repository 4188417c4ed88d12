import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { ProvenanceController } from './api/controller';
import { createRouter } from './api/routes';
import type { ProvenanceConfig } from './config';
import type { ProvenanceService } from './core/provenance-service';
import { errorHandler, notFoundHandler, requestContext } from './middleware/middleware';

export const API_PREFIX = '/api/provenance/v1';

export function createApp(service: ProvenanceService, config: Pick<ProvenanceConfig, 'jsonBodyLimit'>): Express {
  const app = express();
  const controller = new ProvenanceController(service);

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: config.jsonBodyLimit }));
  app.use(requestContext);

  app.use(API_PREFIX, createRouter(controller, { readinessCheck: () => service.checkReadiness() }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
