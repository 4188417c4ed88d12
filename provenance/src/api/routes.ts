import { NextFunction, Request, RequestHandler, Response, Router } from 'express';
import { ProvenanceController } from './controller';

export interface ProvenanceRouterOptions {
  readinessCheck?: () => Promise<void>;
}

function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res)).catch(next);
  };
}

export function createRouter(controller: ProvenanceController, options: ProvenanceRouterOptions = {}): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.status(200).json({ success: true, service: 'provenance', status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/ready', async (_req, res) => {
    try {
      if (options.readinessCheck) {
        await options.readinessCheck();
      }

      res.status(200).json({ success: true, service: 'provenance', ready: true, timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({
        success: false,
        service: 'provenance',
        ready: false,
        error: 'Dependencies not ready',
        timestamp: new Date().toISOString(),
      });
    }
  });

  router.post('/farmer/register', asyncHandler((req, res) => controller.registerFarmer(req, res)));
  router.post('/fpo/purchase', asyncHandler((req, res) => controller.recordPurchase(req, res)));
  router.post('/warehouse/update', asyncHandler((req, res) => controller.updateWarehouse(req, res)));
  router.post('/logistics/milestone', asyncHandler((req, res) => controller.recordLogisticsMilestone(req, res)));
  router.post('/processing/batch', asyncHandler((req, res) => controller.processBatch(req, res)));
  router.post('/packaging/sku', asyncHandler((req, res) => controller.createSku(req, res)));
  router.post('/ai/score', asyncHandler((req, res) => controller.recordAiScore(req, res)));
  router.get('/ai/score/:cid/verify', asyncHandler((req, res) => controller.verifyScoreCommitment(req, res)));

  router.post('/ipfs/upload', asyncHandler((req, res) => controller.uploadContent(req, res)));
  router.get('/ipfs/get/:cid', asyncHandler((req, res) => controller.getContent(req, res)));
  router.post('/ipfs/pin/:cid', asyncHandler((req, res) => controller.pinContent(req, res)));
  router.delete('/ipfs/pin/:cid', asyncHandler((req, res) => controller.unpinContent(req, res)));
  router.get('/ipfs/pin/:cid', asyncHandler((req, res) => controller.getPinStatus(req, res)));

  return router;
}
