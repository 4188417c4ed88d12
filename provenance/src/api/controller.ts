import { Request, Response } from 'express';
import type { ProvenanceService } from '../core/provenance-service';
import type { RunOptions } from '../core/pipeline';
import { sendError } from '../middleware/middleware';

function runOptions(req: Request): RunOptions {
  return { signal: req.abortSignal, requestId: req.requestId };
}

export class ProvenanceController {
  constructor(private readonly service: ProvenanceService) {}

  registerFarmer(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 201, () => this.service.registerFarmer(req.body, runOptions(req)));
  }

  recordPurchase(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 201, () => this.service.recordPurchase(req.body, runOptions(req)));
  }

  updateWarehouse(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 201, () => this.service.updateWarehouse(req.body, runOptions(req)));
  }

  recordLogisticsMilestone(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 201, () => this.service.recordLogisticsMilestone(req.body, runOptions(req)));
  }

  processBatch(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 201, () => this.service.processBatch(req.body, runOptions(req)));
  }

  createSku(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 201, () => this.service.createSku(req.body, runOptions(req)));
  }

  recordAiScore(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 201, () => this.service.recordAiScore(req.body, runOptions(req)));
  }

  verifyScoreCommitment(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 200, () => this.service.verifyScoreCommitment(req.params.cid, runOptions(req)));
  }

  uploadContent(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 201, () => this.service.uploadContent(req.body, runOptions(req)));
  }

  getContent(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 200, () => this.service.getContent(req.params.cid, runOptions(req)));
  }

  pinContent(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 200, () => this.service.pinContent(req.params.cid, runOptions(req)));
  }

  unpinContent(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 200, () => this.service.unpinContent(req.params.cid, runOptions(req)));
  }

  getPinStatus(req: Request, res: Response): Promise<void> {
    return this.respond(req, res, 200, () => this.service.getPinStatus(req.params.cid, runOptions(req)));
  }

  private async respond<T>(
    req: Pick<Request, 'requestId'>,
    res: Response,
    status: number,
    operation: () => Promise<T>
  ): Promise<void> {
    try {
      const data = await operation();
      res.status(status).json({
        success: true,
        data,
        timestamp: new Date().toISOString(),
      });
    } catch (error: unknown) {
      sendError(res, error, req.requestId);
    }
  }
}
