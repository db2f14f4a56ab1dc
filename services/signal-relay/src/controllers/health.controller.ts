import type { Request, Response } from 'express';
import {
  livenessSvc,
  readinessSvc,
  telegramHealthSvc,
  SERVICE_NAME,
  SERVICE_VERSION,
  type HealthDeps,
} from '../services/health.service.js';

export function healthCtrl(deps: HealthDeps) {
  return {
    root(_req: Request, res: Response) {
      res.json({ service: SERVICE_NAME, version: SERVICE_VERSION, status: 'running', timestamp: new Date().toISOString() });
    },
    liveness(_req: Request, res: Response) {
      res.json(livenessSvc(deps));
    },
    async readiness(_req: Request, res: Response) {
      const result = await readinessSvc(deps);
      res.status(result.status === 'ready' ? 200 : 503).json(result);
    },
    async telegram(_req: Request, res: Response) {
      res.json(await telegramHealthSvc(deps));
    },
  };
}
