import { Router, type Request, type Response, type NextFunction } from 'express';
import { httpReqDuration } from '../metrics/metrics.js';
import { HttpError } from '../errors.js';
import { ops } from './ops.routes.js';
import { webhooks } from './webhooks.routes.js';
import type { HealthDeps } from '../services/health.service.js';
import type { WebhookCtrlDeps } from '../controllers/webhooks.controller.js';

export type ApiDeps = { webhook: WebhookCtrlDeps; health: HealthDeps };

export function apiRouter(deps: ApiDeps) {
  const r = Router();
  r.use((req: Request, res: Response, next: NextFunction) => {
    const end = httpReqDuration.startTimer({ method: req.method, route: req.path });
    res.on('finish', () => end({ code: String(res.statusCode) }));
    next();
  });
  r.use(ops(deps.health));
  r.use(webhooks(deps.webhook));
  r.use((req: Request, _res: Response, next: NextFunction) => {
    next(new HttpError(404, 'NOT_FOUND', `route not found: ${req.method} ${req.path}`));
  });
  return r;
}
