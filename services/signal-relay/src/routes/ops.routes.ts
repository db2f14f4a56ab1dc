import { Router } from 'express';
import { healthCtrl } from '../controllers/health.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { registry } from '../metrics/metrics.js';
import type { HealthDeps } from '../services/health.service.js';

export function ops(deps: HealthDeps) {
  const r = Router();
  const ctrl = healthCtrl(deps);
  r.get('/', ctrl.root);
  r.get('/health', ctrl.liveness);
  r.get('/health/liveness', ctrl.liveness);
  r.get('/health/readiness', asyncHandler(ctrl.readiness));
  r.get('/health/telegram', asyncHandler(ctrl.telegram));
  r.get('/ops/metrics', asyncHandler(async (_req, res) => {
    res.setHeader('Content-Type', registry.contentType);
    res.end(await registry.metrics());
  }));
  return r;
}
