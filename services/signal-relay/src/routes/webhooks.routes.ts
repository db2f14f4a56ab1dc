import express, { Router } from 'express';
import { webhookCtrl, type WebhookCtrlDeps } from '../controllers/webhooks.controller.js';
import { asyncHandler } from '../middleware/async-handler.js';

export function webhooks(deps: WebhookCtrlDeps) {
  const r = Router();
  // the HMAC covers the exact bytes sent, so the body stays raw; alert
  // sources post it as text/plain as often as application/json
  r.post('/webhook', express.raw({ type: () => true, limit: '64kb' }), asyncHandler(webhookCtrl(deps)));
  return r;
}
