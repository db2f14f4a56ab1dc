import type { Request, Response } from 'express';
import { handleWebhook, type WebhookDeps } from '../services/webhook.service.js';

export type WebhookCtrlDeps = WebhookDeps & { signatureHeader: string };

function reply(res: Response, status: number, body: Record<string, unknown>) {
  return res.status(status).json({ ...body, timestamp: new Date().toISOString() });
}

export function webhookCtrl(deps: WebhookCtrlDeps) {
  return async function receiveWebhook(req: Request, res: Response) {
    const requestId = req.rid ?? '';
    const body = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);

    const outcome = await handleWebhook(deps, {
      body,
      signature: req.headers[deps.signatureHeader],
      requestId,
    });

    switch (outcome.status) {
      case 'accepted':
        // duplicates get the same answer as fresh alerts
        return reply(res, 202, { status: 'accepted', message: 'Webhook received and processing', requestId });
      case 'unauthorized':
        return reply(res, 403, {
          status: 'error',
          message: 'Invalid or missing signature',
          requestId,
          error: { code: 'INVALID_SIGNATURE' },
        });
      case 'invalid':
        return reply(res, 422, {
          status: 'error',
          message: `Invalid webhook data: ${outcome.issues.map((i) => i.field).join(', ')}`,
          requestId,
          error: { code: 'VALIDATION_ERROR', issues: outcome.issues },
        });
      case 'overloaded':
        res.setHeader('retry-after', '1');
        return reply(res, 503, {
          status: 'error',
          message: 'Delivery queue is full, retry later',
          requestId,
          error: { code: 'QUEUE_FULL' },
        });
    }
  };
}
