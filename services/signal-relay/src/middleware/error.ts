import type { ErrorRequestHandler } from 'express';
import { isHttpError } from '../errors.js';
import { logger } from '../logger.js';

// body-parser errors carry `status` and `type` (entity.too.large, ...)
function bodyParserError(err: unknown): { status: number; type: string } | undefined {
  if (typeof err !== 'object' || err === null || !('status' in err) || !('type' in err)) return undefined;
  const { status, type } = err;
  return typeof status === 'number' && typeof type === 'string' ? { status, type } : undefined;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const parserErr = bodyParserError(err);
  const status = isHttpError(err) ? err.status : parserErr?.status ?? 500;
  const code = isHttpError(err) ? err.code : parserErr ? parserErr.type.toUpperCase().replace(/\./g, '_') : 'INTERNAL_ERROR';
  const message = status < 500 && err instanceof Error ? err.message : 'internal error';

  if (status >= 500) logger.error({ err, rid: req.rid }, 'request error');
  else logger.warn({ code, rid: req.rid }, 'request rejected');

  res.status(status).json({
    status: 'error',
    message,
    requestId: req.rid,
    timestamp: new Date().toISOString(),
    error: { code },
  });
};
