import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** correlation id: the caller's x-request-id or a fresh uuid */
      rid?: string;
    }
  }
}

export function requestId(req: Request, res: Response, next: NextFunction) {
  const rid = req.header('x-request-id') || randomUUID();
  req.rid = rid;
  res.setHeader('x-request-id', rid);
  next();
}
