import type { Request, Response, NextFunction, RequestHandler } from 'express';

/** Forwards a rejected handler promise to the error middleware (Express 4 does not). */
export const asyncHandler = (fn: (req: Request, res: Response) => unknown): RequestHandler =>
  (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res))
      .catch(next);
  };
