// backend/services/shared/src/middleware/asyncHandler.ts
import type { NextFunction, Request, RequestHandler, Response } from "express";

export type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => Promise<unknown>;

/**
 * Express 4 ignores the promise an async handler returns. Route the
 * rejection (or an early synchronous throw) into `next` so the error page
 * tail renders it.
 */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req, res, next) => {
    let pending: Promise<unknown>;
    try {
      pending = fn(req, res, next);
    } catch (err) {
      next(err);
      return;
    }
    pending.catch(next);
  };
}
