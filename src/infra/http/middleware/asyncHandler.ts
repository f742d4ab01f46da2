import type { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards rejections, including errors thrown before the first await, to next().
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
}
