import type { NextFunction, Request, RequestHandler, Response } from 'express';

/** Forwards a rejected handler promise to the express error middleware. */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
