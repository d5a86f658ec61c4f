import type { NextFunction, Request, RequestHandler, Response } from "express";

// Express 4 does not forward rejected promises to the error handler
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}
