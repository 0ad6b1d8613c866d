import { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Forwards rejections of an async route handler to Express' error pipeline.
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

export function actorOf(req: Request): string {
  return req.principal?.username ?? 'system';
}
