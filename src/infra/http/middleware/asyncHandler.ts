import type { NextFunction, Request, RequestHandler, Response } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

// Express 4 ignores the promise a handler returns, so a rejected store call
// has to be handed to next() for errorHandler to turn it into a response.
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    void route(req, res, next).catch(next);
  };
}
