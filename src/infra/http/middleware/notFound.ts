import type { RequestHandler } from 'express';
import { NotFoundError } from '../../../application/errors.js';

/**
 * Terminal middleware: nothing matched (method, path).
 */
export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};
