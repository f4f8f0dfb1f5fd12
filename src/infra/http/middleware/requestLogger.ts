import type { RequestHandler } from 'express';
import type { Logger } from '../../logging/logger.js';

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        ms: Date.now() - start,
      });
    });
    next();
  };
}
