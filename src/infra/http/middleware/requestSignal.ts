import type { Request, RequestHandler } from 'express';

const signals = new WeakMap<Request, AbortSignal>();

/**
 * Give every request an AbortSignal that fires when the connection closes
 * before the response has been fully written.
 */
export function abortOnDisconnect(): RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });
    signals.set(req, controller.signal);
    next();
  };
}

export function requestSignal(req: Request): AbortSignal | undefined {
  return signals.get(req);
}
