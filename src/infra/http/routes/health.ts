import type { RequestHandler } from 'express';
import type { UserStore } from '../../../application/users/userStore.js';
import type { Route } from '../routing/routeTable.js';
import { requestSignal } from '../middleware/requestSignal.js';

const PING_TIMEOUT_MS = 2000;

/**
 * @openapi
 * /healthz:
 *   get:
 *     tags: [Status]
 *     summary: Liveness including a database round trip
 *     responses:
 *       200:
 *         description: Database reachable
 *       503:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */
export function healthHandler(store: Pick<UserStore, 'ping'>): RequestHandler {
  return (req, res, next) => {
    const timeout = AbortSignal.timeout(PING_TIMEOUT_MS);
    const clientGone = requestSignal(req);
    const signal = clientGone ? AbortSignal.any([timeout, clientGone]) : timeout;

    store
      .ping({ signal })
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(503).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  };
}

export function healthRoute(store: Pick<UserStore, 'ping'>): Route {
  return {
    method: 'GET',
    path: '/healthz',
    handler: healthHandler(store),
  };
}
