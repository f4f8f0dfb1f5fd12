import type { Request, Response } from 'express';
import type { Route } from '../routing/routeTable.js';

const STATUS_OK = Buffer.from('{"status":"ok"}');

/**
 * @openapi
 * /example:
 *   get:
 *     tags: [Status]
 *     summary: Static status payload
 *     responses:
 *       200:
 *         description: Always returned
 *         content:
 *           application/json:
 *             schema:
 *               type: object
 *               properties:
 *                 status: { type: string, example: ok }
 */
export function exampleHandler(_req: Request, res: Response): void {
  // setHeader and a Buffer body keep Express from appending a charset
  res.setHeader('Content-Type', 'application/json');
  res.status(200).send(STATUS_OK);
}

export function exampleRoute(): Route {
  return {
    method: 'GET',
    path: '/example',
    handler: exampleHandler,
  };
}
