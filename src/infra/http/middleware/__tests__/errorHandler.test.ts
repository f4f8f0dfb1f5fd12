import { describe, it, expect } from 'vitest';
import request from 'supertest';
import express from 'express';
import { z } from 'zod';
import { createErrorHandler } from '../errorHandler.js';
import { silentLogger } from '../../../logging/logger.js';
import {
  ConflictError,
  NotFoundError,
  RequestAbortedError,
} from '../../../../application/errors.js';

function appThrowing(err: unknown) {
  const app = express();
  app.get('/fail', (_req, _res, next) => {
    next(err);
  });
  app.post('/json', express.json({ limit: '10b' }), (_req, res) => {
    res.status(204).end();
  });
  app.use(createErrorHandler(silentLogger()));
  return app;
}

describe('errorHandler', () => {
  it('maps ZodError to 400 VALIDATION_ERROR', async () => {
    const parsed = z.object({ name: z.string() }).safeParse({});
    const err = parsed.success ? new Error('unreachable') : parsed.error;

    const res = await request(appThrowing(err)).get('/fail');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: { issues: [{ path: 'name', message: 'Required' }] },
    });
  });

  it('maps NotFoundError to 404', async () => {
    const res = await request(appThrowing(new NotFoundError('No such user'))).get('/fail');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ code: 'NOT_FOUND', message: 'No such user' });
  });

  it('omits details for a ConflictError without a field', async () => {
    const res = await request(appThrowing(new ConflictError('Record already exists'))).get('/fail');

    expect(res.status).toBe(409);
    expect(res.body).toEqual({ code: 'CONFLICT', message: 'Record already exists' });
  });

  it('answers 499 with no body for an aborted request', async () => {
    const res = await request(appThrowing(new RequestAbortedError())).get('/fail');

    expect(res.status).toBe(499);
    expect(res.body).toEqual({});
  });

  it('maps an oversized body to 413 PAYLOAD_TOO_LARGE', async () => {
    const res = await request(appThrowing(null))
      .post('/json')
      .send({ password: 'password123' });

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' });
  });
});
