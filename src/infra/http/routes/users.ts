import express, { Router, type RequestHandler } from 'express';
import { z } from 'zod';
import type { CreateUserUseCase } from '../../../application/users/createUser.js';
import type { User } from '../../../domain/user/user.js';
import type { Route } from '../routing/routeTable.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { createRateLimiter } from '../middleware/rateLimit.js';
import { requestSignal } from '../middleware/requestSignal.js';
import { validate } from '../middleware/validate.js';

/**
 * @openapi
 * /users:
 *   post:
 *     tags: [Users]
 *     summary: Create a user
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [username, email, password]
 *             properties:
 *               username: { type: string, minLength: 1, maxLength: 64 }
 *               email: { type: string, format: email }
 *               password: { type: string, minLength: 8, writeOnly: true }
 *     responses:
 *       201:
 *         description: User created
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/User'
 *       400:
 *         description: Malformed JSON or validation error
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       409:
 *         description: Username or email already exists
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 *       503:
 *         description: Database unavailable
 *         content:
 *           application/json:
 *             schema:
 *               $ref: '#/components/schemas/ErrorResponse'
 */

export const createUserBodySchema = z.object({
  username: z.string().trim().min(1, 'must not be empty').max(64, 'must be at most 64 characters'),
  email: z.string().trim().email('must be a valid email address'),
  password: z
    .string()
    .min(8, 'must be at least 8 characters')
    .max(256, 'must be at most 256 characters'),
});

/**
 * Wire representation of a user. The password hash is never part of it.
 */
export interface UserResponse {
  id: number;
  username: string;
  email: string;
  created_at: string;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    created_at: user.createdAt.toISOString(),
  };
}

export interface UserRouteOptions {
  rateLimitPerMinute: number;
}

/**
 * Handler chain for POST /users: JSON parsing is scoped to this route so
 * bodies sent to other endpoints are never parsed.
 */
export function createUserHandlers(
  createUser: CreateUserUseCase,
  options: UserRouteOptions
): RequestHandler[] {
  return [
    createRateLimiter(options.rateLimitPerMinute),
    express.json(),
    validate({ body: createUserBodySchema }),
    asyncHandler(async (req, res) => {
      const body = createUserBodySchema.parse(req.body);
      const user = await createUser.execute(body, requestSignal(req));
      res.status(201).json(toUserResponse(user));
    }),
  ];
}

export function createUserRoutes(createUser: CreateUserUseCase, options: UserRouteOptions): Router {
  const router = Router({ caseSensitive: true, strict: true });
  router.post('/users', ...createUserHandlers(createUser, options));
  return router;
}

export function userRoutes(createUser: CreateUserUseCase, options: UserRouteOptions): Route[] {
  return [{ method: 'POST', path: '/users', handler: createUserHandlers(createUser, options) }];
}
