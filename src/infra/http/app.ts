import express, { type Application } from 'express';
import { CreateUserUseCase } from '../../application/users/createUser.js';
import type { UserStore } from '../../application/users/userStore.js';
import type { Configuration } from '../config/config.js';
import type { Logger } from '../logging/logger.js';
import { createErrorHandler } from './middleware/errorHandler.js';
import { notFoundHandler } from './middleware/notFound.js';
import { requestLogger } from './middleware/requestLogger.js';
import { abortOnDisconnect } from './middleware/requestSignal.js';
import { exampleHandler } from './routes/example.js';
import { healthHandler } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { createUserRoutes } from './routes/users.js';

export interface AppDependencies {
  config: Pick<Configuration, 'serviceName' | 'version' | 'rateLimitPerMinute'>;
  users: UserStore;
  logger: Logger;
  /** Serve Swagger UI under /docs (default true). */
  docs?: boolean;
}

/**
 * Express application with every route mounted directly on the router.
 */
export function createApp({ config, users, logger, docs = true }: AppDependencies): Application {
  const app = express();
  app.disable('x-powered-by');
  // Exact path matching, like RouteTable: no case folding, no trailing-slash alias.
  // Set before the first app.use so the app router picks them up.
  app.set('case sensitive routing', true);
  app.set('strict routing', true);

  app.use(requestLogger(logger));
  app.use(abortOnDisconnect());

  if (docs) {
    app.use(createSwaggerRoutes(config.serviceName, config.version));
  }

  app.get('/example', exampleHandler);
  app.get('/healthz', healthHandler(users));
  app.use(
    createUserRoutes(new CreateUserUseCase(users), {
      rateLimitPerMinute: config.rateLimitPerMinute,
    })
  );

  // Must stay last
  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}
