import { CreateUserUseCase } from '../../application/users/createUser.js';
import { handleShutdown, loadConfigOrExit } from '../bootstrap.js';
import { createPool } from '../db/pool.js';
import { PgUserStore } from '../db/userStore.js';
import { exampleRoute } from './routes/example.js';
import { healthRoute } from './routes/health.js';
import { userRoutes } from './routes/users.js';
import { HttpServer } from './routing/httpServer.js';

// Entry point: routes declared up front and served through HttpServer.

const { config, logger } = loadConfigOrExit();
const pool = createPool(config.db, logger);
const users = new PgUserStore(pool);

const srv = new HttpServer(config.serviceName, logger);
srv.port = config.server.port;
srv.registerRoute(
  exampleRoute(),
  healthRoute(users),
  ...userRoutes(new CreateUserUseCase(users), {
    rateLimitPerMinute: config.rateLimitPerMinute,
  })
);

try {
  await srv.start();
} catch (err) {
  logger.fatal({ err }, 'Failed to start HTTP server');
  process.exit(1);
}

handleShutdown(logger, async () => {
  await srv.stop();
  await pool.end();
});
