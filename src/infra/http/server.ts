import { handleShutdown, loadConfigOrExit } from '../bootstrap.js';
import { createPool } from '../db/pool.js';
import { PgUserStore } from '../db/userStore.js';
import { createApp } from './app.js';

// Entry point: routes mounted directly on the Express router.

const { config, logger } = loadConfigOrExit();
const pool = createPool(config.db, logger);
const app = createApp({ config, users: new PgUserStore(pool), logger });

const server = app.listen(config.server.port, () => {
  logger.info(`${config.serviceName} listening on http://localhost:${config.server.port}`);
  logger.info(`API docs: http://localhost:${config.server.port}/docs`);
});

server.on('error', (err) => {
  logger.fatal({ err }, 'HTTP server failed');
  process.exit(1);
});

handleShutdown(logger, async () => {
  await new Promise<void>((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
  await pool.end();
});
